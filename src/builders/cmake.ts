import { BuilderDefinition } from './types';
import { getSourceGit, patchSource } from './common';

const BUILD_DIR = 'build';

export const cmakeBuilder: BuilderDefinition = {
    kind: 'cmake',
    phases: {
        'builder-setup': async (ctx) => {
            await ctx.shell('builder-setup', 'cmake --version');
        },
        'get-source': getSourceGit,
        'patch': patchSource,
        'configure': async (ctx) => {
            const args = ctx.config.buildArgs ? ` ${ctx.config.buildArgs}` : '';
            await ctx.shell('configure', `cmake -S . -B ${BUILD_DIR} -DCMAKE_BUILD_TYPE=Release${args}`);
        },
        'compile': async (ctx) => {
            const targets = ctx.config.buildTargets ? ` --target ${ctx.config.buildTargets}` : '';
            await ctx.shell('compile', `cmake --build ${BUILD_DIR} --parallel ${ctx.config.parallelWorkers}${targets}`);
        },
        'install': async (ctx) => {
            await ctx.shell('install', `cmake --install ${BUILD_DIR}`);
        },
    },
};
