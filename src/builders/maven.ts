import { BuilderDefinition } from './types';
import { configureScript, getSourceGit, patchSource } from './common';
import { shellQuote } from '../substitution';

export function mavenInstallCommand(subproject: string, extraArgs: string): string {
    const parts = ['mvn'];
    if (subproject) parts.push('-pl', shellQuote(subproject));
    parts.push('clean', 'install');
    // BUILD_EXTRA_ARGS is left to shell word splitting
    if (extraArgs) parts.push(extraArgs);
    return parts.join(' ');
}

export const mavenBuilder: BuilderDefinition = {
    kind: 'maven',
    phases: {
        'builder-setup': async (ctx) => {
            await ctx.shell('builder-setup', 'mvn --version');
        },
        'get-source': getSourceGit,
        'patch': patchSource,
        'configure': configureScript,
        'package-filename': async (ctx) => {
            ctx.state.packageFile = `${ctx.config.name}-${ctx.config.version}.jar`;
        },
        'install': async (ctx) => {
            await ctx.shell('install', mavenInstallCommand(ctx.config.subproject, ctx.config.buildExtraArgs));
        },
    },
};
