import * as fs from 'fs';
import * as path from 'path';
import { BuilderDefinition } from './types';
import { configureScript, getSourceGit, patchSource } from './common';
import { ErrorFactory } from '../structured_error';
import { globToRegExp, shellQuote } from '../substitution';

/** Wheel names normalise `-`, `_` and `.` in the distribution name to `_`. */
export function wheelPattern(name: string, version: string): string {
    return `${name.replace(/[-_.]/g, '_')}-${version}*.whl`;
}

/** Files in `dir` matching a shell glob, sorted. */
export function matchPackageFiles(dir: string, pattern: string): string[] {
    if (!fs.existsSync(dir)) return [];
    const re = globToRegExp(pattern);
    return fs.readdirSync(dir).filter(f => re.test(f)).sort();
}

export const pipBuilder: BuilderDefinition = {
    kind: 'pip',
    phases: {
        'builder-setup': async (ctx) => {
            await ctx.shell('builder-setup', 'python3 -m ensurepip --upgrade');
            await ctx.shell('builder-setup', 'python3 -m pip install --no-cache-dir --upgrade setuptools wheel cython');
            // PEP-517 front end
            await ctx.shell('builder-setup', 'python -m pip install build');
        },
        'get-source': getSourceGit,
        'patch': patchSource,
        'configure': configureScript,
        'package-filename': async (ctx) => {
            ctx.state.packageFile = wheelPattern(ctx.config.name, ctx.config.version);
        },
        'package': async (ctx) => {
            await ctx.shell('package', `python -m build --wheel --outdir ${shellQuote(ctx.config.outDir)}`);
        },
        'install': async (ctx) => {
            const outDir = ctx.config.outDir;
            const pattern = ctx.state.packageFile ?? wheelPattern(ctx.config.name, ctx.config.version);
            const files = matchPackageFiles(outDir, pattern);
            if (files.length === 0) {
                throw ErrorFactory.packageFileMissing(outDir, pattern);
            }
            const targets = files.map(f => shellQuote(path.join(outDir, f))).join(' ');
            await ctx.shell('install', `pip --no-cache-dir install ${targets}`);
        },
    },
};
