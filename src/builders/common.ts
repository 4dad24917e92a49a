/**
 * Phase actions shared by several builders.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PhaseAction } from '../build_context';
import { acquireSource } from '../source_acquisition';
import { applyPackagePatch } from '../patch_apply';
import { ErrorFactory } from '../structured_error';
import { shellQuote } from '../substitution';

export const getSourceGit: PhaseAction = async (ctx) => {
    await acquireSource(ctx);
};

/** Apply `<PATCH_DIR>/<src-dir>-<PKG_VERSION>.patch` to the build directory, once. */
export const patchSource: PhaseAction = async (ctx) => {
    applyPackagePatch({
        patchDir: ctx.config.patchDir,
        sourceDirName: ctx.state.sourceDirName,
        version: ctx.config.version,
        checkoutDir: ctx.cwd,
    });
};

/**
 * Source the project's configure script (PHASE_CFG_SCRIPT) when the checkout
 * has one. What it exports, PKG_BUILD_TARGETS for bazel say, reaches the
 * later phases.
 */
export const configureScript: PhaseAction = async (ctx) => {
    const script = ctx.config.configureScript;
    if (!script || !fs.existsSync(path.join(ctx.cwd, script))) {
        ctx.log.debug('no configure script', { script, dir: ctx.cwd });
        return;
    }
    const source = `. ${shellQuote('./' + script)}`;
    ctx.log.info(`> ${source}`);
    const result = await ctx.bashExporting(`set -e; ${source}`);
    if (result.exitCode !== 0) {
        throw ErrorFactory.phaseFailed('configure', source, result.exitCode);
    }
};
