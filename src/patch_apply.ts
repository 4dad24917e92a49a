/**
 * Patch Applier - idempotent application of a per-version patch file.
 *
 * The patch for a checkout lives at `<patchDir>/<sourceDir>-<version>.patch`.
 * A successful reverse dry-run means the tree already carries the patch, so
 * repeated runs against the same checkout never write twice.
 */

import * as fs from 'fs';
import * as path from 'path';
import { applyUnifiedDiff } from './unified_diff';
import { ErrorFactory } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('patch');

export type PatchStatus = 'absent' | 'already-applied' | 'applied';

export interface PackagePatchResult {
    status: PatchStatus;
    patchFile: string | null;
    files: string[];
}

export function patchFileFor(patchDir: string, sourceDirName: string, version: string): string {
    return path.join(patchDir, `${sourceDirName}-${version}.patch`);
}

export function applyPackagePatch(params: {
    patchDir: string;
    sourceDirName: string;
    version: string;
    checkoutDir: string;
    strip?: number;
}): PackagePatchResult {
    const { patchDir, sourceDirName, version, checkoutDir, strip = 1 } = params;

    if (!patchDir) {
        return { status: 'absent', patchFile: null, files: [] };
    }

    const patchFile = patchFileFor(patchDir, sourceDirName, version);
    if (!fs.existsSync(patchFile)) {
        log.debug('no patch file', { patch_file: patchFile });
        return { status: 'absent', patchFile, files: [] };
    }

    const diffUtf8 = fs.readFileSync(patchFile, 'utf8');

    const reverseCheck = applyUnifiedDiff({ rootDir: checkoutDir, diffUtf8, strip, reverse: true, dryRun: true });
    if (reverseCheck.ok) {
        log.info('patch already applied', { patch_file: patchFile });
        return { status: 'already-applied', patchFile, files: [] };
    }

    const applied = applyUnifiedDiff({ rootDir: checkoutDir, diffUtf8, strip });
    if (!applied.ok) {
        throw ErrorFactory.patchFailed(patchFile, applied.error ?? 'unknown error');
    }

    log.info('patch applied', { patch_file: patchFile, files: applied.files });
    return { status: 'applied', patchFile, files: applied.files };
}
