/**
 * Source Acquisition - idempotent git checkout of a package's repotag.
 *
 *   UNRESOLVED → TAG_RESOLVED → REUSED | CLONED | FETCH_SKIPPED
 *              → SUBMODULES_SYNCED (fresh checkouts only) → DONE
 *
 * Reuse is decided by the presence of `<dir>/.git`, not by content, so a stale
 * checkout is reused as-is. A tag/branch clone failure is tolerated (the tag
 * may not exist upstream); commit fetches and submodule syncs are not.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BuildContext } from './build_context';
import { DirectoryGuard } from './working_directory';
import { PackageIdentity, packageId } from './package_identity';
import { ErrorFactory } from './structured_error';
import { substitute } from './substitution';

export type SourceState =
    | 'UNRESOLVED'
    | 'TAG_RESOLVED'
    | 'REUSED'
    | 'CLONED'
    | 'FETCH_SKIPPED'
    | 'SUBMODULES_SYNCED'
    | 'DONE';

export type RepotagType = 'tag' | 'branch' | 'commit';

export interface AcquisitionResult {
    repotag: string;
    /** States visited, in order. */
    trail: SourceState[];
    checkoutDir: string | null;
    guard: DirectoryGuard | null;
}

export function resolveRepotag(identity: PackageIdentity, regex: string, replacement: string): string {
    return substitute(packageId(identity), regex, replacement).output;
}

export function parseRepotagType(value: string): RepotagType {
    if (value === 'tag' || value === 'branch' || value === 'commit') return value;
    throw ErrorFactory.configInvalid('PROJECT_REPOTAG_TYPE', value, 'tag, branch or commit');
}

export function isGitCheckout(dir: string): boolean {
    return fs.existsSync(dir) && fs.existsSync(path.join(dir, '.git'));
}

export async function acquireSource(ctx: BuildContext): Promise<AcquisitionResult> {
    const { config, log } = ctx;
    const trail: SourceState[] = ['UNRESOLVED'];
    const move = (to: SourceState) => {
        log.debug('source state', { from: trail[trail.length - 1], to });
        trail.push(to);
    };

    const repotag = resolveRepotag(ctx.identity, config.repotagRegex, config.repotagReplacement);
    ctx.state.repotag = repotag;
    move('TAG_RESOLVED');

    const srcDir = ctx.state.sourceDirName;
    if (!srcDir) {
        throw ErrorFactory.configInvalid('PROJECT_REPO', config.projectRepo, 'a repository URL');
    }

    const target = path.resolve(ctx.cwd, srcDir);
    if (isGitCheckout(target)) {
        const guard = enter(ctx, srcDir);
        move('REUSED');
        move('DONE');
        log.info('reusing existing checkout', { dir: target });
        return { repotag, trail, checkoutDir: guard.path, guard };
    }

    if (!config.projectRepo) {
        throw ErrorFactory.configInvalid('PROJECT_REPO', config.projectRepo, 'a repository URL');
    }

    const type = parseRepotagType(config.repotagType);
    if (type === 'commit') {
        await cloneAtCommit(ctx, config.projectRepo, repotag, srcDir);
    } else {
        const clone = await ctx.run({
            command: 'git',
            args: ['clone', '--depth', '1', '--branch', repotag, '-c', 'advice.detachedHead=false', '--', config.projectRepo, srcDir],
        });
        if (clone.exitCode !== 0) {
            move('FETCH_SKIPPED');
            log.warn('clone failed, continuing without checkout', { repo: config.projectRepo, repotag, exit_code: clone.exitCode });
            return { repotag, trail, checkoutDir: null, guard: null };
        }
    }
    const guard = enter(ctx, srcDir);
    move('CLONED');

    // after checkout: a commit fetch cannot combine with clone-time submodule flags
    if (config.gitSubmodule) {
        const args = ['submodule', 'update', '--init', '--force', '--depth=1'];
        if (config.gitSubmoduleRecursive) args.push('--recursive');
        const sync = await ctx.run({ command: 'git', args });
        if (sync.exitCode !== 0) {
            throw ErrorFactory.submoduleSyncFailed(guard.path, sync.exitCode);
        }
        move('SUBMODULES_SYNCED');
    }

    move('DONE');
    log.info('source checked out', { repo: config.projectRepo, repotag, type, dir: guard.path });
    return { repotag, trail, checkoutDir: guard.path, guard };
}

function enter(ctx: BuildContext, srcDir: string): DirectoryGuard {
    const guard = ctx.workdir.push(srcDir);
    ctx.state.checkoutDir = guard.path;
    ctx.state.sourceGuard = guard;
    return guard;
}

/** init + fetch of exactly one commit; a shallow clone cannot target an arbitrary sha. */
async function cloneAtCommit(ctx: BuildContext, repo: string, sha: string, destDir: string): Promise<void> {
    const dir = path.resolve(ctx.cwd, destDir);
    ctx.log.info(`cloning ${repo} into ${destDir} for sha: ${sha}`);

    const steps: Array<{ step: string; args: string[]; cwd: string }> = [
        { step: 'init', args: ['init', '-q', destDir], cwd: ctx.cwd },
        { step: 'remote', args: ['remote', 'add', 'origin', repo], cwd: dir },
        { step: 'fetch', args: ['fetch', '--depth=1', 'origin', sha], cwd: dir },
        { step: 'reset', args: ['reset', '--hard', 'FETCH_HEAD'], cwd: dir },
    ];
    for (const { step, args, cwd } of steps) {
        const result = await ctx.run({ command: 'git', args, cwd });
        if (result.exitCode !== 0) {
            throw ErrorFactory.sourceFetchFailed(step, repo, result.exitCode);
        }
    }

    const head = await ctx.run({ command: 'git', args: ['rev-parse', 'HEAD'], cwd: dir, capture: true });
    const actual = head.stdout.trim().toLowerCase();
    if (head.exitCode !== 0 || !actual.startsWith(sha.toLowerCase())) {
        throw ErrorFactory.checkoutMismatch(sha, actual);
    }
}
