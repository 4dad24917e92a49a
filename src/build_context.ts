/**
 * Build Context - the per-run state shared by all phases.
 *
 * Values a phase produces for later phases (repotag, checkout directory,
 * package file pattern) live in `state` instead of process-wide variables.
 * Variables a shell phase exports are folded back into the configuration,
 * so a configure step can set PKG_BUILD_TARGETS for compile.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DriverConfig, Env, loadDriverConfig, toolEnvironment } from './config';
import { PackageIdentity, displayName, packageId } from './package_identity';
import {
    CommandRunner,
    CommandResult,
    CommandSpec,
    describeCommand,
    inheritedEnvironment,
    parseEnvDump,
    shellCommand,
} from './command_runner';
import { WorkingDirectory, DirectoryGuard } from './working_directory';
import { ErrorFactory } from './structured_error';
import { Logger } from './logger';
import { Phase } from './phases';

export interface BuildState {
    repotag?: string;
    sourceDirName: string;
    checkoutDir?: string;
    packageFile?: string;
    sourceGuard?: DirectoryGuard;
}

export type PhaseAction = (ctx: BuildContext) => Promise<void>;

/** One optional action per phase; used for builder defaults and overrides alike. */
export type PhaseActions = Partial<Record<Phase, PhaseAction>>;

/** Shell variable holding the dump file; assigned before anything is sourced, never exported. */
const DUMP_VAR = '__pkbuild_env_dump';

/** Wrap a bash script so that, on success, it dumps its environment to the file given as `$1`. */
export function exportingScript(script: string): string {
    return `${DUMP_VAR}=$1; shift; ${script}; env -0 > "$${DUMP_VAR}"`;
}

export class BuildContext {
    readonly state: BuildState;
    private current: DriverConfig;

    constructor(
        config: DriverConfig,
        readonly identity: PackageIdentity,
        readonly runner: CommandRunner,
        readonly workdir: WorkingDirectory,
        readonly log: Logger,
        private env: Env = process.env
    ) {
        this.current = config;
        this.state = { sourceDirName: config.projectSrcDir };
    }

    get config(): DriverConfig {
        return this.current;
    }

    get cwd(): string {
        return this.workdir.current;
    }

    /**
     * Fold variables a phase exported into the configuration. The package
     * identity stays as it was when the build started.
     */
    applyExports(vars: Record<string, string>): void {
        const names = Object.keys(vars);
        if (names.length === 0) return;
        this.log.debug('phase exported variables', { names });

        this.env = { ...this.env, ...vars };
        this.current = loadDriverConfig(this.env);
        if ('PROJECT_REPOTAG' in vars) this.state.repotag = vars.PROJECT_REPOTAG || undefined;
        if ('PROJECT_SRC_DIR' in vars) this.state.sourceDirName = this.current.projectSrcDir;
        if ('PKG_FILE' in vars) this.state.packageFile = vars.PKG_FILE || undefined;
    }

    /** Variables every external tool and override function sees. */
    environment(): Record<string, string> {
        const c = this.config;
        return {
            ...toolEnvironment(c, this.env),
            PACKAGE: c.package,
            PACKAGE_VERSION: c.packageVersion,
            PKG_ID: packageId(this.identity),
            PKG_NAME: c.name,
            PKG_VERSION: c.version,
            PKG_PARENT: c.parent,
            PKG_FULLNAME: displayName(this.identity),
            PKG_BUILDER: c.builder,
            PROJECT_REPO: c.projectRepo,
            PROJECT_REPOTAG: this.state.repotag ?? '',
            PROJECT_REPOTAG_TYPE: c.repotagType,
            PROJECT_SRC_DIR: this.state.sourceDirName,
            PATCH_DIR: c.patchDir,
            PKG_BUILD_ARGS: c.buildArgs,
            PKG_BUILD_TARGETS: c.buildTargets,
            PARALLEL_WORKERS: c.parallelWorkers,
            PKG_OUT_DIR: c.outDir,
            PKG_FILE: this.state.packageFile ?? '',
            SUBPROJECT: c.subproject,
            BUILD_EXTRA_ARGS: c.buildExtraArgs,
        };
    }

    /** Run a command in the current build directory with the build environment. */
    async run(spec: Omit<CommandSpec, 'cwd' | 'env'> & { cwd?: string }): Promise<CommandResult> {
        return this.runner.run({ ...spec, cwd: spec.cwd ?? this.cwd, env: this.environment() });
    }

    /** Run a command and fail the phase on a non-zero exit. */
    async exec(phase: Phase, spec: Omit<CommandSpec, 'cwd' | 'env'> & { cwd?: string }): Promise<CommandResult> {
        const result = await this.run(spec);
        if (result.exitCode !== 0) {
            throw ErrorFactory.phaseFailed(phase, describeCommand(spec), result.exitCode);
        }
        return result;
    }

    /**
     * `bash -c <script>` in the build directory. When it exits 0, the
     * variables it changed are applied with `applyExports`.
     */
    async bashExporting(script: string): Promise<CommandResult> {
        const dumpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pkbuild-env-'));
        const dumpFile = path.join(dumpDir, 'env');
        const env = this.environment();
        try {
            const result = await this.runner.run({
                command: 'bash',
                args: ['-c', exportingScript(script), 'pkbuild', dumpFile],
                cwd: this.cwd,
                env,
            });
            if (result.exitCode === 0 && fs.existsSync(dumpFile)) {
                this.applyExports(parseEnvDump(fs.readFileSync(dumpFile, 'utf8'), inheritedEnvironment(env)));
            }
            return result;
        } finally {
            fs.rmSync(dumpDir, { recursive: true, force: true });
        }
    }

    /** `sh -c <script>`, failing the phase on a non-zero exit. */
    async shell(phase: Phase, script: string): Promise<CommandResult> {
        this.log.info(`> ${script}`);
        const { command, args } = shellCommand(script, this.cwd);
        return this.exec(phase, { command, args });
    }
}
