/**
 * Package Driver - builds and installs one package through the fixed phase pipeline.
 *
 *   defaults → identity check → override script → system setup
 *   → builder-setup, get-source, patch, configure, compile,
 *     package-filename, package, install
 *   → release of the checkout directory (always)
 */

import * as fs from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { BuildContext, PhaseActions } from './build_context';
import { BuilderRegistry } from './builders';
import { CommandRunner, SpawnCommandRunner, describeCommand } from './command_runner';
import { Env, loadDriverConfig } from './config';
import { createLogger, setCorrelation, clearCorrelation, Logger } from './logger';
import { loadOverrideScript } from './override_script';
import { PackageIdentity, capitalize, displayName, identityFromConfig, isBuildable, packageId } from './package_identity';
import { DispatchRecord, PhaseDispatcher } from './phase_dispatcher';
import { PHASES } from './phases';
import { WorkingDirectory } from './working_directory';
import { ErrorFactory } from './structured_error';

const LOCALE_HEADER = '/usr/include/locale.h';
const XLOCALE_HEADER = '/usr/include/xlocale.h';

export interface PackageDriverOptions {
    env?: Env;
    /** Directory the build starts in; checkouts and the override script are resolved against it. */
    runDir?: string;
    runner?: CommandRunner;
    /** Programmatic overrides; they win over functions of the override script. */
    overrides?: PhaseActions;
    registry?: BuilderRegistry;
    /** Look for the override script (PACKAGE_SCRIPT) in runDir. Default true. */
    loadScript?: boolean;
    buildId?: string;
}

export type DriverStatus = 'skipped' | 'completed';

export interface DriverOutcome {
    status: DriverStatus;
    buildId: string;
    identity: PackageIdentity;
    trace: DispatchRecord[];
    scriptPath: string | null;
    checkoutDir: string | null;
    packageFile: string | null;
}

export class PackageDriver {
    private readonly env: Env;
    private readonly runDir: string;
    private readonly runner: CommandRunner;
    private readonly overrides: PhaseActions;
    private readonly registry: BuilderRegistry;
    private readonly loadScript: boolean;
    private readonly buildId: string;
    private readonly log: Logger = createLogger('install');

    constructor(options: PackageDriverOptions = {}) {
        this.env = options.env ?? process.env;
        this.runDir = options.runDir ?? process.cwd();
        this.runner = options.runner ?? new SpawnCommandRunner();
        this.overrides = options.overrides ?? {};
        this.registry = options.registry ?? new BuilderRegistry();
        this.loadScript = options.loadScript ?? true;
        this.buildId = options.buildId ?? uuidv4();
    }

    async run(): Promise<DriverOutcome> {
        let config = loadDriverConfig(this.env);
        let identity = identityFromConfig(config);

        // no identity, no build; not an error
        if (!isBuildable(identity)) {
            this.log.debug('package, version or builder unset; nothing to do');
            return this.outcome('skipped', identity, [], null, null);
        }

        setCorrelation({ buildId: this.buildId, pkg: packageId(identity), phase: '' });
        try {
            const workdir = new WorkingDirectory(this.runDir);

            let buildEnv: Env = this.env;
            let scriptOverrides: PhaseActions = {};
            let scriptPath: string | null = null;
            if (this.loadScript) {
                const probeCtx = new BuildContext(config, identity, this.runner, workdir, this.log, this.env);
                const script = await loadOverrideScript({
                    runDir: this.runDir,
                    scriptName: config.packageScript,
                    runner: this.runner,
                    env: probeCtx.environment(),
                });
                if (script) {
                    this.log.info(`Sourcing ${script.path}`, { functions: script.functions });
                    buildEnv = { ...this.env, ...script.variables };
                    config = loadDriverConfig(buildEnv);
                    identity = identityFromConfig(config);
                    scriptOverrides = script.overrides;
                    scriptPath = script.path;
                }
            }

            const ctx = new BuildContext(config, identity, this.runner, workdir, this.log, buildEnv);
            const dispatcher = new PhaseDispatcher({
                overrides: { ...scriptOverrides, ...this.overrides },
                registry: this.registry,
            });

            await this.systemSetup(ctx);

            const banner = `${displayName(identity)} - ${capitalize(identity.builder)}`;
            this.log.info(`Install - Started - ${banner}`);

            const trace: DispatchRecord[] = [];
            try {
                for (const phase of PHASES) {
                    if (phase === 'builder-setup' && !config.installBuilder) continue;
                    if (phase === 'install' && !config.installPackage) continue;
                    trace.push(await dispatcher.dispatch(phase, ctx));
                }
            } finally {
                ctx.state.sourceGuard?.release();
            }

            this.log.info(`Install - Finished - ${banner}`);
            return this.outcome('completed', identity, trace, scriptPath, ctx.state.checkoutDir ?? null, ctx.state.packageFile ?? null);
        } finally {
            clearCorrelation();
        }
    }

    /** Host preparation before any phase: xlocale link and system packages. */
    private async systemSetup(ctx: BuildContext): Promise<void> {
        const { config } = ctx;

        if (config.createXlocaleSymlink && fs.existsSync(LOCALE_HEADER)) {
            await this.setupCommand(ctx, 'ln', ['-sf', LOCALE_HEADER, XLOCALE_HEADER]);
        }

        if (config.sysRequirements) {
            this.log.info("Installing system's package requirements", { packages: config.sysRequirements });
            await this.setupCommand(ctx, 'sh', ['-c', `${config.sysInstallCommand} ${config.sysRequirements}`]);
        }
    }

    private async setupCommand(ctx: BuildContext, command: string, args: string[]): Promise<void> {
        const result = await ctx.run({ command, args });
        if (result.exitCode !== 0) {
            throw ErrorFactory.phaseFailed('system-setup', describeCommand({ command, args }), result.exitCode);
        }
    }

    private outcome(
        status: DriverStatus,
        identity: PackageIdentity,
        trace: DispatchRecord[],
        scriptPath: string | null,
        checkoutDir: string | null,
        packageFile: string | null = null
    ): DriverOutcome {
        return { status, buildId: this.buildId, identity, trace, scriptPath, checkoutDir, packageFile };
    }
}

