#!/usr/bin/env node
/**
 * CLI Entry Point for pkbuild
 *
 * All options come from the environment; the command only picks the tool.
 */

import { loadForeachConfig } from './config';
import { createLogger } from './logger';
import { PackageDriver } from './package_driver';
import { forEachRequirement } from './requirements';
import { isDriverError } from './structured_error';

const log = createLogger('cli');

class PkbuildCLI {
    async run(args: string[]): Promise<number> {
        const command = args[2] || 'help';

        try {
            switch (command) {
                case 'install':
                    await this.runInstall();
                    return 0;
                case 'foreach':
                    await this.runForeach();
                    return 0;
                case 'help':
                    this.showHelp();
                    return 0;
                default:
                    console.error(`Error: Unknown command: ${command}`);
                    this.showHelp();
                    return 1;
            }
        } catch (err) {
            if (isDriverError(err)) {
                log.error(err.message, { code: err.code, severity: err.detail.severity, ...err.detail.context });
                return 1;
            }
            throw err;
        }
    }

    private async runInstall(): Promise<void> {
        const outcome = await new PackageDriver().run();
        if (outcome.status === 'skipped') {
            log.info('Nothing to install (PACKAGE, PACKAGE_VERSION or PKG_BUILDER unset)');
        }
    }

    private async runForeach(): Promise<void> {
        const report = await forEachRequirement(loadForeachConfig());
        log.debug('foreach done', { invocations: report.invocations });
    }

    private showHelp(): void {
        console.log(`
pkbuild - build and install packages from source

USAGE:
  pkbuild <command>

COMMANDS:
  install     Build and install the package described by the environment
  foreach     Run REQUIREMENTS_FOREACH once per entry of REQUIREMENTS_FILE
  help        Show this help

EXAMPLES:
  PACKAGE=foo PACKAGE_VERSION=1.2.3 PKG_BUILDER=pip PROJECT_REPO=https://example.com/foo.git pkbuild install
  REQUIREMENTS_FOREACH='pkbuild install' REQUIREMENTS_PROJECT=app pkbuild foreach
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new PkbuildCLI();
    cli.run(process.argv).then(
        (code) => { process.exitCode = code; },
        (err: unknown) => {
            console.error('Fatal error:', err);
            process.exit(1);
        }
    );
}

export { PkbuildCLI };
