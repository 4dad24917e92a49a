/**
 * Structured errors for the build and foreach drivers.
 *
 * Every fatal condition is raised as a DriverError carrying a machine-readable
 * StructuredError record. The CLI logs the record and exits non-zero.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Input / configuration
    | 'CONFIG_INVALID'
    | 'MANIFEST_INVALID'

    // Source acquisition
    | 'SOURCE_FETCH_FAILED'
    | 'SUBMODULE_SYNC_FAILED'
    | 'CHECKOUT_MISMATCH'

    // Phases
    | 'PATCH_FAILED'
    | 'PHASE_FAILED'
    | 'OVERRIDE_SCRIPT_FAILED'
    | 'PACKAGE_FILE_MISSING'

    // Requirements iteration
    | 'REQUIREMENT_FAILED';

export type Severity = 'FATAL' | 'ERROR';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {}
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): Severity {
    const errorCodes: ErrorCode[] = [
        'REQUIREMENT_FAILED',
        'PACKAGE_FILE_MISSING'
    ];

    if (errorCodes.includes(code)) return 'ERROR';
    return 'FATAL';
}

export class DriverError extends Error {
    readonly detail: StructuredError;

    constructor(detail: StructuredError) {
        super(detail.message);
        this.name = 'DriverError';
        this.detail = detail;
    }

    get code(): ErrorCode {
        return this.detail.code;
    }
}

export function isDriverError(err: unknown): err is DriverError {
    return err instanceof DriverError;
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

function fail(code: ErrorCode, message: string, context: Record<string, unknown> = {}): DriverError {
    return new DriverError(createStructuredError(code, message, context));
}

export class ErrorFactory {
    static configInvalid(option: string, value: string, expected: string): DriverError {
        return fail('CONFIG_INVALID', `Invalid value for ${option}: "${value}" (expected ${expected})`, { option, value });
    }

    static sourceFetchFailed(step: string, repo: string, exitCode: number): DriverError {
        return fail('SOURCE_FETCH_FAILED', `Source fetch failed at "${step}" for ${repo || '<no repository>'} (exit ${exitCode})`, {
            step, repo, exit_code: exitCode
        });
    }

    static submoduleSyncFailed(dir: string, exitCode: number): DriverError {
        return fail('SUBMODULE_SYNC_FAILED', `Submodule sync failed in ${dir} (exit ${exitCode})`, { dir, exit_code: exitCode });
    }

    static checkoutMismatch(expected: string, actual: string): DriverError {
        return fail('CHECKOUT_MISMATCH', `Checkout HEAD ${actual || '<none>'} does not match requested commit ${expected}`, {
            expected, actual
        });
    }

    static patchFailed(patchFile: string, reason: string): DriverError {
        return fail('PATCH_FAILED', `Patch ${patchFile} does not apply: ${reason}`, { patch_file: patchFile, reason });
    }

    static phaseFailed(phase: string, command: string, exitCode: number): DriverError {
        return fail('PHASE_FAILED', `Phase ${phase} failed: "${command}" exited with ${exitCode}`, {
            phase, command, exit_code: exitCode
        });
    }

    static overrideScriptFailed(script: string, step: string, exitCode: number, stderr: string): DriverError {
        return fail('OVERRIDE_SCRIPT_FAILED', `Override script ${script} failed in ${step} (exit ${exitCode})`, {
            script, step, exit_code: exitCode, stderr: stderr.trim()
        });
    }

    static packageFileMissing(outDir: string, pattern: string): DriverError {
        return fail('PACKAGE_FILE_MISSING', `No package file matching ${pattern} in ${outDir}`, { out_dir: outDir, pattern });
    }

    static manifestInvalid(file: string, reason: string): DriverError {
        return fail('MANIFEST_INVALID', `Requirements manifest ${file} is invalid: ${reason}`, { file, reason });
    }

    static requirementFailed(failures: Array<{ entry: number; exitCode: number }>, command: string): DriverError {
        const list = failures.map(f => `#${f.entry} (exit ${f.exitCode})`).join(', ');
        return fail('REQUIREMENT_FAILED', `Executing "${command}" failed for requirement ${list}`, { command, failures });
    }
}
