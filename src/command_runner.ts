/**
 * Command Runner - the single port through which external tools are reached.
 *
 * git, pip, mvn, bazel, cmake and the system package manager are all opaque
 * processes from the driver's point of view. Tests substitute an in-process
 * runner that records invocations.
 */

import { spawn } from 'child_process';
import { Env } from './config';
import { createLogger } from './logger';

const log = createLogger('runner');

export interface CommandSpec {
    command: string;
    args: string[];
    cwd: string;
    env?: Record<string, string>;
    /** Pipe stdout/stderr back to the caller instead of inheriting the terminal. */
    capture?: boolean;
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface CommandRunner {
    run(spec: CommandSpec): Promise<CommandResult>;
}

/** Render a command for logs and error messages. */
export function describeCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
    if (spec.command === 'sh' || spec.command === 'bash') {
        const script = spec.args[spec.args.indexOf('-c') + 1];
        if (script !== undefined) return script;
    }
    return [spec.command, ...spec.args].join(' ');
}

/** `sh -c <script>` with optional positional parameters ($1..$n). */
export function shellCommand(script: string, cwd: string, env?: Record<string, string>, positional: string[] = []): CommandSpec {
    const args = ['-c', script];
    if (positional.length > 0) args.push('pkbuild', ...positional);
    return { command: 'sh', args, cwd, env };
}

/** Environment a spawned child starts with: the process environment plus the command's variables. */
export function inheritedEnvironment(env?: Record<string, string>): Env {
    return { ...process.env, ...env };
}

/** Variables a shell changes by itself; never treated as assignments. */
const SHELL_MANAGED = new Set(['_', 'SHLVL', 'PWD', 'OLDPWD']);

/**
 * Parse a NUL-separated `env -0` dump and keep the variables that differ from
 * the environment the shell was started with.
 */
export function parseEnvDump(dump: string, started: Env): Record<string, string> {
    const changed: Record<string, string> = {};
    for (const entry of dump.split('\0')) {
        const eq = entry.indexOf('=');
        if (eq <= 0) continue;
        const name = entry.slice(0, eq);
        const value = entry.slice(eq + 1);
        if (SHELL_MANAGED.has(name) || started[name] === value) continue;
        changed[name] = value;
    }
    return changed;
}

/* -------------------------------------------------------------------------- */
/* Process-backed runner                                                      */
/* -------------------------------------------------------------------------- */

export class SpawnCommandRunner implements CommandRunner {
    async run(spec: CommandSpec): Promise<CommandResult> {
        log.debug('exec', { cmd: describeCommand(spec), cwd: spec.cwd });

        return new Promise<CommandResult>((resolve) => {
            const child = spawn(spec.command, spec.args, {
                cwd: spec.cwd,
                env: inheritedEnvironment(spec.env),
                stdio: spec.capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
            });

            const stdout: Buffer[] = [];
            const stderr: Buffer[] = [];
            child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
            child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

            // A missing executable surfaces like a shell would report it
            child.on('error', (err) => {
                resolve({ exitCode: 127, stdout: '', stderr: err.message });
            });

            child.on('close', (code, signal) => {
                resolve({
                    exitCode: code ?? (signal ? 128 : 1),
                    stdout: Buffer.concat(stdout).toString('utf8'),
                    stderr: Buffer.concat(stderr).toString('utf8'),
                });
            });
        });
    }
}
