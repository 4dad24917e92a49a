/**
 * Override Script - project-local phase overrides (PKBUILD).
 *
 * The script is a bash file. It is probed once at startup: the variables it
 * assigns are merged into the configuration and every function named after a
 * phase becomes an override that runs the function in a fresh bash with the
 * build environment. Variables a function exports carry over to later phases.
 * Nothing is sourced into this process.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PhaseAction, PhaseActions } from './build_context';
import { CommandRunner, inheritedEnvironment, parseEnvDump } from './command_runner';
import { Env } from './config';
import { PHASES, PHASE_INFO, Phase } from './phases';
import { ErrorFactory } from './structured_error';
import { shellQuote } from './substitution';

export const ENV_MARKER = '__PKBUILD_ENV__';

export interface OverrideScript {
    path: string;
    functions: string[];
    /** Variables the script assigns at top level. */
    variables: Record<string, string>;
    overrides: PhaseActions;
}

export interface ScriptProbe {
    functions: string[];
    variables: Record<string, string>;
}

export function probeCommand(scriptPath: string): string {
    return `set -a; . ${shellQuote(scriptPath)}; set +a; declare -F; printf '%s\\n' ${ENV_MARKER}; env -0`;
}

/**
 * Parse `declare -F` lines followed by the marker and a NUL-separated `env -0`
 * dump. Variables equal to the environment the probe ran with are dropped.
 */
export function parseProbeOutput(stdout: string, probeEnv: Env): ScriptProbe {
    const markerAt = stdout.indexOf(`${ENV_MARKER}\n`);
    const head = markerAt === -1 ? stdout : stdout.slice(0, markerAt);
    const tail = markerAt === -1 ? '' : stdout.slice(markerAt + ENV_MARKER.length + 1);

    const functions: string[] = [];
    for (const line of head.split('\n')) {
        const m = line.match(/^declare -f\S* (\S+)$/);
        if (m) functions.push(m[1]);
    }

    return { functions, variables: parseEnvDump(tail, probeEnv) };
}

/** Pick the function that overrides each phase (first listed name wins). */
export function phaseFunctions(functions: string[]): Partial<Record<Phase, string>> {
    const defined = new Set(functions);
    const result: Partial<Record<Phase, string>> = {};
    for (const phase of PHASES) {
        const fn = PHASE_INFO[phase].functions.find(name => defined.has(name));
        if (fn) result[phase] = fn;
    }
    return result;
}

export function scriptPhaseAction(scriptPath: string, phase: Phase, fn: string): PhaseAction {
    const source = `set -e; . ${shellQuote(scriptPath)}`;

    if (phase === 'package-filename') {
        // the function reports the package file through PKG_FILE
        return async (ctx) => {
            const script = `${source}; ${fn} >&2; printf '%s' "\${PKG_FILE:-}"`;
            const result = await ctx.run({ command: 'bash', args: ['-c', script], capture: true });
            if (result.exitCode !== 0) {
                throw ErrorFactory.overrideScriptFailed(scriptPath, fn, result.exitCode, result.stderr);
            }
            const file = result.stdout.trim();
            ctx.state.packageFile = file === '' ? undefined : file;
        };
    }

    return async (ctx) => {
        const result = await ctx.bashExporting(`${source}; ${fn}`);
        if (result.exitCode !== 0) {
            throw ErrorFactory.overrideScriptFailed(scriptPath, fn, result.exitCode, result.stderr);
        }
    };
}

export async function loadOverrideScript(params: {
    runDir: string;
    scriptName: string;
    runner: CommandRunner;
    /** Environment the script is probed with (package variables). */
    env: Record<string, string>;
}): Promise<OverrideScript | null> {
    const { runDir, scriptName, runner, env } = params;
    const scriptPath = path.resolve(runDir, scriptName);
    if (!fs.existsSync(scriptPath)) return null;

    const result = await runner.run({
        command: 'bash',
        args: ['-c', probeCommand(scriptPath)],
        cwd: runDir,
        env,
        capture: true,
    });
    if (result.exitCode !== 0) {
        throw ErrorFactory.overrideScriptFailed(scriptPath, 'load', result.exitCode, result.stderr);
    }

    // the environment the probe shell started with
    const probe = parseProbeOutput(result.stdout, inheritedEnvironment(env));
    const fns = phaseFunctions(probe.functions);
    const overrides: PhaseActions = {};
    for (const phase of PHASES) {
        const fn = fns[phase];
        if (fn) overrides[phase] = scriptPhaseAction(scriptPath, phase, fn);
    }

    return { path: scriptPath, functions: probe.functions, variables: probe.variables, overrides };
}
