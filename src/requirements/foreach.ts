/**
 * Requirements Iterator - runs one shell command per manifest entry.
 *
 * Two manifest dialects:
 *   json    records picked by a selection query; their fields become variables
 *   python  lines matched by a regex; the rewritten line becomes $1..$n
 *
 * Every invocation gets only its own entry's variables on top of the inherited
 * environment. Failure policy: `abort` stops at the first failing entry,
 * `continue` runs all entries and fails once at the end.
 */

import { CommandRunner, CommandSpec, SpawnCommandRunner, shellCommand } from '../command_runner';
import { FailurePolicy, ForeachConfig, RequirementsType } from '../config';
import { createLogger, Logger } from '../logger';
import { ErrorFactory } from '../structured_error';
import { compileExtendedRegex } from '../substitution';
import { readFlatManifest } from './flat_manifest';
import { projectRecord, readJsonManifest, recordVariables, selectRecords, variablesToEnv } from './json_manifest';
import { compileQuery, isJsonObject, QueryError } from './query';
import { ForeachReport, RequirementEntry, RequirementFailure } from './types';

export interface ForeachDeps {
    runner?: CommandRunner;
    /** Directory the commands run in. */
    cwd?: string;
    log?: Logger;
}

export function parseRequirementsType(value: string): RequirementsType {
    if (value === 'json' || value === 'python') return value;
    throw ErrorFactory.configInvalid('REQUIREMENTS_TYPE', value, 'json or python');
}

export function parseFailurePolicy(value: string): FailurePolicy {
    if (value === 'abort' || value === 'continue') return value;
    throw ErrorFactory.configInvalid('REQUIREMENTS_ON_ERROR', value, 'abort or continue');
}

/* -------------------------------------------------------------------------- */
/* Entry collection                                                           */
/* -------------------------------------------------------------------------- */

export function collectJsonEntries(config: ForeachConfig, log?: Logger): RequirementEntry[] {
    try {
        compileQuery(config.select);
    } catch (err) {
        if (err instanceof QueryError) throw ErrorFactory.configInvalid('REQUIREMENTS_SELECT', config.select, `a selection query (${err.message})`);
        throw err;
    }

    const doc = readJsonManifest(config.file);
    const record = projectRecord(doc, config.project);
    const records = selectRecords(record, config.select, log);
    if (config.processProject) records.push(record);

    return records
        .filter(isJsonObject)
        .map(r => ({ kind: 'variables' as const, variables: recordVariables(r, config.elements, config.varnamePrefix) }));
}

export function collectFlatEntries(config: ForeachConfig): RequirementEntry[] {
    try {
        compileExtendedRegex(config.regex);
    } catch (err) {
        throw ErrorFactory.configInvalid('REQUIREMENTS_REGEX', config.regex, `an extended regex (${err instanceof Error ? err.message : String(err)})`);
    }

    return readFlatManifest(config.file, config.regex, config.replacement, config.argsDelimiter)
        .map(tokens => ({ kind: 'tokens' as const, tokens }));
}

function entryCommand(entry: RequirementEntry, command: string, cwd: string): CommandSpec {
    return entry.kind === 'variables'
        ? shellCommand(command, cwd, variablesToEnv(entry.variables))
        : shellCommand(command, cwd, undefined, entry.tokens);
}

function describeEntry(entry: RequirementEntry): string {
    return entry.kind === 'variables'
        ? entry.variables.map(v => `${v.name}="${v.value}"`).join(' ')
        : entry.tokens.join(' ');
}

/* -------------------------------------------------------------------------- */
/* Iteration                                                                  */
/* -------------------------------------------------------------------------- */

export async function forEachRequirement(config: ForeachConfig, deps: ForeachDeps = {}): Promise<ForeachReport> {
    const runner = deps.runner ?? new SpawnCommandRunner();
    const cwd = deps.cwd ?? process.cwd();
    const log = deps.log ?? createLogger('foreach');
    const report: ForeachReport = { invocations: 0, failures: [] };

    log.info(`Foreach Requirement - Started - ${config.project} - ${config.file}`);
    if (config.command === '') return report;

    const type = parseRequirementsType(config.type);
    const policy = parseFailurePolicy(config.onError);
    const entries = type === 'json' ? collectJsonEntries(config, log) : collectFlatEntries(config);
    log.debug(`${entries.length} requirement(s)`, { type, file: config.file });

    for (const [i, entry] of entries.entries()) {
        log.info(`${describeEntry(entry)} ${config.command}`.trim());

        report.invocations++;
        const result = await runner.run(entryCommand(entry, config.command, cwd));
        if (result.exitCode === 0) continue;

        const failure: RequirementFailure = { entry: i + 1, exitCode: result.exitCode };
        log.error(`Executing: ${config.command}`, { entry: failure.entry, exit_code: result.exitCode });
        if (policy === 'abort') throw ErrorFactory.requirementFailed([failure], config.command);
        report.failures.push(failure);
    }

    if (report.failures.length > 0) {
        throw ErrorFactory.requirementFailed(report.failures, config.command);
    }

    log.info(`Foreach Requirement - Finished - ${config.project} - ${config.file}`);
    return report;
}
