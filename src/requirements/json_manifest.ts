// src/requirements/json_manifest.ts

import * as fs from 'fs';
import { Logger } from '../logger';
import { ErrorFactory } from '../structured_error';
import { QueryError, isJsonObject, streamQuery } from './query';
import { JsonValue, RequirementVariable } from './types';

export function readJsonManifest(file: string): JsonValue {
    let text: string;
    try {
        text = fs.readFileSync(file, 'utf8');
    } catch (err) {
        throw ErrorFactory.manifestInvalid(file, err instanceof Error ? err.message : String(err));
    }

    try {
        const parsed: JsonValue = JSON.parse(text);
        return parsed;
    } catch (err) {
        throw ErrorFactory.manifestInvalid(file, err instanceof Error ? err.message : String(err));
    }
}

/** The record requirements are read from: the value under `project`, or the whole document. */
export function projectRecord(doc: JsonValue, project: string): JsonValue {
    if (project === '') return doc;
    if (isJsonObject(doc) && Object.prototype.hasOwnProperty.call(doc, project)) return doc[project];
    return null;
}

/** Selected requirement records; a query that fails keeps the records produced before the failure. */
export function selectRecords(record: JsonValue, select: string, log?: Logger): JsonValue[] {
    const records: JsonValue[] = [];
    try {
        for (const selected of streamQuery(select, record)) records.push(selected);
    } catch (err) {
        if (!(err instanceof QueryError)) throw err;
        log?.debug('selection query stopped', { query: select, reason: err.message, records: records.length });
    }
    return records;
}

/**
 * Variables for one record, in element order. Missing and null fields are left
 * out; strings are taken as-is and any other value as its JSON text.
 */
export function recordVariables(record: JsonValue, elements: string[], prefix: string): RequirementVariable[] {
    if (!isJsonObject(record)) return [];

    const variables: RequirementVariable[] = [];
    for (const field of elements) {
        if (!Object.prototype.hasOwnProperty.call(record, field)) continue;
        const value = record[field];
        if (value === null) continue;
        variables.push({
            name: `${prefix}${field}`.toUpperCase(),
            value: typeof value === 'string' ? value : JSON.stringify(value),
        });
    }
    return variables;
}

export function variablesToEnv(variables: RequirementVariable[]): Record<string, string> {
    const env: Record<string, string> = {};
    for (const { name, value } of variables) env[name] = value;
    return env;
}
