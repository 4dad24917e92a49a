// src/requirements/index.ts

export * from './types';
export { compileQuery, evaluateQuery, streamQuery, jsonEqual, QueryError } from './query';
export { readJsonManifest, projectRecord, selectRecords, recordVariables, variablesToEnv } from './json_manifest';
export { parseFlatManifest, readFlatManifest } from './flat_manifest';
export {
    forEachRequirement,
    collectJsonEntries,
    collectFlatEntries,
    parseRequirementsType,
    parseFailurePolicy,
} from './foreach';
export type { ForeachDeps } from './foreach';
