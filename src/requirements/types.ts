// src/requirements/types.ts

/** One variable handed to the per-requirement command. */
export interface RequirementVariable {
    name: string;
    value: string;
}

/** A manifest entry as the command sees it: variables (json) or positional tokens (flat). */
export type RequirementEntry =
    | { kind: 'variables'; variables: RequirementVariable[] }
    | { kind: 'tokens'; tokens: string[] };

export interface RequirementFailure {
    /** 1-based position of the entry in iteration order. */
    entry: number;
    exitCode: number;
}

export interface ForeachReport {
    invocations: number;
    failures: RequirementFailure[];
}

export type JsonValue =
    | null
    | boolean
    | number
    | string
    | JsonValue[]
    | { [key: string]: JsonValue };
