/**
 * Selection queries over JSON manifests.
 *
 * Supported subset of the jq language:
 *   .            identity
 *   .key ."key"  object field (null on a missing field or a null input)
 *   [] .[]       iterate array elements or object values
 *   [n]          array index, negative counts from the end
 *   a | b        pipe
 *   select(p)             keep the input when p is neither null nor false
 *   select(p == literal)  keep the input when p equals literal (also !=)
 *
 * Indexing or iterating a value of the wrong type raises QueryError.
 */

import { JsonValue } from './types';

export class QueryError extends Error {
    constructor(message: string, readonly query: string) {
        super(message);
        this.name = 'QueryError';
    }
}

type Step =
    | { op: 'field'; key: string }
    | { op: 'iterate' }
    | { op: 'index'; index: number };

type Comparison = { op: '==' | '!='; value: JsonValue };

type Stage =
    | { kind: 'path'; steps: Step[] }
    | { kind: 'select'; steps: Step[]; comparison?: Comparison };

export interface CompiledQuery {
    source: string;
    stages: Stage[];
}

/* -------------------------------------------------------------------------- */
/* Parser                                                                     */
/* -------------------------------------------------------------------------- */

class QueryParser {
    private pos = 0;

    constructor(private readonly src: string) {}

    parse(): Stage[] {
        const stages = [this.stage()];
        this.skipSpace();
        while (this.peek() === '|') {
            this.pos++;
            stages.push(this.stage());
            this.skipSpace();
        }
        if (this.pos < this.src.length) {
            this.fail(`unexpected "${this.src[this.pos]}"`);
        }
        return stages;
    }

    private stage(): Stage {
        this.skipSpace();
        if (this.src.startsWith('select', this.pos)) {
            this.pos += 'select'.length;
            this.expect('(');
            const steps = this.path();
            this.skipSpace();
            let comparison: Comparison | undefined;
            const op = this.src.slice(this.pos, this.pos + 2);
            if (op === '==' || op === '!=') {
                this.pos += 2;
                comparison = { op, value: this.literal() };
            }
            this.expect(')');
            return { kind: 'select', steps, comparison };
        }
        return { kind: 'path', steps: this.path() };
    }

    private path(): Step[] {
        this.skipSpace();
        const steps: Step[] = [];
        if (this.peek() !== '.' && this.peek() !== '[') this.fail('expected a path');

        while (this.pos < this.src.length) {
            const ch = this.peek();
            if (ch === '.') {
                this.pos++;
                const next = this.peek();
                if (next === '"') {
                    steps.push({ op: 'field', key: this.string() });
                } else if (/[A-Za-z_]/.test(next)) {
                    const m = /^[A-Za-z_][A-Za-z0-9_]*/.exec(this.src.slice(this.pos));
                    const key = m ? m[0] : '';
                    this.pos += key.length;
                    steps.push({ op: 'field', key });
                }
                // a lone "." is the identity and adds no step
            } else if (ch === '[') {
                this.pos++;
                this.skipSpace();
                if (this.peek() === ']') {
                    this.pos++;
                    steps.push({ op: 'iterate' });
                } else {
                    const m = /^-?\d+/.exec(this.src.slice(this.pos));
                    if (!m) this.fail('expected an index');
                    else {
                        this.pos += m[0].length;
                        steps.push({ op: 'index', index: Number(m[0]) });
                    }
                    this.expect(']');
                }
            } else {
                break;
            }
        }
        return steps;
    }

    private literal(): JsonValue {
        this.skipSpace();
        if (this.peek() === '"') return this.string();
        const rest = this.src.slice(this.pos);
        const m = /^(null|true|false|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)/.exec(rest);
        if (!m) return this.fail('expected a literal');
        this.pos += m[0].length;
        if (m[0] === 'null') return null;
        if (m[0] === 'true') return true;
        if (m[0] === 'false') return false;
        return Number(m[0]);
    }

    private string(): string {
        const start = this.pos;
        this.pos++;
        while (this.pos < this.src.length && this.src[this.pos] !== '"') {
            if (this.src[this.pos] === '\\') this.pos++;
            this.pos++;
        }
        if (this.pos >= this.src.length) this.fail('unterminated string');
        this.pos++;
        const parsed: unknown = JSON.parse(this.src.slice(start, this.pos));
        return typeof parsed === 'string' ? parsed : this.fail('invalid string');
    }

    private expect(ch: string): void {
        this.skipSpace();
        if (this.peek() !== ch) this.fail(`expected "${ch}"`);
        this.pos++;
    }

    private peek(): string {
        return this.src[this.pos] ?? '';
    }

    private skipSpace(): void {
        while (/\s/.test(this.peek())) this.pos++;
    }

    private fail(reason: string): never {
        throw new QueryError(`${reason} at offset ${this.pos}`, this.src);
    }
}

export function compileQuery(source: string): CompiledQuery {
    return { source, stages: new QueryParser(source).parse() };
}

/* -------------------------------------------------------------------------- */
/* Evaluation                                                                 */
/* -------------------------------------------------------------------------- */

export function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeName(value: JsonValue): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

export function jsonEqual(a: JsonValue, b: JsonValue): boolean {
    if (a === b) return true;
    if (Array.isArray(a) && Array.isArray(b)) {
        return a.length === b.length && a.every((item, i) => jsonEqual(item, b[i]));
    }
    if (isJsonObject(a) && isJsonObject(b)) {
        const keys = Object.keys(a);
        if (keys.length !== Object.keys(b).length) return false;
        return keys.every(key => Object.prototype.hasOwnProperty.call(b, key) && jsonEqual(a[key], b[key]));
    }
    return false;
}

function applyStep(value: JsonValue, step: Step, query: string): JsonValue[] {
    switch (step.op) {
        case 'field':
            if (value === null) return [null];
            if (isJsonObject(value)) {
                return [Object.prototype.hasOwnProperty.call(value, step.key) ? value[step.key] : null];
            }
            throw new QueryError(`Cannot index ${typeName(value)} with "${step.key}"`, query);
        case 'iterate':
            if (Array.isArray(value)) return value;
            if (isJsonObject(value)) return Object.values(value);
            throw new QueryError(`Cannot iterate over ${typeName(value)}`, query);
        case 'index': {
            if (value === null) return [null];
            if (!Array.isArray(value)) {
                throw new QueryError(`Cannot index ${typeName(value)} with number`, query);
            }
            const at = step.index < 0 ? value.length + step.index : step.index;
            return [value[at] ?? null];
        }
    }
}

function* applyPath(value: JsonValue, steps: Step[], query: string, from: number = 0): Generator<JsonValue> {
    if (from === steps.length) {
        yield value;
        return;
    }
    for (const out of applyStep(value, steps[from], query)) {
        yield* applyPath(out, steps, query, from + 1);
    }
}

function keeps(out: JsonValue, comparison: Comparison | undefined): boolean {
    if (!comparison) return out !== null && out !== false;
    const equal = jsonEqual(out, comparison.value);
    return comparison.op === '==' ? equal : !equal;
}

function* runStages(value: JsonValue, compiled: CompiledQuery, from: number): Generator<JsonValue> {
    if (from === compiled.stages.length) {
        yield value;
        return;
    }
    const stage = compiled.stages[from];
    for (const out of applyPath(value, stage.steps, compiled.source)) {
        if (stage.kind === 'path') {
            yield* runStages(out, compiled, from + 1);
        } else if (keeps(out, stage.comparison)) {
            yield* runStages(value, compiled, from + 1);
        }
    }
}

/**
 * Run a query lazily. Outputs come depth first, so a QueryError raised
 * partway through arrives after every output that precedes it.
 */
export function streamQuery(query: string | CompiledQuery, input: JsonValue): Generator<JsonValue> {
    const compiled = typeof query === 'string' ? compileQuery(query) : query;
    return runStages(input, compiled, 0);
}

/** Run a query against a document and return its output stream. */
export function evaluateQuery(query: string | CompiledQuery, input: JsonValue): JsonValue[] {
    return [...streamQuery(query, input)];
}
