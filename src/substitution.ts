/**
 * sed-style substitution and shell quoting helpers.
 *
 * Tag mappings and flat-manifest rewrites are configured as an extended regex
 * plus a replacement using `\1`..`\9` and `&`, the notation `sed -E` users
 * already write in their environment files.
 */

const POSIX_CLASSES: Record<string, string> = {
    '[:space:]': '\\s',
    '[:digit:]': '0-9',
    '[:alpha:]': 'A-Za-z',
    '[:alnum:]': 'A-Za-z0-9',
    '[:upper:]': 'A-Z',
    '[:lower:]': 'a-z',
    '[:punct:]': '!-\\/:-@\\[-`{-~',
};

/** Rewrite POSIX bracket classes (`[[:space:]]`) into their JavaScript equivalents. */
export function compileExtendedRegex(regex: string, flags = 'g'): RegExp {
    let source = regex;
    for (const [posix, js] of Object.entries(POSIX_CLASSES)) {
        source = source.split(posix).join(js);
    }
    return new RegExp(source, flags);
}

/** Expand `\N`, `&`, `\&`, `\\` and `\n` of a sed replacement for one match. */
export function expandReplacement(replacement: string, match: RegExpExecArray): string {
    let out = '';
    for (let i = 0; i < replacement.length; i++) {
        const ch = replacement[i];
        if (ch === '\\' && i + 1 < replacement.length) {
            const next = replacement[++i];
            if (next >= '0' && next <= '9') {
                out += match[Number(next)] ?? '';
            } else if (next === 'n') {
                out += '\n';
            } else {
                out += next;
            }
        } else if (ch === '&') {
            out += match[0];
        } else {
            out += ch;
        }
    }
    return out;
}

export interface SubstitutionResult {
    matched: boolean;
    output: string;
}

/**
 * Equivalent of `sed -E "s/<regex>/<replacement>/g"` on a single line.
 * An empty match directly after a previous match is not replaced, as in sed.
 */
export function substitute(input: string, regex: string, replacement: string): SubstitutionResult {
    const re = compileExtendedRegex(regex);
    let output = '';
    let last = 0;
    let prevEnd = -1;
    let matched = false;

    let m: RegExpExecArray | null;
    while ((m = re.exec(input)) !== null) {
        const start = m.index;
        const end = start + m[0].length;
        if (m[0].length === 0) {
            re.lastIndex++;
            if (start === prevEnd) {
                if (re.lastIndex > input.length) break;
                continue;
            }
        }
        matched = true;
        output += input.slice(last, start) + expandReplacement(replacement, m);
        last = end;
        prevEnd = end;
        if (re.lastIndex > input.length) break;
    }

    output += input.slice(last);
    return { matched, output };
}

/** Single-quote a value for `sh -c` command strings. */
export function shellQuote(value: string): string {
    if (/^[A-Za-z0-9_./:=@%+,-]+$/.test(value)) return value;
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Compile a shell glob using `*` and `?` wildcards into an anchored regex. */
export function globToRegExp(pattern: string): RegExp {
    let source = '';
    for (const ch of pattern) {
        if (ch === '*') source += '.*';
        else if (ch === '?') source += '.';
        else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
    return new RegExp(`^${source}$`);
}
