// src/requirements/flat_manifest.ts

import * as fs from 'fs';
import { ErrorFactory } from '../structured_error';
import { substitute } from '../substitution';

/**
 * Token lists for a line-oriented manifest. Lines the regex does not match are
 * dropped; matching lines are rewritten with the replacement and split on the
 * delimiter.
 */
export function parseFlatManifest(text: string, regex: string, replacement: string, delimiter: string): string[][] {
    const entries: string[][] = [];
    for (const line of text.split(/\r?\n/)) {
        const { matched, output } = substitute(line, regex, replacement);
        if (!matched || output === '') continue;
        entries.push(delimiter === '' ? [output] : output.split(delimiter));
    }
    return entries;
}

export function readFlatManifest(file: string, regex: string, replacement: string, delimiter: string): string[][] {
    let text: string;
    try {
        text = fs.readFileSync(file, 'utf8');
    } catch (err) {
        throw ErrorFactory.manifestInvalid(file, err instanceof Error ? err.message : String(err));
    }
    return parseFlatManifest(text, regex, replacement, delimiter);
}
