// src/unified_diff.ts

import * as fs from "fs";
import * as path from "path";

export interface Hunk {
    header: string;
    oldStart: number;
    oldCount: number;
    newStart: number;
    newCount: number;
    lines: string[];
}

export interface FilePatch {
    /** Path on the old side, `null` for `/dev/null` (file creation). */
    oldPath: string | null;
    /** Path on the new side, `null` for `/dev/null` (file deletion). */
    newPath: string | null;
    hunks: Hunk[];
}

export interface PatchApplyResult {
    ok: boolean;
    error?: string;
    /** Files written (or that would be written in dry-run mode), relative to the root. */
    files: string[];
}

export interface ApplyOptions {
    rootDir: string;
    diffUtf8: string;
    /** Leading path components to strip, like `patch -pN`. */
    strip?: number;
    reverse?: boolean;
    dryRun?: boolean;
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

function headerPath(line: string): string | null {
    // "--- a/src/x.c\t2024-01-01 00:00:00" → "a/src/x.c"
    const raw = line.slice(4).split("\t")[0].trim();
    return raw === "/dev/null" ? null : raw;
}

/* -------------------------------------------------------------------------- */
/* Parsing                                                                    */
/* -------------------------------------------------------------------------- */

// Strict unified diff reader:
// - file sections start at ---/+++ pairs; git/index headers are skipped
// - hunk bodies are consumed by their declared line counts
export function parseUnifiedDiff(diffUtf8: string): FilePatch[] {
    const lines = diffUtf8.split("\n");
    const patches: FilePatch[] = [];
    let current: FilePatch | null = null;
    let i = 0;

    while (i < lines.length) {
        const line = lines[i];

        if (line.startsWith("--- ") && i + 1 < lines.length && lines[i + 1].startsWith("+++ ")) {
            current = { oldPath: headerPath(line), newPath: headerPath(lines[i + 1]), hunks: [] };
            patches.push(current);
            i += 2;
            continue;
        }

        const m = line.match(HUNK_HEADER);
        if (m && current) {
            const hunk: Hunk = {
                header: line,
                oldStart: parseInt(m[1], 10),
                oldCount: m[2] === undefined ? 1 : parseInt(m[2], 10),
                newStart: parseInt(m[3], 10),
                newCount: m[4] === undefined ? 1 : parseInt(m[4], 10),
                lines: [],
            };
            let oldLeft = hunk.oldCount;
            let newLeft = hunk.newCount;
            i++;
            while (i < lines.length && (oldLeft > 0 || newLeft > 0)) {
                const dl = lines[i];
                if (dl.startsWith("\\")) {
                    i++;
                    continue;
                }
                // editors sometimes strip the single space of an empty context line
                const body = dl === "" ? " " : dl;
                const kind = body[0];
                if (kind === " ") { oldLeft--; newLeft--; }
                else if (kind === "-") { oldLeft--; }
                else if (kind === "+") { newLeft--; }
                else break;
                hunk.lines.push(body);
                i++;
            }
            if (oldLeft !== 0 || newLeft !== 0) {
                throw new Error(`Truncated hunk: ${line}`);
            }
            // trailing "\ No newline at end of file" marker
            if (i < lines.length && lines[i].startsWith("\\")) i++;
            current.hunks.push(hunk);
            continue;
        }

        i++;
    }

    return patches;
}

export function reverseFilePatch(patch: FilePatch): FilePatch {
    return {
        oldPath: patch.newPath,
        newPath: patch.oldPath,
        hunks: patch.hunks.map(h => ({
            header: `@@ -${h.newStart},${h.newCount} +${h.oldStart},${h.oldCount} @@`,
            oldStart: h.newStart,
            oldCount: h.newCount,
            newStart: h.oldStart,
            newCount: h.oldCount,
            lines: h.lines.map(l => l.startsWith("+") ? "-" + l.slice(1) : l.startsWith("-") ? "+" + l.slice(1) : l),
        })),
    };
}

export function stripComponents(p: string, strip: number): string {
    const parts = p.split("/").filter(part => part !== "");
    return parts.slice(Math.min(strip, parts.length - 1)).join("/");
}

/* -------------------------------------------------------------------------- */
/* Applying                                                                   */
/* -------------------------------------------------------------------------- */

type HunkOutcome = { ok: true; lines: string[] } | { ok: false; error: string };

function matchesAt(lines: string[], expected: string[], at: number): boolean {
    if (at < 0 || at + expected.length > lines.length) return false;
    return expected.every((text, i) => lines[at + i] === text);
}

/**
 * Nearest position at or after `floor` where `expected` matches exactly,
 * trying `preferred` first and then moving outward one line at a time.
 */
function locateHunk(lines: string[], expected: string[], preferred: number, floor: number): number | null {
    const reach = Math.max(preferred - floor, lines.length - preferred);
    for (let delta = 0; delta <= reach; delta++) {
        if (preferred + delta >= floor && matchesAt(lines, expected, preferred + delta)) return preferred + delta;
        if (delta > 0 && preferred - delta >= floor && matchesAt(lines, expected, preferred - delta)) return preferred - delta;
    }
    return null;
}

function describeMismatch(lines: string[], hunk: Hunk, at: number): string {
    if (at < 0 || at > lines.length) return `Hunk out of range: ${hunk.header}`;
    let cursor = at;
    for (const dl of hunk.lines) {
        if (dl.startsWith("+")) continue;
        const text = dl.slice(1);
        if (lines[cursor] !== text) {
            const what = dl.startsWith(" ") ? "Context" : "Delete";
            return `${what} mismatch at line ${cursor + 1}. expected="${text}" actual="${lines[cursor] ?? ""}"`;
        }
        cursor++;
    }
    return `Hunk does not apply: ${hunk.header}`;
}

// Context must match exactly (no fuzz), but a hunk may sit at an offset from
// its header line the way `patch` allows. Hunks apply in order: a hunk is
// never placed before the end of the previous one.
export function applyHunks(original: string[], hunks: Hunk[]): HunkOutcome {
    let working = original.slice();
    let offset = 0;
    let floor = 0;

    for (const hunk of hunks) {
        const oldLines = hunk.lines.filter(dl => !dl.startsWith("+")).map(dl => dl.slice(1));
        const newLines = hunk.lines.filter(dl => !dl.startsWith("-")).map(dl => dl.slice(1));

        // a zero-length old range names the line *after which* to insert
        const preferred = (hunk.oldCount === 0 ? hunk.oldStart : hunk.oldStart - 1) + offset;
        const at = locateHunk(working, oldLines, preferred, floor);
        if (at === null) return { ok: false, error: describeMismatch(working, hunk, preferred) };

        working = [...working.slice(0, at), ...newLines, ...working.slice(at + oldLines.length)];
        offset += (at - preferred) + (newLines.length - oldLines.length);
        floor = at + newLines.length;
    }

    return { ok: true, lines: working };
}

function resolveInside(rootDir: string, rel: string): string | null {
    const root = path.resolve(rootDir);
    const target = path.resolve(root, rel);
    if (target !== root && !target.startsWith(root + path.sep)) return null;
    return target;
}

/**
 * Apply a (possibly multi-file) unified diff below `rootDir`.
 * Every file is computed in memory first; nothing is written unless all
 * hunks of all files apply.
 */
export function applyUnifiedDiff(options: ApplyOptions): PatchApplyResult {
    const { rootDir, diffUtf8, strip = 1, reverse = false, dryRun = false } = options;

    let patches: FilePatch[];
    try {
        patches = parseUnifiedDiff(diffUtf8);
    } catch (e) {
        return { ok: false, error: e instanceof Error ? e.message : String(e), files: [] };
    }
    if (patches.length === 0) {
        return { ok: false, error: "No file sections found in diff", files: [] };
    }

    // rel path → new content (null = delete)
    const pending = new Map<string, string | null>();
    const read = (rel: string, abs: string): string | null => {
        if (pending.has(rel)) return pending.get(rel) ?? null;
        return fs.existsSync(abs) ? fs.readFileSync(abs, "utf8") : null;
    };

    for (const raw of patches) {
        const patch = reverse ? reverseFilePatch(raw) : raw;
        const side = patch.newPath ?? patch.oldPath;
        if (side === null) return { ok: false, error: "Diff section without a file name", files: [] };

        const rel = stripComponents(side, strip);
        const abs = resolveInside(rootDir, rel);
        if (!abs) return { ok: false, error: `Path escapes source directory: ${side}`, files: [] };

        const existing = read(rel, abs);
        if (patch.oldPath === null && existing !== null) {
            return { ok: false, error: `File to create already exists: ${rel}`, files: [] };
        }
        if (patch.oldPath !== null && existing === null) {
            return { ok: false, error: `Target does not exist: ${rel}`, files: [] };
        }

        const outcome = applyHunks((existing ?? "").split("\n"), patch.hunks);
        if (!outcome.ok) return { ok: false, error: `${rel}: ${outcome.error}`, files: [] };

        const content = outcome.lines.join("\n");
        if (patch.newPath === null) {
            if (content !== "") {
                return { ok: false, error: `${rel}: file to delete has content left after the hunks`, files: [] };
            }
            pending.set(rel, null);
        } else {
            pending.set(rel, content);
        }
    }

    const files = [...pending.keys()];
    if (dryRun) return { ok: true, files };

    for (const [rel, content] of pending) {
        const abs = path.resolve(rootDir, rel);
        if (content === null) {
            fs.rmSync(abs, { force: true });
        } else {
            fs.mkdirSync(path.dirname(abs), { recursive: true });
            fs.writeFileSync(abs, content, "utf8");
        }
    }

    return { ok: true, files };
}
