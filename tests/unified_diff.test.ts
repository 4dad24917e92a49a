import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { applyHunks, applyUnifiedDiff, parseUnifiedDiff, stripComponents } from '../src/unified_diff';

const MODIFY = [
    'diff --git a/hello.txt b/hello.txt',
    '--- a/hello.txt',
    '+++ b/hello.txt',
    '@@ -1,3 +1,3 @@',
    ' a',
    '-b',
    '+B',
    ' c',
    '',
].join('\n');

const CREATE = [
    '--- /dev/null',
    '+++ b/docs/new.txt',
    '@@ -0,0 +1,2 @@',
    '+x',
    '+y',
    '',
].join('\n');

function withTree(files: Record<string, string>, fn: (root: string) => void): void {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'unified-diff-'));
    try {
        for (const [rel, content] of Object.entries(files)) {
            fs.mkdirSync(path.dirname(path.join(root, rel)), { recursive: true });
            fs.writeFileSync(path.join(root, rel), content);
        }
        fn(root);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
}

test('parses file sections and hunks', () => {
    const [patch] = parseUnifiedDiff(MODIFY);
    assert.equal(patch.oldPath, 'a/hello.txt');
    assert.equal(patch.newPath, 'b/hello.txt');
    assert.equal(patch.hunks.length, 1);
    assert.deepEqual(patch.hunks[0].lines, [' a', '-b', '+B', ' c']);

    const [created] = parseUnifiedDiff(CREATE);
    assert.equal(created.oldPath, null);
    assert.equal(created.newPath, 'b/docs/new.txt');
});

test('a hunk shorter than its header is rejected', () => {
    const truncated = ['--- a/x', '+++ b/x', '@@ -1,3 +1,3 @@', ' a', '-b', ''].join('\n');
    assert.throws(() => parseUnifiedDiff(truncated), /Truncated hunk/);
});

test('strips leading path components like patch -p', () => {
    assert.equal(stripComponents('a/src/x.c', 1), 'src/x.c');
    assert.equal(stripComponents('a/src/x.c', 0), 'a/src/x.c');
    assert.equal(stripComponents('x.c', 3), 'x.c');
});

test('hunks report the first mismatching line', () => {
    const [patch] = parseUnifiedDiff(MODIFY);
    const outcome = applyHunks(['a', 'z', 'c'], patch.hunks);
    assert.deepEqual(outcome, { ok: false, error: 'Delete mismatch at line 2. expected="b" actual="z"' });
});

test('a hunk is found at an offset from its header line', () => {
    const [patch] = parseUnifiedDiff(MODIFY);
    const outcome = applyHunks(['# one', '# two', 'a', 'b', 'c'], patch.hunks);
    assert.deepEqual(outcome, { ok: true, lines: ['# one', '# two', 'a', 'B', 'c'] });
});

test('the offset of one hunk carries over to the next', () => {
    const diff = ['--- a/x', '+++ b/x', '@@ -1,2 +1,2 @@', '-a', '+A', ' b', '@@ -5,2 +5,2 @@', ' e', '-f', '+F', ''].join('\n');
    const [patch] = parseUnifiedDiff(diff);
    const outcome = applyHunks(['x', 'x', 'a', 'b', 'c', 'd', 'e', 'f'], patch.hunks);
    assert.deepEqual(outcome, { ok: true, lines: ['x', 'x', 'A', 'b', 'c', 'd', 'e', 'F'] });
});

test('shifted files are patched on disk', () => {
    withTree({ 'hello.txt': '#!/bin/sh\n# header\na\nb\nc\n' }, (root) => {
        const result = applyUnifiedDiff({ rootDir: root, diffUtf8: MODIFY });

        assert.deepEqual(result, { ok: true, files: ['hello.txt'] });
        assert.equal(fs.readFileSync(path.join(root, 'hello.txt'), 'utf8'), '#!/bin/sh\n# header\na\nB\nc\n');
    });
});

test('modifies and creates files below the root', () => {
    withTree({ 'hello.txt': 'a\nb\nc\n' }, (root) => {
        const result = applyUnifiedDiff({ rootDir: root, diffUtf8: MODIFY + CREATE });

        assert.deepEqual(result, { ok: true, files: ['hello.txt', 'docs/new.txt'] });
        assert.equal(fs.readFileSync(path.join(root, 'hello.txt'), 'utf8'), 'a\nB\nc\n');
        assert.equal(fs.readFileSync(path.join(root, 'docs/new.txt'), 'utf8'), 'x\ny\n');
    });
});

test('a reverse dry run succeeds only on a patched tree', () => {
    withTree({ 'hello.txt': 'a\nb\nc\n' }, (root) => {
        assert.equal(applyUnifiedDiff({ rootDir: root, diffUtf8: MODIFY, reverse: true, dryRun: true }).ok, false);
        applyUnifiedDiff({ rootDir: root, diffUtf8: MODIFY });
        assert.equal(applyUnifiedDiff({ rootDir: root, diffUtf8: MODIFY, reverse: true, dryRun: true }).ok, true);
        assert.equal(fs.readFileSync(path.join(root, 'hello.txt'), 'utf8'), 'a\nB\nc\n');
    });
});

test('nothing is written when any file fails', () => {
    withTree({ 'hello.txt': 'a\nz\nc\n' }, (root) => {
        const result = applyUnifiedDiff({ rootDir: root, diffUtf8: CREATE + MODIFY });

        assert.equal(result.ok, false);
        assert.equal(result.error, 'hello.txt: Delete mismatch at line 2. expected="b" actual="z"');
        assert.equal(fs.existsSync(path.join(root, 'docs/new.txt')), false);
    });
});

test('paths outside the root are refused', () => {
    withTree({}, (root) => {
        const escape = ['--- /dev/null', '+++ b/../../evil.txt', '@@ -0,0 +1 @@', '+x', ''].join('\n');
        const result = applyUnifiedDiff({ rootDir: root, diffUtf8: escape });
        assert.deepEqual(result, { ok: false, error: 'Path escapes source directory: b/../../evil.txt', files: [] });
    });
});
