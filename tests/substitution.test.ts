import test from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_REPOTAG_REGEX, DEFAULT_REQUIREMENTS_REGEX } from '../src/config';
import { globToRegExp, shellQuote, substitute } from '../src/substitution';

test('default repotag mapping turns name:version into vversion', () => {
    assert.deepEqual(substitute('foo:1.2.3', DEFAULT_REPOTAG_REGEX, 'v\\1'), { matched: true, output: 'v1.2.3' });
});

test('non-matching input is returned unchanged', () => {
    assert.deepEqual(substitute('foo', DEFAULT_REPOTAG_REGEX, 'v\\1'), { matched: false, output: 'foo' });
});

test('an empty match right after a match is not replaced', () => {
    assert.equal(substitute('abc', '(.*)', 'v\\1').output, 'vabc');
});

test('replacement supports & and global matching', () => {
    assert.equal(substitute('a-b', '-', '[&]').output, 'a[-]b');
    assert.equal(substitute('a.b.c', '\\.', '_').output, 'a_b_c');
    assert.equal(substitute('a.b', '\\.', '\\&').output, 'a&b');
});

test('POSIX bracket classes are understood', () => {
    assert.equal(substitute('  x', '^[[:space:]]+', '').output, 'x');
    assert.equal(substitute('v12', '[[:digit:]]+', 'N').output, 'vN');
});

test('default requirements regex keeps name and pinned version', () => {
    const line = 'requests == 2.31.0 ; python_version > "3"';
    assert.deepEqual(substitute(line, DEFAULT_REQUIREMENTS_REGEX, '\\1|\\2'), { matched: true, output: 'requests|2.31.0' });
    assert.equal(substitute('flask>=2.0', DEFAULT_REQUIREMENTS_REGEX, '\\1|\\2').matched, false);
    assert.equal(substitute('# comment', DEFAULT_REQUIREMENTS_REGEX, '\\1|\\2').matched, false);
});

test('shell quoting leaves plain words alone', () => {
    assert.equal(shellQuote('/tmp/pkg/foo-1.2.3.whl'), '/tmp/pkg/foo-1.2.3.whl');
    assert.equal(shellQuote('a b'), "'a b'");
    assert.equal(shellQuote("it's"), "'it'\\''s'");
});

test('glob patterns match whole file names', () => {
    const re = globToRegExp('foo_bar-1.2.3*.whl');
    assert.equal(re.test('foo_bar-1.2.3-py3-none-any.whl'), true);
    assert.equal(re.test('foo_bar-1.2.3.tar.gz'), false);
    assert.equal(re.test('xfoo_bar-1.2.3-py3-none-any.whl'), false);
    assert.equal(globToRegExp('a?c').test('abc'), true);
});
