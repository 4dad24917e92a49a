import test from 'node:test';
import assert from 'node:assert/strict';

import { DriverError, ErrorFactory, createStructuredError, isDriverError } from '../src/structured_error';

test('severity separates per-entry errors from fatal ones', () => {
    assert.equal(createStructuredError('REQUIREMENT_FAILED', 'x').severity, 'ERROR');
    assert.equal(createStructuredError('PACKAGE_FILE_MISSING', 'x').severity, 'ERROR');
    assert.equal(createStructuredError('PATCH_FAILED', 'x').severity, 'FATAL');
    assert.equal(createStructuredError('CONFIG_INVALID', 'x').severity, 'FATAL');
});

test('factory errors carry code, message and context', () => {
    const err = ErrorFactory.configInvalid('PROJECT_REPOTAG_TYPE', 'sha', 'tag, branch or commit');

    assert.ok(isDriverError(err));
    assert.equal(err.name, 'DriverError');
    assert.equal(err.code, 'CONFIG_INVALID');
    assert.equal(err.message, 'Invalid value for PROJECT_REPOTAG_TYPE: "sha" (expected tag, branch or commit)');
    assert.deepEqual(err.detail.context, { option: 'PROJECT_REPOTAG_TYPE', value: 'sha' });
    assert.match(err.detail.timestamp, /^\d{4}-\d{2}-\d{2}T/);
});

test('requirement failures list every failed entry', () => {
    const err = ErrorFactory.requirementFailed([{ entry: 1, exitCode: 2 }, { entry: 3, exitCode: 1 }], 'pkbuild install');
    assert.equal(err.message, 'Executing "pkbuild install" failed for requirement #1 (exit 2), #3 (exit 1)');
});

test('plain errors are not driver errors', () => {
    assert.equal(isDriverError(new Error('x')), false);
    assert.ok(ErrorFactory.phaseFailed('compile', 'make', 2) instanceof DriverError);
});
