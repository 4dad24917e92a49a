import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'node:os';

import { PhaseActions } from '../src/build_context';
import { BuilderRegistry } from '../src/builders';
import { PhaseDispatcher } from '../src/phase_dispatcher';
import { PHASES } from '../src/phases';
import { makeContext } from './helpers/context';

const ENV = { PACKAGE: 'foo', PACKAGE_VERSION: '1.2.3', PKG_BUILDER: 'custom' };

function recordingRegistry(hits: string[]): BuilderRegistry {
    return new BuilderRegistry([{
        kind: 'custom',
        phases: {
            compile: async () => { hits.push('default:compile'); },
            install: async () => { hits.push('default:install'); },
        },
    }]);
}

test('an override wins for every builder and every phase', () => {
    for (const builder of ['pip', 'maven', 'bazel', 'cmake', 'unknown']) {
        for (const phase of PHASES) {
            const overrides: PhaseActions = {};
            overrides[phase] = async () => {};
            const dispatcher = new PhaseDispatcher({ overrides });
            assert.equal(dispatcher.resolve(phase, builder), 'override', `${builder}/${phase}`);
        }
    }
});

test('without an override the builder default runs, otherwise the phase is skipped', () => {
    const dispatcher = new PhaseDispatcher();
    assert.equal(dispatcher.resolve('package', 'pip'), 'default');
    assert.equal(dispatcher.resolve('compile', 'pip'), 'skipped');
    assert.equal(dispatcher.resolve('compile', 'bazel'), 'default');
    assert.equal(dispatcher.resolve('package', 'maven'), 'skipped');
    assert.equal(dispatcher.resolve('install', 'unknown'), 'skipped');
});

test('dispatch runs exactly one action per phase', async () => {
    const hits: string[] = [];
    const dispatcher = new PhaseDispatcher({
        registry: recordingRegistry(hits),
        overrides: { compile: async () => { hits.push('override:compile'); } },
    });
    const { ctx } = makeContext(ENV, os.tmpdir());

    assert.deepEqual(await dispatcher.dispatch('compile', ctx), { phase: 'compile', resolution: 'override' });
    assert.deepEqual(await dispatcher.dispatch('install', ctx), { phase: 'install', resolution: 'default' });
    assert.deepEqual(await dispatcher.dispatch('package', ctx), { phase: 'package', resolution: 'skipped' });
    assert.deepEqual(hits, ['override:compile', 'default:install']);
});

test('an action error propagates out of dispatch', async () => {
    const dispatcher = new PhaseDispatcher({
        overrides: { configure: async () => { throw new Error('configure broke'); } },
    });
    const { ctx } = makeContext(ENV, os.tmpdir());

    await assert.rejects(dispatcher.dispatch('configure', ctx), /configure broke/);
});
