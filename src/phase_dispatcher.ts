/**
 * Phase Dispatcher - resolves and runs exactly one action per phase.
 *
 * Precedence:
 *   1. project override for the phase
 *   2. the active builder's default action for the phase
 *   3. nothing (phase skipped)
 *
 * Errors thrown by an action are not caught here; they abort the run.
 */

import { BuildContext, PhaseActions } from './build_context';
import { BuilderRegistry } from './builders';
import { Phase, PHASE_INFO, phaseLabel } from './phases';
import { displayName } from './package_identity';
import { setCorrelation } from './logger';

export type DispatchResolution = 'override' | 'default' | 'skipped';

export interface DispatchRecord {
    phase: Phase;
    resolution: DispatchResolution;
}

export class PhaseDispatcher {
    private readonly overrides: PhaseActions;
    private readonly registry: BuilderRegistry;

    constructor(config: { overrides?: PhaseActions; registry?: BuilderRegistry } = {}) {
        this.overrides = config.overrides ?? {};
        this.registry = config.registry ?? new BuilderRegistry();
    }

    /** Which branch `dispatch` would take, without running anything. */
    resolve(phase: Phase, builder: string): DispatchResolution {
        if (this.overrides[phase]) return 'override';
        if (this.registry.get(builder)?.phases[phase]) return 'default';
        return 'skipped';
    }

    async dispatch(phase: Phase, ctx: BuildContext): Promise<DispatchRecord> {
        const builder = ctx.identity.builder;
        const table = PHASE_INFO[phase].table;
        const label = `Phase: ${phaseLabel(phase)} - ${displayName(ctx.identity)}`;

        setCorrelation({ phase });
        ctx.log.debug(JSON.stringify({ 'builder': builder, 'cmd-dict': table }));

        const override = this.overrides[phase];
        if (override) {
            ctx.log.info(label);
            await override(ctx);
            return { phase, resolution: 'override' };
        }

        const action = this.registry.get(builder)?.phases[phase];
        if (action) {
            ctx.log.info(`${label} - [default-action]`);
            await action(ctx);
            return { phase, resolution: 'default' };
        }

        return { phase, resolution: 'skipped' };
    }
}
