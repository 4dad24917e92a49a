import { PhaseActions } from '../build_context';

export type KnownBuilderKind = 'pip' | 'maven' | 'bazel' | 'cmake';

/**
 * Default actions of one builder kind. A phase without an entry is a no-op
 * for that builder unless the project overrides it.
 */
export interface BuilderDefinition {
    kind: string;
    phases: PhaseActions;
}
