// src/builders/index.ts

import { BuilderDefinition, KnownBuilderKind } from './types';
import { pipBuilder } from './pip';
import { mavenBuilder } from './maven';
import { bazelBuilder } from './bazel';
import { cmakeBuilder } from './cmake';

export const KNOWN_BUILDERS: Record<KnownBuilderKind, BuilderDefinition> = {
    pip: pipBuilder,
    maven: mavenBuilder,
    bazel: bazelBuilder,
    cmake: cmakeBuilder,
};

export function isKnownBuilder(kind: string): kind is KnownBuilderKind {
    return Object.prototype.hasOwnProperty.call(KNOWN_BUILDERS, kind);
}

/** Builder kind → default phase actions. Seeded with the known builders. */
export class BuilderRegistry {
    private readonly builders = new Map<string, BuilderDefinition>();

    constructor(definitions: BuilderDefinition[] = Object.values(KNOWN_BUILDERS)) {
        for (const def of definitions) this.register(def);
    }

    register(def: BuilderDefinition): void {
        this.builders.set(def.kind, def);
    }

    get(kind: string): BuilderDefinition | undefined {
        return this.builders.get(kind);
    }

    kinds(): string[] {
        return [...this.builders.keys()];
    }
}

export * from './types';
export { pipBuilder, wheelPattern, matchPackageFiles } from './pip';
export { mavenBuilder, mavenInstallCommand } from './maven';
export { bazelBuilder, bazelBuildCommand, bazelBootstrapScript } from './bazel';
export { cmakeBuilder } from './cmake';
