/**
 * Main entry point - exports all public APIs
 */

export { PackageDriver } from './package_driver';
export type { PackageDriverOptions, DriverOutcome, DriverStatus } from './package_driver';
export { PhaseDispatcher } from './phase_dispatcher';
export type { DispatchRecord, DispatchResolution } from './phase_dispatcher';
export { BuildContext } from './build_context';
export type { BuildState, PhaseAction, PhaseActions } from './build_context';
export { BuilderRegistry, KNOWN_BUILDERS, isKnownBuilder } from './builders';
export type { BuilderDefinition, KnownBuilderKind } from './builders';
export { PHASES, PHASE_INFO } from './phases';
export type { Phase } from './phases';
export { loadDriverConfig, loadForeachConfig, toolEnvironment } from './config';
export type { DriverConfig, ForeachConfig, Env } from './config';
export { identityFromConfig, isBuildable, displayName } from './package_identity';
export type { PackageIdentity } from './package_identity';
export { acquireSource, resolveRepotag } from './source_acquisition';
export type { SourceState, RepotagType, AcquisitionResult } from './source_acquisition';
export { applyPackagePatch, patchFileFor } from './patch_apply';
export type { PatchStatus } from './patch_apply';
export { applyUnifiedDiff, parseUnifiedDiff } from './unified_diff';
export { loadOverrideScript } from './override_script';
export type { OverrideScript } from './override_script';
export { WorkingDirectory } from './working_directory';
export type { DirectoryGuard } from './working_directory';
export { SpawnCommandRunner } from './command_runner';
export type { CommandRunner, CommandSpec, CommandResult } from './command_runner';
export { DriverError, ErrorFactory, isDriverError } from './structured_error';
export type { ErrorCode, StructuredError } from './structured_error';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export { forEachRequirement, evaluateQuery } from './requirements';
export type { ForeachReport, RequirementEntry } from './requirements';
