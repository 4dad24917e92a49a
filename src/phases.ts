/**
 * Build phases, in execution order.
 */

export const PHASES = [
    'builder-setup',
    'get-source',
    'patch',
    'configure',
    'compile',
    'package-filename',
    'package',
    'install',
] as const;

export type Phase = typeof PHASES[number];

interface PhaseInfo {
    /** Name of the phase's builder→action table, reported in dispatch logs. */
    table: string;
    /** Function names that override the phase in a project script. */
    functions: readonly string[];
}

export const PHASE_INFO: Record<Phase, PhaseInfo> = {
    'builder-setup':    { table: 'builder_setup_commands',    functions: ['builder_setup'] },
    'get-source':       { table: 'get_source_commands',       functions: ['get_source'] },
    'patch':            { table: 'patch_commands',            functions: ['patch'] },
    'configure':        { table: 'config_commands',           functions: ['configure', 'config'] },
    'compile':          { table: 'compile_commands',          functions: ['compile'] },
    'package-filename': { table: 'package_filename_commands', functions: ['package_filename'] },
    'package':          { table: 'package_commands',          functions: ['package'] },
    'install':          { table: 'install_commands',          functions: ['install'] },
};

/** "package-filename" → "Package-filename", for phase log lines. */
export function phaseLabel(phase: Phase): string {
    return phase.charAt(0).toUpperCase() + phase.slice(1);
}
