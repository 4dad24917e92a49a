/**
 * Configuration defaults
 *
 * Every option is read from the environment and falls back to a documented
 * default when unset or empty. Values are not validated here; a malformed
 * value surfaces later as a failing tool invocation.
 */

import * as os from 'os';
import * as path from 'path';

export type Env = Record<string, string | undefined>;

/* -------------------------------------------------------------------------- */
/* Defaults                                                                   */
/* -------------------------------------------------------------------------- */

export const DEFAULT_PACKAGE_SCRIPT = 'PKBUILD';
export const DEFAULT_REPOTAG_REGEX = '^[^:]*:(.*)$';
export const DEFAULT_REPOTAG_REPLACEMENT = 'v\\1';
export const DEFAULT_CONFIGURE_SCRIPT = '__build_configure.sh';
export const DEFAULT_OUT_DIR = '/tmp/pkg';
export const DEFAULT_SYS_INSTALL_COMMAND = 'apk add --no-cache';
export const DEFAULT_BAZEL_VERSION = '4.2.2';
export const DEFAULT_BAZEL_REMOTE_CACHE = 'grpc://remote-cache:9092';

export const DEFAULT_REQUIREMENTS_REGEX = '^\\s*([A-Za-z0-9_.\\-]+)\\s*==\\s*([^\\s;#]+).*$';
export const DEFAULT_REQUIREMENTS_REPLACEMENT = '\\1|\\2';
export const DEFAULT_REQUIREMENTS_SELECT = '.build_deps[] | select(.package_version != null)';
export const DEFAULT_REQUIREMENTS_ELEMENTS = [
    'package',
    'package_version',
    'project_repo',
    'subproject',
    'pkg_to_repotag_regex',
    'pkg_to_repotag_replacement',
    'package_builder',
    'build_extra_args',
    'package_script',
    'project_root',
];

/** Detected CPU count minus one, never below one. */
export function defaultParallelWorkers(): number {
    return Math.max(1, os.cpus().length - 1);
}

function opt(env: Env, name: string, fallback: string = ''): string {
    const value = env[name];
    return value === undefined || value === '' ? fallback : value;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
    const value = env[name];
    if (value === undefined || value === '') return fallback;
    return value === 'true';
}

/* -------------------------------------------------------------------------- */
/* Package driver                                                             */
/* -------------------------------------------------------------------------- */

export interface DriverConfig {
    // identity
    package: string;
    packageVersion: string;
    parent: string;
    name: string;
    version: string;
    builder: string;
    packageScript: string;

    // builder-setup and OS setup
    installBuilder: boolean;
    createXlocaleSymlink: boolean;
    sysRequirements: string;
    sysInstallCommand: string;
    bazelVersion: string;

    // get-source
    projectRepo: string;
    projectSrcDir: string;
    repotagType: string;
    repotagRegex: string;
    repotagReplacement: string;
    gitSubmodule: boolean;
    gitSubmoduleRecursive: boolean;

    // patch / configure / compile
    patchDir: string;
    configureScript: string;
    buildArgs: string;
    buildTargets: string;
    parallelWorkers: string;
    bazelRemoteCache: string;

    // package / install
    outDir: string;
    installPackage: boolean;
    subproject: string;
    buildExtraArgs: string;
}

/** Checkout directory name derived from the repository URL (`basename -s .git`). */
export function repoDirName(repo: string): string {
    const trimmed = repo.replace(/\/+$/, '');
    const base = trimmed.slice(trimmed.lastIndexOf('/') + 1).replace(/^.*:/, '');
    return base.endsWith('.git') ? base.slice(0, -'.git'.length) : base;
}

export function loadDriverConfig(env: Env = process.env): DriverConfig {
    const pkg = opt(env, 'PACKAGE');
    const pkgVersion = opt(env, 'PACKAGE_VERSION');
    const projectRepo = opt(env, 'PROJECT_REPO');

    return {
        package: pkg,
        packageVersion: pkgVersion,
        parent: opt(env, 'PKG_PARENT'),
        name: opt(env, 'PKG_NAME', pkg),
        version: opt(env, 'PKG_VERSION', pkgVersion),
        builder: opt(env, 'PKG_BUILDER', opt(env, 'PACKAGE_BUILDER')),
        packageScript: opt(env, 'PACKAGE_SCRIPT', DEFAULT_PACKAGE_SCRIPT),

        installBuilder: !flag(env, 'NO_INSTALL_BUILDER', false),
        createXlocaleSymlink: flag(env, 'CREATE_SYMLINK_XLOCALE', false),
        sysRequirements: opt(env, 'SYS_REQUIREMENTS'),
        sysInstallCommand: opt(env, 'SYS_INSTALL_COMMAND', DEFAULT_SYS_INSTALL_COMMAND),
        bazelVersion: opt(env, 'BAZEL_VERSION', DEFAULT_BAZEL_VERSION),

        projectRepo,
        projectSrcDir: opt(env, 'PROJECT_SRC_DIR', repoDirName(projectRepo)),
        repotagType: opt(env, 'PROJECT_REPOTAG_TYPE', 'tag'),
        repotagRegex: opt(env, 'PKG_TO_REPOTAG_REGEX', DEFAULT_REPOTAG_REGEX),
        repotagReplacement: opt(env, 'PKG_TO_REPOTAG_REPLACEMENT', DEFAULT_REPOTAG_REPLACEMENT),
        gitSubmodule: flag(env, 'GIT_SUBMODULE', false),
        gitSubmoduleRecursive: flag(env, 'GIT_SUBMODULE_RECURSIVE', false),

        patchDir: opt(env, 'PATCH_DIR'),
        configureScript: opt(env, 'PHASE_CFG_SCRIPT', DEFAULT_CONFIGURE_SCRIPT),
        buildArgs: opt(env, 'PKG_BUILD_ARGS'),
        buildTargets: opt(env, 'PKG_BUILD_TARGETS'),
        parallelWorkers: opt(env, 'PARALLEL_WORKERS', String(defaultParallelWorkers())),
        bazelRemoteCache: opt(env, 'BAZEL_REMOTE_CACHE', DEFAULT_BAZEL_REMOTE_CACHE),

        outDir: opt(env, 'PKG_OUT_DIR', DEFAULT_OUT_DIR),
        installPackage: !flag(env, 'NO_PKG_INSTALL', false),
        subproject: opt(env, 'SUBPROJECT'),
        buildExtraArgs: opt(env, 'BUILD_EXTRA_ARGS'),
    };
}

/**
 * Compiler and build-tool variables exported to every external tool.
 * Caller-provided values win over the defaults.
 */
export function toolEnvironment(config: DriverConfig, env: Env = process.env): Record<string, string> {
    const workers = config.parallelWorkers;
    return {
        CFLAGS: opt(env, 'CFLAGS', '-O2 -g0'),
        CXXFLAGS: opt(env, 'CXXFLAGS', '-O2 -g0'),
        LDFLAGS: opt(env, 'LDFLAGS'),
        MAKEFLAGS: opt(env, 'MAKEFLAGS', `-j${workers}`),
        CMAKE_GENERATOR: 'Ninja',
        CMAKE_BUILD_PARALLEL_LEVEL: workers,
        NPY_NUM_BUILD_JOBS: workers,
        NPY_DISTUTILS_APPEND_FLAGS: '1',
    };
}

/* -------------------------------------------------------------------------- */
/* Requirements iterator                                                      */
/* -------------------------------------------------------------------------- */

export type RequirementsType = 'json' | 'python';
export type FailurePolicy = 'abort' | 'continue';

export interface ForeachConfig {
    type: string;
    file: string;
    command: string;
    onError: string;

    // flat dialect
    regex: string;
    replacement: string;
    argsDelimiter: string;

    // json dialect
    project: string;
    processProject: boolean;
    select: string;
    elements: string[];
    varnamePrefix: string;
}

/** Accepts `a,b,c` and the object-shorthand form `{a,b,c}`; the `null` end-of-record marker is dropped. */
export function parseElementList(spec: string): string[] {
    return spec
        .trim()
        .replace(/^\{/, '')
        .replace(/\}$/, '')
        .split(',')
        .map(field => field.trim())
        .filter(field => field !== '' && field !== 'null');
}

export function loadForeachConfig(env: Env = process.env, cwd: string = process.cwd()): ForeachConfig {
    const type = opt(env, 'REQUIREMENTS_TYPE', 'json');
    const defaultFile = type === 'json' ? 'packages.json' : 'requirements.txt';
    const elements = opt(env, 'REQUIREMENTS_ELEMENTS');

    return {
        type,
        file: path.resolve(cwd, opt(env, 'REQUIREMENTS_FILE', defaultFile)),
        command: opt(env, 'REQUIREMENTS_FOREACH'),
        onError: opt(env, 'REQUIREMENTS_ON_ERROR', 'abort'),

        regex: opt(env, 'REQUIREMENTS_REGEX', DEFAULT_REQUIREMENTS_REGEX),
        replacement: opt(env, 'REQUIREMENTS_REPLACEMENT', DEFAULT_REQUIREMENTS_REPLACEMENT),
        argsDelimiter: opt(env, 'REQUIREMENTS_FOREACH_ARGS_DELIM', '|'),

        project: opt(env, 'REQUIREMENTS_PROJECT'),
        processProject: flag(env, 'PROCESS_PROJECT', true),
        select: opt(env, 'REQUIREMENTS_SELECT', DEFAULT_REQUIREMENTS_SELECT),
        elements: elements ? parseElementList(elements) : [...DEFAULT_REQUIREMENTS_ELEMENTS],
        varnamePrefix: opt(env, 'VARNAME_PREFIX').toUpperCase(),
    };
}
