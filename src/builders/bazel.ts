import * as fs from 'fs';
import * as path from 'path';
import { BuilderDefinition } from './types';
import { configureScript, getSourceGit, patchSource } from './common';
import { DriverConfig } from '../config';

const BAZEL_RELEASES = 'https://github.com/bazelbuild/bazel/releases/download';

/** Build Bazel from its dist archive; compiler flags are dropped for the bootstrap. */
export function bazelBootstrapScript(version: string): string {
    const archive = `bazel-${version}-dist.zip`;
    return [
        `curl -LO ${BAZEL_RELEASES}/${version}/${archive}`,
        `unzip -qd bazel ${archive}`,
        'cd bazel',
        'env -u CFLAGS -u CXXFLAGS JAVA_HOME=/usr/lib/jvm/default-jvm '
            + 'EXTRA_BAZEL_ARGS="--host_javabase=@local_jdk//:jdk --compilation_mode=opt" ./compile.sh',
        'cp ./output/bazel /usr/local/bin',
    ].join(' && ');
}

export function bazelBuildCommand(config: DriverConfig): string {
    // `optimization` is expected as a config in the project's .bazelrc
    const parts = [
        'bazel build',
        '--noshow_progress',
        '--verbose_failures',
        '--config=optimization',
        '--spawn_strategy=local',
        '--noshow_loading_progress',
        `--remote_cache=${config.bazelRemoteCache}`,
        '--local_cpu_resources=HOST_CPUS-1',
    ];
    if (config.buildArgs) parts.push(config.buildArgs);
    parts.push('--', config.buildTargets);
    return parts.join(' ');
}

export const bazelBuilder: BuilderDefinition = {
    kind: 'bazel',
    phases: {
        'builder-setup': async (ctx) => {
            await ctx.shell('builder-setup', bazelBootstrapScript(ctx.config.bazelVersion));
        },
        'get-source': getSourceGit,
        'patch': patchSource,
        'configure': configureScript,
        'compile': async (ctx) => {
            if (!fs.existsSync(path.join(ctx.cwd, 'WORKSPACE')) || !ctx.config.buildTargets) {
                ctx.log.info('no WORKSPACE or build targets, nothing to compile');
                return;
            }
            await ctx.shell('compile', bazelBuildCommand(ctx.config));
        },
    },
};
