import { describe, test, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "fs";
import path from "path";
import os from "os";

import { forEachRequirement } from "../foreach";
import { parseFlatManifest } from "../flat_manifest";
import { DEFAULT_REQUIREMENTS_REGEX, DEFAULT_REQUIREMENTS_REPLACEMENT, loadForeachConfig } from "../../config";
import type { Env } from "../../config";
import type { CommandResult, CommandRunner, CommandSpec } from "../../command_runner";
import { DriverError } from "../../structured_error";

class RecordingRunner implements CommandRunner {
    readonly calls: CommandSpec[] = [];

    constructor(private readonly exitCodes: number[] = []) {}

    async run(spec: CommandSpec): Promise<CommandResult> {
        this.calls.push(spec);
        return { exitCode: this.exitCodes[this.calls.length - 1] ?? 0, stdout: "", stderr: "" };
    }
}

const MANIFEST = {
    app: {
        package: "app",
        package_version: "2.0",
        package_builder: "pip",
        build_deps: [
            { package: "foo", package_version: "1.2.3", project_repo: "https://example.com/foo.git", package_builder: "pip" },
            { package: "bar", package_version: "0.9", subproject: "core", package_builder: "maven", build_extra_args: ["-q"] },
            { package: "baz", package_version: null },
        ],
    },
};

const REQUIREMENTS_TXT = [
    "# pinned runtime deps",
    "requests == 2.31.0",
    "flask>=2.0",
    'numpy==1.26.4 ; python_version >= "3.9"',
    "",
].join("\n");

function isCode(code: string): (err: unknown) => boolean {
    return (err: unknown) => err instanceof DriverError && err.code === code;
}

describe("forEachRequirement", () => {
    let dir: string;

    const jsonConfig = (env: Env = {}) => loadForeachConfig({
        REQUIREMENTS_FOREACH: "pkbuild install",
        REQUIREMENTS_PROJECT: "app",
        PROCESS_PROJECT: "false",
        ...env,
    }, dir);

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "foreach-test-"));
        fs.writeFileSync(path.join(dir, "packages.json"), JSON.stringify(MANIFEST));
        fs.writeFileSync(path.join(dir, "requirements.txt"), REQUIREMENTS_TXT);
    });

    afterEach(() => {
        try { fs.rmSync(dir, { recursive: true, force: true }); } catch { }
    });

    test("an empty command does nothing", async () => {
        const runner = new RecordingRunner();
        const report = await forEachRequirement(
            loadForeachConfig({ REQUIREMENTS_FILE: "missing.json" }, dir),
            { runner, cwd: dir }
        );
        assert.deepStrictEqual(report, { invocations: 0, failures: [] });
        assert.equal(runner.calls.length, 0);
    });

    test("two selected entries run twice with only their own variables", async () => {
        const runner = new RecordingRunner();
        const report = await forEachRequirement(jsonConfig(), { runner, cwd: dir });

        assert.deepStrictEqual(report, { invocations: 2, failures: [] });
        assert.deepStrictEqual(runner.calls, [
            {
                command: "sh",
                args: ["-c", "pkbuild install"],
                cwd: dir,
                env: {
                    PACKAGE: "foo",
                    PACKAGE_VERSION: "1.2.3",
                    PROJECT_REPO: "https://example.com/foo.git",
                    PACKAGE_BUILDER: "pip",
                },
            },
            {
                command: "sh",
                args: ["-c", "pkbuild install"],
                cwd: dir,
                env: {
                    PACKAGE: "bar",
                    PACKAGE_VERSION: "0.9",
                    SUBPROJECT: "core",
                    PACKAGE_BUILDER: "maven",
                    BUILD_EXTRA_ARGS: '["-q"]',
                },
            },
        ]);
    });

    test("the project record runs last when enabled, with the variable prefix", async () => {
        const runner = new RecordingRunner();
        await forEachRequirement(jsonConfig({ PROCESS_PROJECT: "true", VARNAME_PREFIX: "dep_" }), { runner, cwd: dir });

        assert.equal(runner.calls.length, 3);
        assert.deepStrictEqual(runner.calls[2].env, {
            DEP_PACKAGE: "app",
            DEP_PACKAGE_VERSION: "2.0",
            DEP_PACKAGE_BUILDER: "pip",
        });
    });

    test("a selection that does not apply yields no entries", async () => {
        const runner = new RecordingRunner();
        const report = await forEachRequirement(jsonConfig({ REQUIREMENTS_PROJECT: "other", PROCESS_PROJECT: "true" }), { runner, cwd: dir });
        assert.equal(report.invocations, 0);
    });

    test("flat manifests pass the rewritten line as positional parameters", async () => {
        const runner = new RecordingRunner();
        const config = loadForeachConfig({ REQUIREMENTS_TYPE: "python", REQUIREMENTS_FOREACH: 'echo "$1" "$2"' }, dir);
        await forEachRequirement(config, { runner, cwd: dir });

        assert.deepStrictEqual(runner.calls.map(c => c.args), [
            ["-c", 'echo "$1" "$2"', "pkbuild", "requests", "2.31.0"],
            ["-c", 'echo "$1" "$2"', "pkbuild", "numpy", "1.26.4"],
        ]);
        assert.equal(runner.calls[0].env, undefined);
    });

    test("abort stops at the first failing entry", async () => {
        const runner = new RecordingRunner([4, 0]);
        await assert.rejects(forEachRequirement(jsonConfig(), { runner, cwd: dir }), isCode("REQUIREMENT_FAILED"));
        assert.equal(runner.calls.length, 1);
    });

    test("continue runs every entry and reports all failures at the end", async () => {
        const runner = new RecordingRunner([5, 0]);
        await assert.rejects(
            forEachRequirement(jsonConfig({ REQUIREMENTS_ON_ERROR: "continue" }), { runner, cwd: dir }),
            (err: unknown) => err instanceof DriverError
                && err.code === "REQUIREMENT_FAILED"
                && err.message === 'Executing "pkbuild install" failed for requirement #1 (exit 5)'
        );
        assert.equal(runner.calls.length, 2);
    });

    test("invalid settings and manifests are reported", async () => {
        const runner = new RecordingRunner();
        await assert.rejects(forEachRequirement(jsonConfig({ REQUIREMENTS_TYPE: "toml" }), { runner }), isCode("CONFIG_INVALID"));
        await assert.rejects(forEachRequirement(jsonConfig({ REQUIREMENTS_ON_ERROR: "retry" }), { runner }), isCode("CONFIG_INVALID"));
        await assert.rejects(forEachRequirement(jsonConfig({ REQUIREMENTS_SELECT: "keys" }), { runner }), isCode("CONFIG_INVALID"));
        await assert.rejects(forEachRequirement(jsonConfig({ REQUIREMENTS_FILE: "absent.json" }), { runner }), isCode("MANIFEST_INVALID"));

        fs.writeFileSync(path.join(dir, "broken.json"), "{ not json");
        await assert.rejects(forEachRequirement(jsonConfig({ REQUIREMENTS_FILE: "broken.json" }), { runner }), isCode("MANIFEST_INVALID"));
        assert.equal(runner.calls.length, 0);
    });
});

describe("parseFlatManifest", () => {
    test("splits rewritten lines on the delimiter", () => {
        assert.deepStrictEqual(
            parseFlatManifest("a==1\nb==2\n", DEFAULT_REQUIREMENTS_REGEX, DEFAULT_REQUIREMENTS_REPLACEMENT, "|"),
            [["a", "1"], ["b", "2"]]
        );
        assert.deepStrictEqual(parseFlatManifest("a==1\r\n", "^(.*)==(.*)$", "\\1 \\2", " "), [["a", "1"]]);
    });
});
