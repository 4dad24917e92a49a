import { describe, test } from "node:test";
import assert from "node:assert";

import { selectRecords } from "../json_manifest";
import { compileQuery, evaluateQuery, jsonEqual, QueryError, streamQuery } from "../query";
import type { JsonValue } from "../types";

const DOC: JsonValue = {
    "my-app": {
        build_deps: [
            { package: "alpha", package_version: "1.0", enabled: true },
            { package: "beta", package_version: null, enabled: false },
            { package: "gamma", n: 2 },
        ],
    },
    count: 3,
};

describe("selection queries", () => {
    test("identity and quoted keys", () => {
        assert.deepStrictEqual(evaluateQuery(".", 5), [5]);
        assert.deepStrictEqual(evaluateQuery('."my-app".build_deps[0].package', DOC), ["alpha"]);
        assert.deepStrictEqual(evaluateQuery('."my-app".build_deps[-1].package', DOC), ["gamma"]);
    });

    test("default selection keeps entries with a version", () => {
        const out = evaluateQuery(
            ".build_deps[] | select(.package_version != null) | .package",
            { build_deps: [{ package: "a", package_version: "1" }, { package: "b", package_version: null }, { package: "c" }] }
        );
        assert.deepStrictEqual(out, ["a"]);
    });

    test("select by truthiness and by equality", () => {
        assert.deepStrictEqual(evaluateQuery('."my-app".build_deps[] | select(.enabled) | .package', DOC), ["alpha"]);
        assert.deepStrictEqual(evaluateQuery('."my-app".build_deps[] | select(.n == 2) | .package', DOC), ["gamma"]);
        assert.deepStrictEqual(evaluateQuery('."my-app".build_deps[] | select(.package == "beta") | .enabled', DOC), [false]);
    });

    test("iterating an object yields its values", () => {
        assert.deepStrictEqual(evaluateQuery(".[]", { a: 1, b: "x" }), [1, "x"]);
    });

    test("missing fields are null, wrong types raise", () => {
        assert.deepStrictEqual(evaluateQuery(".x.y", {}), [null]);
        assert.throws(() => evaluateQuery(".count.x", DOC), { name: "QueryError", message: 'Cannot index number with "x"' });
        assert.throws(() => evaluateQuery(".count[]", DOC), { name: "QueryError", message: "Cannot iterate over number" });
        assert.throws(() => evaluateQuery(".[0]", { a: 1 }), QueryError);
    });

    test("outputs preceding a failure are produced before it", () => {
        const doc: JsonValue = { build_deps: [{ subs: ["a", "b"] }, { package: "no-subs" }, { subs: ["c"] }] };
        const seen: JsonValue[] = [];

        assert.throws(() => {
            for (const out of streamQuery(".build_deps[] | .subs[]", doc)) seen.push(out);
        }, { name: "QueryError", message: "Cannot iterate over null" });
        assert.deepStrictEqual(seen, ["a", "b"]);
    });

    test("record selection keeps what came before a failure", () => {
        const doc: JsonValue = { build_deps: [{ subs: [{ package: "a" }] }, { package: "no-subs" }, { subs: [{ package: "c" }] }] };
        assert.deepStrictEqual(selectRecords(doc, ".build_deps[] | .subs[]"), [{ package: "a" }]);
        assert.deepStrictEqual(selectRecords(doc, ".missing[]"), []);
    });

    test("malformed queries are rejected at compile time", () => {
        assert.throws(() => compileQuery(".a |"), { message: "expected a path at offset 4" });
        assert.throws(() => compileQuery("select(.a ==)"), QueryError);
        assert.throws(() => compileQuery('."open'), QueryError);
        assert.throws(() => compileQuery("keys"), QueryError);
    });

    test("structural equality", () => {
        assert.equal(jsonEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] }), true);
        assert.equal(jsonEqual({ a: 1 }, { a: 1, b: 2 }), false);
        assert.equal(jsonEqual([1, 2], [2, 1]), false);
    });
});
