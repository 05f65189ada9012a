/**
 * Unit tests for AppCode
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { AppCode } from "../../src/AppCode.ts";
import { ALL_KINDS, AppErrorKind } from "../../src/kind.ts";

describe("AppCode", () => {
    describe("of", () => {
        it("should create custom codes", () => {
            const code = AppCode.of("PAYMENT_DECLINED");
            assert.strictEqual(code.toString(), "PAYMENT_DECLINED");
            assert.strictEqual(code.isBuiltin, false);
        });

        it("should throw TypeError for invalid literals", () => {
            assert.throws(() => AppCode.of("payment_declined"), TypeError);
            assert.throws(() => AppCode.of("DOUBLE__UNDERSCORE"), TypeError);
            assert.throws(() => AppCode.of("_LEADING"), TypeError);
            assert.throws(() => AppCode.of(""), TypeError);
        });
    });

    describe("parse", () => {
        it("should return interned built-in constants", () => {
            assert.strictEqual(AppCode.parse("NOT_FOUND"), AppCode.NotFound);
            assert.strictEqual(AppCode.parse("USER_ALREADY_EXISTS"), AppCode.UserAlreadyExists);
        });

        it("should return undefined for invalid input", () => {
            assert.strictEqual(AppCode.parse("not found"), undefined);
            assert.strictEqual(AppCode.parse("TRAILING_"), undefined);
        });

        it("should accept digits", () => {
            assert.strictEqual(AppCode.parse("E404")?.toString(), "E404");
        });
    });

    describe("fromKind", () => {
        it("should map NotFound to NOT_FOUND", () => {
            assert.strictEqual(AppCode.fromKind(AppErrorKind.NotFound), AppCode.NotFound);
        });

        it("should give every kind a built-in code", () => {
            for (const kind of ALL_KINDS) {
                assert.strictEqual(AppCode.fromKind(kind).isBuiltin, true, kind);
            }
        });

        it("should map DependencyUnavailable to DEPENDENCY_UNAVAILABLE", () => {
            assert.strictEqual(AppCode.fromKind(AppErrorKind.DependencyUnavailable).toString(), "DEPENDENCY_UNAVAILABLE");
        });
    });

    describe("equality and serialization", () => {
        it("should compare by value", () => {
            assert.ok(AppCode.of("CUSTOM_CODE").equals(AppCode.of("CUSTOM_CODE")));
            assert.ok(!AppCode.NotFound.equals(AppCode.Conflict));
        });

        it("should serialize as a JSON string", () => {
            assert.strictEqual(JSON.stringify({ code: AppCode.RateLimited }), '{"code":"RATE_LIMITED"}');
        });
    });
});
