/**
 * Unit tests for the context builder
 */

import assert from "node:assert";
import { afterEach, beforeEach, describe, it, mock } from "node:test";
import { AppCode } from "../../src/AppCode.ts";
import { AppError } from "../../src/AppError.ts";
import { Context } from "../../src/Context.ts";
import { field } from "../../src/field.ts";
import { AppErrorKind } from "../../src/kind.ts";
import { FieldRedaction } from "../../src/redaction.ts";
import type { ErrorLabels } from "../../src/telemetry.ts";
import { configureErrorTelemetry } from "../../src/telemetry.ts";
import { resetFaultlineState, setBacktracePreferenceOverride } from "../../src/testing/index.ts";

describe("Context", () => {
    let increment: ReturnType<typeof mock.fn<(labels: ErrorLabels) => void>>;

    beforeEach(() => {
        resetFaultlineState();
        setBacktracePreferenceOverride(false);
        increment = mock.fn<(labels: ErrorLabels) => void>();
        configureErrorTelemetry({ counter: { increment } });
    });

    afterEach(() => {
        resetFaultlineState();
    });

    describe("intoError", () => {
        it("should attach the source and leave the message empty", () => {
            const cause = new Error("connection refused");
            const error = new Context(AppErrorKind.Database).intoError(cause);
            assert.strictEqual(error.kind, AppErrorKind.Database);
            assert.strictEqual(error.code, AppCode.Database);
            assert.strictEqual(error.explicitMessage, undefined);
            assert.strictEqual(error.source, cause);
        });

        it("should emit telemetry once per record", () => {
            new Context(AppErrorKind.Database).with(field.str("table", "orders")).with(field.u64("attempt", 1)).intoError(new Error("x"));
            assert.strictEqual(increment.mock.callCount(), 1);
            assert.deepStrictEqual(increment.mock.calls[0]?.arguments, [{ code: "DATABASE", category: "Database" }]);
        });

        it("should produce a fresh record on every call", () => {
            const ctx = new Context(AppErrorKind.Network).with(field.str("host", "cache-1"));
            const first = ctx.intoError(new Error("reset"));
            const second = ctx.intoError(new Error("reset"));
            assert.notStrictEqual(first, second);
            first.withField(field.str("extra", "x"));
            assert.strictEqual(second.metadata.size, 1);
            assert.strictEqual(increment.mock.callCount(), 3);
        });

        it("should apply the message redaction toggle", () => {
            assert.strictEqual(new Context(AppErrorKind.Internal).redact(true).intoError("x").isRedacted, true);
            assert.strictEqual(new Context(AppErrorKind.Internal).redact(true).redact(false).intoError("x").isRedacted, false);
        });
    });

    describe("code and category", () => {
        it("should follow the category until the code is overridden", () => {
            assert.strictEqual(new Context(AppErrorKind.Database).category(AppErrorKind.Timeout).intoError("x").code, AppCode.Timeout);

            const error = new Context(AppErrorKind.Database).code(AppCode.of("DB_DOWN")).category(AppErrorKind.Network).intoError("x");
            assert.strictEqual(error.kind, AppErrorKind.Network);
            assert.strictEqual(error.code.toString(), "DB_DOWN");
        });
    });

    describe("redaction policies", () => {
        it("should apply to fields already added", () => {
            const error = new Context(AppErrorKind.Database)
                .with(field.str("dsn", "postgres://db.internal/app"))
                .redactField("dsn", FieldRedaction.Redact)
                .intoError("x");
            assert.strictEqual(error.metadata.redaction("dsn"), FieldRedaction.Redact);
        });

        it("should apply to fields added later", () => {
            const error = new Context(AppErrorKind.Database).redactField("region", FieldRedaction.Hash).with(field.str("region", "eu")).intoError("x");
            assert.strictEqual(error.metadata.redaction("region"), FieldRedaction.Hash);
        });

        it("should carry policies for names without fields", () => {
            const error = new Context(AppErrorKind.Database).redactField("region", FieldRedaction.Last4).intoError("x");
            error.withField(field.str("region", "eu-west-1"));
            assert.strictEqual(error.metadata.redaction("region"), FieldRedaction.Last4);
        });
    });

    describe("trackCaller", () => {
        it("should record the calling location as fields", () => {
            const ctx = new Context(AppErrorKind.Internal).trackCaller();
            const location = ctx.callerLocation;
            assert.ok(location);
            assert.ok(location.file.endsWith("Context.test.ts"), location.file);
            assert.ok(location.line > 0);

            const error = ctx.intoError("x");
            assert.deepStrictEqual(error.metadata.get("caller.file"), { type: "str", value: location.file });
            assert.deepStrictEqual(error.metadata.get("caller.line"), { type: "u64", value: BigInt(location.line) });
            assert.deepStrictEqual(error.metadata.get("caller.column"), { type: "u64", value: BigInt(location.column) });
        });

        it("should give each conversion in a loop its own three caller fields", () => {
            const errors: AppError[] = [];
            for (let attempt = 0; attempt < 3; attempt++) {
                errors.push(new Context(AppErrorKind.Network).trackCaller().intoError(new Error("reset")));
            }
            assert.strictEqual(new Set(errors).size, 3);
            for (const error of errors) {
                assert.deepStrictEqual(Array.from(error.metadata, ([name]) => name), ["caller.column", "caller.file", "caller.line"]);
            }
        });

        it("should add no caller fields by default", () => {
            assert.strictEqual(new Context(AppErrorKind.Internal).intoError("x").metadata.size, 0);
        });
    });

    describe("wrap", () => {
        it("should return the value on success", () => {
            assert.strictEqual(new Context(AppErrorKind.Internal).wrap(() => 7), 7);
        });

        it("should convert thrown values", () => {
            const cause = new SyntaxError("unexpected token");
            assert.throws(
                () =>
                    new Context(AppErrorKind.Deserialization).wrap(() => {
                        throw cause;
                    }),
                (err: unknown) => err instanceof AppError && err.kind === AppErrorKind.Deserialization && err.source === cause,
            );
        });

        it("should rethrow AppErrors unchanged", () => {
            const original = AppError.notFound("gone");
            assert.throws(
                () =>
                    new Context(AppErrorKind.Internal).wrap(() => {
                        throw original;
                    }),
                (err: unknown) => err === original,
            );
        });
    });

    describe("wrapAsync", () => {
        it("should resolve with the value", async () => {
            assert.strictEqual(await new Context(AppErrorKind.Internal).wrapAsync(Promise.resolve("ok")), "ok");
        });

        it("should convert rejections", async () => {
            const cause = new Error("socket hang up");
            await assert.rejects(
                new Context(AppErrorKind.Network).wrapAsync(Promise.reject(cause)),
                (err: unknown) => err instanceof AppError && err.kind === AppErrorKind.Network && err.source === cause,
            );
        });

        it("should pass AppError rejections through", async () => {
            const original = AppError.timeout("slow");
            await assert.rejects(new Context(AppErrorKind.Internal).wrapAsync(Promise.reject(original)), (err: unknown) => err === original);
        });
    });
});
