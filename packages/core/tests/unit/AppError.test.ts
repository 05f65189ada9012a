/**
 * Unit tests for AppError
 */

import assert from "node:assert";
import { afterEach, describe, it } from "node:test";
import { AppCode } from "../../src/AppCode.ts";
import { AppError } from "../../src/AppError.ts";
import { DiagnosticVisibility, type Diagnostics } from "../../src/Diagnostics.ts";
import { field } from "../../src/field.ts";
import { AppErrorKind } from "../../src/kind.ts";
import { Metadata } from "../../src/Metadata.ts";
import { FieldRedaction, MessageEditPolicy } from "../../src/redaction.ts";
import { resetFaultlineState, setBacktracePreferenceOverride } from "../../src/testing/index.ts";

class StorageError extends Error {
    override name = "StorageError";
}

describe("AppError", () => {
    afterEach(() => {
        resetFaultlineState();
    });

    describe("constructors", () => {
        it("should set kind, code and message", () => {
            const error = AppError.notFound("user missing");
            assert.strictEqual(error.kind, AppErrorKind.NotFound);
            assert.strictEqual(error.code, AppCode.NotFound);
            assert.strictEqual(error.explicitMessage, "user missing");
            assert.strictEqual(error.message, "user missing");
            assert.strictEqual(error.name, "AppError");
            assert.ok(error instanceof Error);
        });

        it("should fall back to the kind label without a message", () => {
            const error = AppError.bare(AppErrorKind.Internal);
            assert.strictEqual(error.explicitMessage, undefined);
            assert.strictEqual(error.renderMessage(), "Internal server error");
            assert.strictEqual(error.message, "Internal server error");
        });

        it("should map serviceUnavailable to DependencyUnavailable", () => {
            const error = AppError.serviceUnavailable("billing down");
            assert.strictEqual(error.kind, AppErrorKind.DependencyUnavailable);
            assert.strictEqual(error.code.toString(), "DEPENDENCY_UNAVAILABLE");
        });

        it("should accept options in one step", () => {
            const error = new AppError(AppErrorKind.Conflict, "taken", {
                code: AppCode.UserAlreadyExists,
                fields: [field.str("email_domain", "example.test")],
                redactions: [["email_domain", FieldRedaction.Hash]],
                retry: { afterSeconds: 5 },
            });
            assert.strictEqual(error.code, AppCode.UserAlreadyExists);
            assert.strictEqual(error.metadata.redaction("email_domain"), FieldRedaction.Hash);
            assert.deepStrictEqual(error.retry, { afterSeconds: 5 });
        });
    });

    describe("from", () => {
        it("should return AppErrors unchanged", () => {
            const error = AppError.conflict("duplicate");
            assert.strictEqual(AppError.from(error), error);
        });

        it("should wrap foreign values as the source", () => {
            const cause = new StorageError("disk full");
            const error = AppError.from(cause, AppErrorKind.Database);
            assert.strictEqual(error.kind, AppErrorKind.Database);
            assert.strictEqual(error.explicitMessage, undefined);
            assert.strictEqual(error.source, cause);
            assert.strictEqual(error.cause, cause);
            assert.strictEqual(error.sourceAttachment?.ownership, "owned");
        });

        it("should default to Internal", () => {
            assert.strictEqual(AppError.from("oops").kind, AppErrorKind.Internal);
        });
    });

    describe("builders", () => {
        it("should change the code without touching the kind", () => {
            const error = AppError.conflict("taken").withCode(AppCode.UserAlreadyExists);
            assert.strictEqual(error.kind, AppErrorKind.Conflict);
            assert.strictEqual(error.code.toString(), "USER_ALREADY_EXISTS");
        });

        it("should change the kind without touching the code", () => {
            const error = AppError.internal("x").withKind(AppErrorKind.Timeout);
            assert.strictEqual(error.kind, AppErrorKind.Timeout);
            assert.strictEqual(error.code, AppCode.Internal);
        });

        it("should add and redact fields", () => {
            const error = AppError.validation("bad input").withField(field.str("region", "eu")).redactField("region", FieldRedaction.Last4);
            assert.strictEqual(error.metadata.size, 1);
            assert.strictEqual(error.metadata.redaction("region"), FieldRedaction.Last4);
        });

        it("should copy a replacement metadata store", () => {
            const metadata = Metadata.fromFields([field.str("region", "eu")]);
            const error = AppError.internal("x").withMetadata(metadata);
            metadata.insert(field.str("zone", "z1"));
            assert.strictEqual(error.metadata.size, 1);
        });

        it("should mark the message redactable", () => {
            const error = AppError.internal("secret detail").redactable();
            assert.strictEqual(error.isRedacted, true);
            assert.strictEqual(error.editPolicy, MessageEditPolicy.Redact);
        });

        it("should validate retry seconds", () => {
            assert.throws(() => AppError.rateLimited("slow down").withRetryAfterSecs(-1), RangeError);
            assert.throws(() => AppError.rateLimited("slow down").withRetryAfterSecs(1.5), RangeError);
            assert.deepStrictEqual(AppError.rateLimited("slow down").withRetryAfterSecs(30).retry, { afterSeconds: 30 });
        });

        it("should store details", () => {
            assert.deepStrictEqual(AppError.badRequest("x").withDetailsJson({ field: "email" }).details, { type: "json", value: { field: "email" } });
            assert.deepStrictEqual(AppError.badRequest("x").withDetailsText("see logs").details, { type: "text", value: "see logs" });
        });

        it("should record shared sources", () => {
            const cause = new Error("pool exhausted");
            const error = AppError.database().withSharedSource(cause);
            assert.strictEqual(error.sourceAttachment?.ownership, "shared");
            assert.strictEqual(error.source, cause);
        });

        it("should collect diagnostics lazily", () => {
            const error = AppError.notFound("x");
            assert.strictEqual<Diagnostics | undefined>(error.diagnostics, undefined);
            error
                .withHint("check the id")
                .withHintVisible("shown to operators", DiagnosticVisibility.Internal)
                .withSuggestionCommand("reseed", "npm run seed")
                .withDocsTitled("https://docs.test/not-found", "Not found")
                .withRelatedCode(AppCode.Conflict);
            const diagnostics = error.diagnostics;
            assert.ok(diagnostics);
            assert.strictEqual(diagnostics.hints.length, 2);
            assert.strictEqual(diagnostics.suggestions[0]?.command, "npm run seed");
            assert.strictEqual(diagnostics.docLink?.title, "Not found");
            assert.deepStrictEqual(diagnostics.relatedCodes, ["CONFLICT"]);
        });

        it("should set suggestion and doc link visibility", () => {
            const error = AppError.notFound("x")
                .withSuggestionVisible("retry with a fresh id", DiagnosticVisibility.Public)
                .withDocs("https://docs.test/internal", DiagnosticVisibility.Internal);
            const diagnostics = error.diagnostics;
            assert.ok(diagnostics);
            assert.strictEqual(diagnostics.suggestions[0]?.visibility, DiagnosticVisibility.Public);
            assert.strictEqual(diagnostics.suggestions[0]?.command, undefined);
            assert.strictEqual(diagnostics.docLink?.visibility, DiagnosticVisibility.Internal);
        });

        it("should keep doc links public by default", () => {
            const diagnostics = AppError.notFound("x").withDocs("https://docs.test/not-found").diagnostics;
            assert.strictEqual(diagnostics?.docLink?.visibility, DiagnosticVisibility.Public);
        });

        it("should hide a redactable message from its public text", () => {
            assert.strictEqual(AppError.internal("card 4111 declined").redactable().publicMessage(), "Internal server error");
            assert.strictEqual(AppError.notFound("gone").publicMessage(), "gone");
        });
    });

    describe("chain", () => {
        it("should yield the error followed by its causes", () => {
            const root = new StorageError("disk full");
            const middle = new Error("write failed", { cause: root });
            const error = AppError.database("save failed").withSource(middle);
            const chain = Array.from(error.chain());
            assert.deepStrictEqual(chain, [error, middle, root]);
            assert.strictEqual(error.rootCause(), root);
        });

        it("should be its own root cause without a source", () => {
            const error = AppError.internal("x");
            assert.strictEqual(error.rootCause(), error);
        });

        it("should find a cause by type", () => {
            const root = new StorageError("disk full");
            const error = AppError.database("save failed").withSource(new Error("write failed", { cause: root }));
            assert.strictEqual(error.findSource(StorageError), root);
            assert.strictEqual(error.findSource(TypeError), undefined);
        });

        it("should not report itself as a source", () => {
            const error = AppError.internal("outer");
            assert.strictEqual(error.findSource(AppError), undefined);
        });
    });

    describe("backtrace", () => {
        it("should prefer an explicit backtrace", () => {
            const error = AppError.internal("x").withBacktrace({ frames: ["at main (app.ts:1:1)"] });
            assert.deepStrictEqual(error.backtrace(), { frames: ["at main (app.ts:1:1)"] });
        });

        it("should capture lazily when enabled", () => {
            setBacktracePreferenceOverride(true);
            const error = AppError.internal("x");
            const backtrace = error.backtrace();
            assert.ok(backtrace);
            assert.ok(backtrace.frames.length > 0);
        });

        it("should capture nothing when disabled", () => {
            setBacktracePreferenceOverride(false);
            assert.strictEqual(AppError.internal("x").backtrace(), undefined);
        });
    });
});
