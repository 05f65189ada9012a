/**
 * Unit tests for protocol mappings
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { Code } from "@connectrpc/connect";
import { AppCode } from "../../src/AppCode.ts";
import { ALL_KINDS, AppErrorKind, kindHttpStatus } from "../../src/kind.ts";
import { CODE_MAPPINGS, KIND_MAPPINGS, PROBLEM_TYPE_BASE, grpcStatusName, mappingFor, mappingForCode } from "../../src/mapping.ts";

describe("grpcStatusName", () => {
    it("should produce canonical upper-snake names", () => {
        assert.strictEqual(grpcStatusName(Code.NotFound), "NOT_FOUND");
        assert.strictEqual(grpcStatusName(Code.DeadlineExceeded), "DEADLINE_EXCEEDED");
        assert.strictEqual(grpcStatusName(Code.Unauthenticated), "UNAUTHENTICATED");
    });
});

describe("mappingFor", () => {
    it("should map NOT_FOUND to 404 and gRPC NOT_FOUND", () => {
        assert.deepStrictEqual(mappingFor(AppCode.NotFound, AppErrorKind.NotFound), {
            httpStatus: 404,
            grpc: { name: "NOT_FOUND", value: Code.NotFound },
            problemType: "https://errors.faultline.dev/not-found",
            kind: AppErrorKind.NotFound,
        });
    });

    it("should give codes with their own semantics their own row", () => {
        const mapping = mappingFor(AppCode.UserAlreadyExists, AppErrorKind.Conflict);
        assert.strictEqual(mapping.problemType, `${PROBLEM_TYPE_BASE}user-already-exists`);
        assert.strictEqual(mapping.httpStatus, 409);
        assert.strictEqual(mapping.grpc.value, Code.AlreadyExists);
    });

    it("should fall back to the kind for custom codes", () => {
        const mapping = mappingFor(AppCode.of("PAYMENT_DECLINED"), AppErrorKind.BadRequest);
        assert.strictEqual(mapping, KIND_MAPPINGS.BadRequest);
        assert.strictEqual(mapping.grpc.name, "INVALID_ARGUMENT");
    });
});

describe("mappingForCode", () => {
    it("should cover every built-in code", () => {
        for (const kind of ALL_KINDS) {
            assert.ok(mappingForCode(AppCode.fromKind(kind)), kind);
        }
        assert.strictEqual(CODE_MAPPINGS.size, ALL_KINDS.length + 1);
    });

    it("should return undefined for unregistered codes", () => {
        assert.strictEqual(mappingForCode(AppCode.of("PAYMENT_DECLINED")), undefined);
    });
});

describe("KIND_MAPPINGS", () => {
    it("should agree with the kind's HTTP status", () => {
        for (const kind of ALL_KINDS) {
            assert.strictEqual(KIND_MAPPINGS[kind].httpStatus, kindHttpStatus(kind), kind);
            assert.strictEqual(KIND_MAPPINGS[kind].kind, kind);
            assert.ok(KIND_MAPPINGS[kind].problemType.startsWith(PROBLEM_TYPE_BASE));
        }
    });

    it("should map transient failures to UNAVAILABLE", () => {
        assert.strictEqual(KIND_MAPPINGS.Network.grpc.name, "UNAVAILABLE");
        assert.strictEqual(KIND_MAPPINGS.DependencyUnavailable.grpc.name, "UNAVAILABLE");
        assert.strictEqual(KIND_MAPPINGS.RateLimited.grpc.name, "RESOURCE_EXHAUSTED");
        assert.strictEqual(KIND_MAPPINGS.Timeout.grpc.name, "DEADLINE_EXCEEDED");
    });
});
