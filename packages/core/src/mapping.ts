/**
 * Protocol mapping registry
 *
 * Constant tables translating codes and kinds into transport statuses.
 * gRPC statuses are ConnectRPC's {@link Code} values.
 *
 * @module mapping
 */

import { Code } from "@connectrpc/connect";
import { AppCode } from "./AppCode.ts";
import { AppErrorKind } from "./kind.ts";

/** Base of every problem-details `type` URI */
export const PROBLEM_TYPE_BASE = "https://errors.faultline.dev/";

export interface GrpcStatus {
    /** Canonical upper-case name, e.g. `NOT_FOUND` */
    readonly name: string;
    readonly value: Code;
}

export interface CodeMapping {
    readonly httpStatus: number;
    readonly grpc: GrpcStatus;
    readonly problemType: string;
    readonly kind: AppErrorKind;
}

/**
 * Canonical upper-snake name of a Connect code (`Code.NotFound` → `NOT_FOUND`).
 */
export function grpcStatusName(code: Code): string {
    const name: string | undefined = Code[code];
    return (name ?? String(code)).replace(/([a-z])([A-Z])/g, "$1_$2").toUpperCase();
}

function entry(httpStatus: number, grpc: Code, slug: string, kind: AppErrorKind): CodeMapping {
    return {
        httpStatus,
        grpc: { name: grpcStatusName(grpc), value: grpc },
        problemType: `${PROBLEM_TYPE_BASE}${slug}`,
        kind,
    };
}

/**
 * Mapping for every kind. Exhaustive by type: adding a kind without a row
 * here does not compile.
 */
export const KIND_MAPPINGS: Readonly<Record<AppErrorKind, CodeMapping>> = {
    [AppErrorKind.NotFound]: entry(404, Code.NotFound, "not-found", AppErrorKind.NotFound),
    [AppErrorKind.Validation]: entry(422, Code.InvalidArgument, "validation", AppErrorKind.Validation),
    [AppErrorKind.Conflict]: entry(409, Code.AlreadyExists, "conflict", AppErrorKind.Conflict),
    [AppErrorKind.Unauthorized]: entry(401, Code.Unauthenticated, "unauthorized", AppErrorKind.Unauthorized),
    [AppErrorKind.Forbidden]: entry(403, Code.PermissionDenied, "forbidden", AppErrorKind.Forbidden),
    [AppErrorKind.NotImplemented]: entry(501, Code.Unimplemented, "not-implemented", AppErrorKind.NotImplemented),
    [AppErrorKind.Internal]: entry(500, Code.Internal, "internal", AppErrorKind.Internal),
    [AppErrorKind.BadRequest]: entry(400, Code.InvalidArgument, "bad-request", AppErrorKind.BadRequest),
    [AppErrorKind.Database]: entry(500, Code.Internal, "database", AppErrorKind.Database),
    [AppErrorKind.Service]: entry(500, Code.Internal, "service", AppErrorKind.Service),
    [AppErrorKind.Config]: entry(500, Code.Internal, "config", AppErrorKind.Config),
    [AppErrorKind.Timeout]: entry(504, Code.DeadlineExceeded, "timeout", AppErrorKind.Timeout),
    [AppErrorKind.Network]: entry(503, Code.Unavailable, "network", AppErrorKind.Network),
    [AppErrorKind.RateLimited]: entry(429, Code.ResourceExhausted, "rate-limited", AppErrorKind.RateLimited),
    [AppErrorKind.DependencyUnavailable]: entry(503, Code.Unavailable, "dependency-unavailable", AppErrorKind.DependencyUnavailable),
    [AppErrorKind.Serialization]: entry(500, Code.Internal, "serialization", AppErrorKind.Serialization),
    [AppErrorKind.Deserialization]: entry(500, Code.Internal, "deserialization", AppErrorKind.Deserialization),
    [AppErrorKind.ExternalApi]: entry(500, Code.Unavailable, "external-api", AppErrorKind.ExternalApi),
    [AppErrorKind.Queue]: entry(500, Code.Unavailable, "queue", AppErrorKind.Queue),
    [AppErrorKind.Cache]: entry(500, Code.Unavailable, "cache", AppErrorKind.Cache),
};

/**
 * Code-specific mappings, keyed by code string. Built-in codes that match a
 * kind share its row; codes with their own semantics get their own.
 */
export const CODE_MAPPINGS: ReadonlyMap<string, CodeMapping> = new Map<string, CodeMapping>([
    ...Object.values(AppErrorKind).map((kind): [string, CodeMapping] => [AppCode.fromKind(kind).toString(), KIND_MAPPINGS[kind]]),
    [AppCode.UserAlreadyExists.toString(), entry(409, Code.AlreadyExists, "user-already-exists", AppErrorKind.Conflict)],
]);

/**
 * Mapping for a code, falling back to the kind's row for custom codes.
 */
export function mappingFor(code: AppCode, kind: AppErrorKind): CodeMapping {
    return CODE_MAPPINGS.get(code.toString()) ?? KIND_MAPPINGS[kind];
}

/**
 * Mapping registered for a code, if any.
 */
export function mappingForCode(code: AppCode): CodeMapping | undefined {
    return CODE_MAPPINGS.get(code.toString());
}
