/**
 * RFC 7807 problem details
 *
 * @module ProblemJson
 */

import type { AppCode } from "./AppCode.ts";
import type { AppError } from "./AppError.ts";
import type { ErrorResponse } from "./ErrorResponse.ts";
import type { FieldJson } from "./field.ts";
import { fieldValueToJson } from "./field.ts";
import { AppErrorKind, kindHttpStatus, kindLabel } from "./kind.ts";
import type { GrpcStatus } from "./mapping.ts";
import { mappingFor, mappingForCode } from "./mapping.ts";
import type { ReadonlyMetadata } from "./Metadata.ts";
import { FieldRedaction, applyRedaction } from "./redaction.ts";

export const PROBLEM_JSON_CONTENT_TYPE = "application/problem+json";

export interface ProblemJsonBody {
    type?: string;
    title: string;
    status: number;
    detail?: string;
    code: string;
    grpc?: GrpcStatus;
    metadata?: Record<string, FieldJson>;
}

interface ProblemJsonInit {
    type: string | undefined;
    title: string;
    status: number;
    detail: string | undefined;
    code: AppCode;
    grpc: GrpcStatus | undefined;
    metadata: Record<string, FieldJson> | undefined;
    retryAfter: number | undefined;
    wwwAuthenticate: string | undefined;
}

/**
 * Public metadata: unredacted values as they are, `Redact` fields as a
 * placeholder, hashed and masked values transformed. Fields with no
 * masked form (booleans under `Last4`) are left out.
 */
function publicMetadata(metadata: ReadonlyMetadata): Record<string, FieldJson> | undefined {
    const result: Record<string, FieldJson> = {};
    let count = 0;
    for (const [name, value, redaction] of metadata.iterWithRedaction()) {
        const rendered = redaction === FieldRedaction.None ? fieldValueToJson(value) : applyRedaction(value, redaction);
        if (rendered === undefined) continue;
        result[name] = rendered;
        count++;
    }
    return count > 0 ? result : undefined;
}

/**
 * Problem details document. `Retry-After` and `WWW-Authenticate` travel as
 * headers, not in the body.
 */
export class ProblemJson {
    readonly type: string | undefined;
    readonly title: string;
    readonly status: number;
    readonly detail: string | undefined;
    readonly code: AppCode;
    readonly grpc: GrpcStatus | undefined;
    readonly metadata: Record<string, FieldJson> | undefined;
    readonly retryAfter: number | undefined;
    readonly wwwAuthenticate: string | undefined;

    private constructor(init: ProblemJsonInit) {
        this.type = init.type;
        this.title = init.title;
        this.status = init.status;
        this.detail = init.detail;
        this.code = init.code;
        this.grpc = init.grpc;
        this.metadata = init.metadata;
        this.retryAfter = init.retryAfter;
        this.wwwAuthenticate = init.wwwAuthenticate;
    }

    /**
     * Flushes the error's pending telemetry, then builds the document. A
     * redactable error has neither `detail` nor `metadata`.
     */
    static fromAppError(error: AppError): ProblemJson {
        error.emitTelemetry();

        const mapping = mappingFor(error.code, error.kind);
        const redacted = error.isRedacted;
        return new ProblemJson({
            type: mapping.problemType,
            title: kindLabel(error.kind),
            status: kindHttpStatus(error.kind),
            detail: redacted ? undefined : error.renderMessage(),
            code: error.code,
            grpc: mapping.grpc,
            metadata: redacted ? undefined : publicMetadata(error.metadata),
            retryAfter: error.retry?.afterSeconds,
            wwwAuthenticate: error.wwwAuthenticate,
        });
    }

    static fromErrorResponse(response: ErrorResponse): ProblemJson {
        const mapping = mappingForCode(response.code);
        return new ProblemJson({
            type: mapping?.problemType,
            title: kindLabel(mapping?.kind ?? AppErrorKind.Internal),
            status: response.status,
            detail: response.message === "" ? undefined : response.message,
            code: response.code,
            grpc: mapping?.grpc,
            metadata: undefined,
            retryAfter: response.retry?.afterSeconds,
            wwwAuthenticate: response.wwwAuthenticate,
        });
    }

    /**
     * Response headers implied by the document.
     */
    headers(): Record<string, string> {
        const headers: Record<string, string> = { "Content-Type": PROBLEM_JSON_CONTENT_TYPE };
        if (this.retryAfter !== undefined) headers["Retry-After"] = String(this.retryAfter);
        if (this.wwwAuthenticate !== undefined) headers["WWW-Authenticate"] = this.wwwAuthenticate;
        return headers;
    }

    toJSON(): ProblemJsonBody {
        const body: ProblemJsonBody = {
            title: this.title,
            status: this.status,
            code: this.code.toString(),
        };
        if (this.type !== undefined) body.type = this.type;
        if (this.detail !== undefined) body.detail = this.detail;
        if (this.grpc) body.grpc = this.grpc;
        if (this.metadata) body.metadata = this.metadata;
        return body;
    }
}
