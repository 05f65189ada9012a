/**
 * Production rendering
 *
 * Public JSON: no source chain, no backtrace, no diagnostics, and only
 * metadata fields whose redaction is `None`.
 *
 * @module render/prod
 */

import type { AppError } from "../AppError.ts";
import type { FieldJson } from "../field.ts";
import { fieldValueToJson } from "../field.ts";
import { FieldRedaction } from "../redaction.ts";
import type { PayloadHeader } from "./helpers.ts";
import { buildHeader } from "./helpers.ts";

export interface ProdPayload extends PayloadHeader {
    metadata?: Record<string, FieldJson>;
}

export function prodPayload(error: AppError): ProdPayload {
    const payload: ProdPayload = buildHeader(error);

    const metadata: Record<string, FieldJson> = {};
    let count = 0;
    for (const [name, value, redaction] of error.metadata.iterWithRedaction()) {
        if (redaction !== FieldRedaction.None) continue;
        metadata[name] = fieldValueToJson(value);
        count++;
    }
    if (count > 0) {
        payload.metadata = metadata;
    }
    return payload;
}

/**
 * @example
 * ```typescript
 * renderProd(AppError.notFound("no such user"));
 * // {"kind":"NotFound","code":"NOT_FOUND","message":"no such user"}
 * ```
 */
export function renderProd(error: AppError): string {
    return JSON.stringify(prodPayload(error));
}
