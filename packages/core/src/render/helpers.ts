/**
 * Shared pieces of the structured renderers
 *
 * @module render/helpers
 */

import type { AppError } from "../AppError.ts";
import type { AppErrorKind } from "../kind.ts";
import { kindLabel } from "../kind.ts";
import type { ErrorDetails } from "../types.ts";

/** Maximum causal levels in a staging `source_chain` */
export const STAGING_SOURCE_CHAIN_DEPTH = 5;

/** Maximum causal levels printed in local mode */
export const LOCAL_SOURCE_CHAIN_DEPTH = 32;

/**
 * Fields every structured rendering starts with
 */
export interface PayloadHeader {
    kind: AppErrorKind;
    code: string;
    message?: string;
    details?: unknown;
}

/**
 * Round-trip a value through JSON. Anything `JSON.stringify` rejects
 * (cycles, `bigint`) or drops entirely yields `undefined`.
 */
export function toPlainJson(value: unknown): unknown {
    let text: string | undefined;
    try {
        text = JSON.stringify(value);
    } catch {
        return undefined;
    }
    return text === undefined ? undefined : JSON.parse(text);
}

/**
 * Details suitable for output, or `undefined` when they cannot be serialized.
 */
export function renderableDetails(details: ErrorDetails | undefined): unknown {
    if (details === undefined) return undefined;
    if (details.type === "text") return details.value;
    return toPlainJson(details.value);
}

/**
 * `kind`, `code`, then the message and details unless the message is
 * redactable. A redacted message becomes the kind's label.
 */
export function buildHeader(error: AppError): PayloadHeader {
    const header: PayloadHeader = { kind: error.kind, code: error.code.toString() };
    if (error.isRedacted) {
        header.message = kindLabel(error.kind);
        return header;
    }
    if (error.explicitMessage !== undefined) {
        header.message = error.explicitMessage;
    }
    const details = renderableDetails(error.details);
    if (details !== undefined) {
        header.details = details;
    }
    return header;
}
