/**
 * Staging rendering
 *
 * Prod shape plus a bounded `source_chain` and every metadata field that is
 * not `Redact`. Hashed and masked fields appear in their transformed form.
 * Chain levels that are redactable AppErrors show their kind label.
 *
 * @module render/staging
 */

import type { AppError } from "../AppError.ts";
import { causeChain } from "../cause.ts";
import type { FieldJson } from "../field.ts";
import { fieldValueToJson } from "../field.ts";
import { FieldRedaction, hashFieldValue, maskFieldValue } from "../redaction.ts";
import type { PayloadHeader } from "./helpers.ts";
import { STAGING_SOURCE_CHAIN_DEPTH, buildHeader } from "./helpers.ts";

export interface StagingPayload extends PayloadHeader {
    source_chain?: string[];
    metadata?: Record<string, FieldJson>;
}

export interface StagingRenderOptions {
    /** @default STAGING_SOURCE_CHAIN_DEPTH */
    maxSourceDepth?: number;
}

export function stagingPayload(error: AppError, options: StagingRenderOptions = {}): StagingPayload {
    const { maxSourceDepth = STAGING_SOURCE_CHAIN_DEPTH } = options;
    const payload: StagingPayload = buildHeader(error);

    const chain = causeChain(error.source, maxSourceDepth, { redact: true });
    if (chain.length > 0) {
        payload.source_chain = chain;
    }

    const metadata: Record<string, FieldJson> = {};
    let count = 0;
    for (const [name, value, redaction] of error.metadata.iterWithRedaction()) {
        let rendered: FieldJson | undefined;
        switch (redaction) {
            case FieldRedaction.Redact:
                continue;
            case FieldRedaction.None:
                rendered = fieldValueToJson(value);
                break;
            case FieldRedaction.Hash:
                rendered = hashFieldValue(value);
                break;
            case FieldRedaction.Last4:
                rendered = maskFieldValue(value);
                break;
        }
        if (rendered === undefined) continue;
        metadata[name] = rendered;
        count++;
    }
    if (count > 0) {
        payload.metadata = metadata;
    }
    return payload;
}

export function renderStaging(error: AppError, options?: StagingRenderOptions): string {
    return JSON.stringify(stagingPayload(error, options));
}
