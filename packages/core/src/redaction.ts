/**
 * Field redaction policies and transforms
 *
 * @module redaction
 */

import { createHash } from "node:crypto";
import type { FieldValue } from "./field.ts";
import { formatFieldValue } from "./field.ts";

/**
 * Per-field redaction policy.
 *
 * - `None`: value is shown as is
 * - `Redact`: value is never shown outside local mode
 * - `Hash`: value is replaced by its SHA-256 digest
 * - `Last4`: all but the last four characters are masked
 */
export const FieldRedaction = {
    None: "none",
    Redact: "redact",
    Hash: "hash",
    Last4: "last4",
} as const;

export type FieldRedaction = (typeof FieldRedaction)[keyof typeof FieldRedaction];

/**
 * Governs the top-level message only; independent of field redaction.
 */
export const MessageEditPolicy = {
    Preserve: "preserve",
    Redact: "redact",
} as const;

export type MessageEditPolicy = (typeof MessageEditPolicy)[keyof typeof MessageEditPolicy];

export const REDACTED_PLACEHOLDER = "[REDACTED]";

const SECRET_MARKERS = ["password", "passphrase", "secret", "authorization", "cookie", "session", "jwt", "bearer", "otp", "pin"];
const CARD_SEGMENTS = new Set(["card", "iban", "pan", "account", "acct"]);
const NUMBER_SEGMENTS = new Set(["number", "no", "id"]);

/**
 * Infer a default policy from a field name.
 *
 * Secrets are redacted outright, token and key material is hashed and
 * card/account numbers keep only their last four characters.
 */
export function inferFieldRedaction(name: string): FieldRedaction {
    const lowered = name.toLowerCase();
    if (SECRET_MARKERS.some((marker) => lowered.includes(marker))) {
        return FieldRedaction.Redact;
    }

    const hasToken = lowered.includes("token");
    const hasKey = lowered.includes("key");
    let cardLike = false;
    let numberLike = false;

    for (const segment of lowered.split(/[._\-:/]/)) {
        if (segment === "") continue;
        if (
            segment === "token" ||
            segment === "apikey" ||
            segment === "key" ||
            segment.endsWith("token") ||
            (segment === "api" && hasKey) ||
            ((segment === "access" || segment === "refresh") && hasToken)
        ) {
            return FieldRedaction.Hash;
        }
        if (CARD_SEGMENTS.has(segment)) cardLike = true;
        if (NUMBER_SEGMENTS.has(segment)) numberLike = true;
    }

    return cardLike && numberLike ? FieldRedaction.Last4 : FieldRedaction.None;
}

/**
 * SHA-256 hex digest of the value's textual form.
 */
export function hashFieldValue(value: FieldValue): string {
    return createHash("sha256").update(formatFieldValue(value)).digest("hex");
}

/**
 * Mask every character except the last four (or the last one when the value
 * has four characters or fewer).
 */
export function maskLast4(value: string): string {
    const chars = Array.from(value);
    if (chars.length === 0) return "";
    const keep = chars.length <= 4 ? 1 : 4;
    const maskLength = chars.length - keep;
    return "*".repeat(maskLength) + chars.slice(maskLength).join("");
}

/**
 * Masked form of a value, or `undefined` for values that have no meaningful
 * masked representation (booleans).
 */
export function maskFieldValue(value: FieldValue): string | undefined {
    if (value.type === "bool") return undefined;
    return maskLast4(formatFieldValue(value));
}

/**
 * Apply a non-`None` policy to a value for semi-trusted output.
 * `Redact` yields the placeholder; callers that must drop redacted fields
 * filter them before calling.
 */
export function applyRedaction(value: FieldValue, redaction: Exclude<FieldRedaction, "none">): string | undefined {
    switch (redaction) {
        case FieldRedaction.Redact:
            return REDACTED_PLACEHOLDER;
        case FieldRedaction.Hash:
            return hashFieldValue(value);
        case FieldRedaction.Last4:
            return maskFieldValue(value);
    }
}
