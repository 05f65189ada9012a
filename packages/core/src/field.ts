/**
 * Typed metadata fields
 *
 * @module field
 */

import { isIP } from "node:net";
import { z } from "zod";
import { FieldRedaction, inferFieldRedaction } from "./redaction.ts";

/**
 * Immutable tagged value carried by a metadata field.
 */
export type FieldValue =
    | { readonly type: "str"; readonly value: string }
    | { readonly type: "i64"; readonly value: bigint }
    | { readonly type: "u64"; readonly value: bigint }
    | { readonly type: "f64"; readonly value: number }
    | { readonly type: "bool"; readonly value: boolean }
    | { readonly type: "uuid"; readonly value: string }
    | { readonly type: "duration"; readonly value: number }
    | { readonly type: "ip"; readonly value: string };

export type FieldValueType = FieldValue["type"];

/**
 * JSON shape of a field value.
 */
export type FieldJson = string | number | boolean | null | { ms: number };

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;
const U64_MAX = 2n ** 64n - 1n;

const UuidSchema = z.string().uuid();

/**
 * A named, typed metadata value with its redaction policy.
 *
 * The default policy is inferred from the name (see {@link inferFieldRedaction});
 * `withRedaction` returns a copy with an explicit one.
 */
export class Field {
    readonly name: string;
    readonly value: FieldValue;
    readonly redaction: FieldRedaction;

    constructor(name: string, value: FieldValue, redaction: FieldRedaction = inferFieldRedaction(name)) {
        this.name = name;
        this.value = Object.freeze(value);
        this.redaction = redaction;
    }

    withRedaction(redaction: FieldRedaction): Field {
        return redaction === this.redaction ? this : new Field(this.name, this.value, redaction);
    }
}

function toInteger(value: number | bigint, min: bigint, max: bigint, type: string): bigint {
    if (typeof value === "number" && !Number.isInteger(value)) {
        throw new RangeError(`${type} field value must be an integer, got ${value}`);
    }
    const big = BigInt(value);
    if (big < min || big > max) {
        throw new RangeError(`${type} field value out of range: ${big}`);
    }
    return big;
}

/**
 * Field constructors.
 *
 * @example
 * ```typescript
 * error.withField(field.str("user_id", "u-42")).withField(field.u64("attempt", 3));
 * ```
 */
export const field = {
    str(name: string, value: string): Field {
        return new Field(name, { type: "str", value });
    },

    i64(name: string, value: number | bigint): Field {
        return new Field(name, { type: "i64", value: toInteger(value, I64_MIN, I64_MAX, "i64") });
    },

    u64(name: string, value: number | bigint): Field {
        return new Field(name, { type: "u64", value: toInteger(value, 0n, U64_MAX, "u64") });
    },

    f64(name: string, value: number): Field {
        return new Field(name, { type: "f64", value });
    },

    bool(name: string, value: boolean): Field {
        return new Field(name, { type: "bool", value });
    },

    /**
     * @throws TypeError if the value is not a UUID
     */
    uuid(name: string, value: string): Field {
        const parsed = UuidSchema.safeParse(value);
        if (!parsed.success) {
            throw new TypeError(`uuid field "${name}" expects a UUID, got "${value}"`);
        }
        return new Field(name, { type: "uuid", value: parsed.data.toLowerCase() });
    },

    /**
     * @param milliseconds - Non-negative duration in milliseconds
     */
    duration(name: string, milliseconds: number): Field {
        if (!Number.isFinite(milliseconds) || milliseconds < 0) {
            throw new RangeError(`duration field "${name}" must be a non-negative finite number`);
        }
        return new Field(name, { type: "duration", value: milliseconds });
    },

    /**
     * @throws TypeError if the value is not an IPv4 or IPv6 address
     */
    ip(name: string, value: string): Field {
        if (isIP(value) === 0) {
            throw new TypeError(`ip field "${name}" expects an IP address, got "${value}"`);
        }
        return new Field(name, { type: "ip", value });
    },
};

/**
 * Format a duration in milliseconds as seconds with trailing zeros trimmed,
 * e.g. `1500` → `"1.5s"`, `2000` → `"2s"`.
 */
export function formatDuration(milliseconds: number): string {
    const seconds = milliseconds / 1000;
    return `${Number.parseFloat(seconds.toFixed(6))}s`;
}

/**
 * Textual form used by the local renderer and the redaction transforms.
 */
export function formatFieldValue(value: FieldValue): string {
    switch (value.type) {
        case "str":
        case "uuid":
        case "ip":
            return value.value;
        case "i64":
        case "u64":
            return value.value.toString();
        case "f64":
            return String(value.value);
        case "bool":
            return value.value ? "true" : "false";
        case "duration":
            return formatDuration(value.value);
    }
}

/**
 * JSON form used by the structured renderers.
 *
 * Integers outside the safe range are emitted as decimal strings so they
 * survive `JSON.parse` on the other side.
 */
export function fieldValueToJson(value: FieldValue): FieldJson {
    switch (value.type) {
        case "str":
        case "uuid":
        case "ip":
            return value.value;
        case "i64":
        case "u64": {
            const asNumber = Number(value.value);
            return Number.isSafeInteger(asNumber) ? asNumber : value.value.toString();
        }
        case "f64":
            return Number.isFinite(value.value) ? value.value : null;
        case "bool":
            return value.value;
        case "duration":
            return { ms: value.value };
    }
}
