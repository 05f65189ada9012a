/**
 * Shared type definitions for @faultline/core
 *
 * @module types
 */

import type { AppCode } from "./AppCode.ts";
import type { CapturedBacktrace } from "./backtrace.ts";
import type { Field } from "./field.ts";
import type { FieldRedaction, MessageEditPolicy } from "./redaction.ts";

/**
 * Retry advice (`Retry-After`)
 */
export interface RetryAdvice {
    readonly afterSeconds: number;
}

/**
 * Structured payload attached to an error
 */
export type ErrorDetails = { readonly type: "json"; readonly value: unknown } | { readonly type: "text"; readonly value: string };

/**
 * How the causal source was attached.
 *
 * `owned` sources belong to this record alone; `shared` sources may be
 * referenced by several records (and their clones) and must be treated as
 * read-only.
 */
export type SourceAttachment = { readonly ownership: "owned"; readonly error: unknown } | { readonly ownership: "shared"; readonly error: unknown };

/**
 * Options accepted by the {@link AppError} constructor.
 *
 * Everything given here is applied before telemetry fires, so a record built
 * in one step emits exactly once.
 */
export interface AppErrorOptions {
    code?: AppCode | undefined;
    fields?: Iterable<Field> | undefined;
    /** Per-name policies, applied to present fields and registered for later ones */
    redactions?: Iterable<readonly [string, FieldRedaction]> | undefined;
    editPolicy?: MessageEditPolicy | undefined;
    source?: SourceAttachment | undefined;
    retry?: RetryAdvice | undefined;
    wwwAuthenticate?: string | undefined;
    details?: ErrorDetails | undefined;
    backtrace?: CapturedBacktrace | undefined;
}
