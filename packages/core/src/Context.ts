/**
 * Context builder for promoting foreign errors
 *
 * @module Context
 */

import { AppCode } from "./AppCode.ts";
import { AppError } from "./AppError.ts";
import type { Field } from "./field.ts";
import { field } from "./field.ts";
import type { AppErrorKind } from "./kind.ts";
import type { FieldRedaction } from "./redaction.ts";
import { MessageEditPolicy } from "./redaction.ts";

/**
 * Source location recorded by {@link Context.trackCaller}
 */
export interface CallerLocation {
    readonly file: string;
    readonly line: number;
    readonly column: number;
}

// "    at fn (file:///app/x.ts:10:5)" or "    at file:///app/x.ts:10:5"
const FRAME_LOCATION = /\(?([^()\s]+):(\d+):(\d+)\)?$/;

/**
 * Location of the first stack frame below `below`.
 */
// biome-ignore lint/complexity/noBannedTypes: captureStackTrace takes any function
function callerOf(below: Function): CallerLocation | undefined {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, below);
    const frame = (holder.stack ?? "")
        .split("\n")
        .map((line) => line.trim())
        .find((line) => line.startsWith("at "));
    const match = frame ? FRAME_LOCATION.exec(frame) : null;
    if (!match) return undefined;
    const [, file, line, column] = match;
    if (file === undefined || line === undefined || column === undefined) return undefined;
    return { file, line: Number(line), column: Number(column) };
}

/**
 * Accumulates fields, redaction overrides and caller location, then turns a
 * foreign error into an {@link AppError}.
 *
 * A context can be reused: every {@link intoError} call produces a fresh
 * record and emits its telemetry exactly once.
 *
 * @example
 * ```typescript
 * const ctx = new Context(AppErrorKind.Database)
 *     .with(field.str("table", "orders"))
 *     .redactField("dsn", FieldRedaction.Redact)
 *     .trackCaller();
 *
 * try {
 *     await pool.query(sql);
 * } catch (err) {
 *     throw ctx.intoError(err);
 * }
 * ```
 */
export class Context {
    private codeValue: AppCode;
    private categoryValue: AppErrorKind;
    private codeOverridden = false;
    private readonly fields: Field[] = [];
    private readonly policies = new Map<string, FieldRedaction>();
    private editPolicy: MessageEditPolicy = MessageEditPolicy.Preserve;
    private location: CallerLocation | undefined;

    constructor(category: AppErrorKind) {
        this.categoryValue = category;
        this.codeValue = AppCode.fromKind(category);
    }

    /** Override the code; later {@link category} calls keep it */
    code(code: AppCode): this {
        this.codeValue = code;
        this.codeOverridden = true;
        return this;
    }

    /** Change the category; the code follows unless it was overridden */
    category(category: AppErrorKind): this {
        this.categoryValue = category;
        if (!this.codeOverridden) {
            this.codeValue = AppCode.fromKind(category);
        }
        return this;
    }

    with(field: Field): this {
        const policy = this.policies.get(field.name);
        this.fields.push(policy === undefined ? field : field.withRedaction(policy));
        return this;
    }

    /**
     * Set a policy for a field name. Applies to fields already added and to
     * fields added later under the same name.
     */
    redactField(name: string, redaction: FieldRedaction): this {
        this.policies.set(name, redaction);
        for (let i = 0; i < this.fields.length; i++) {
            const current = this.fields[i];
            if (current?.name === name) {
                this.fields[i] = current.withRedaction(redaction);
            }
        }
        return this;
    }

    /** Toggle redaction of the resulting error's message */
    redact(redact: boolean): this {
        this.editPolicy = redact ? MessageEditPolicy.Redact : MessageEditPolicy.Preserve;
        return this;
    }

    /**
     * Record the location of the code calling this method. The resulting
     * errors carry it as `caller.file`, `caller.line` and `caller.column`.
     */
    trackCaller(): this {
        this.location = callerOf(Context.prototype.trackCaller);
        return this;
    }

    get callerLocation(): CallerLocation | undefined {
        return this.location;
    }

    /**
     * Build the error with `source` attached. Caller fields come first, then
     * the accumulated fields with their policies.
     */
    intoError(source: unknown): AppError {
        const fields: Field[] = [];
        if (this.location) {
            fields.push(
                field.str("caller.file", this.location.file),
                field.u64("caller.line", this.location.line),
                field.u64("caller.column", this.location.column),
            );
        }
        fields.push(...this.fields);

        return new AppError(this.categoryValue, undefined, {
            code: this.codeValue,
            fields,
            redactions: this.policies,
            editPolicy: this.editPolicy,
            source: { ownership: "owned", error: source },
        });
    }

    /**
     * Run `fn`, converting anything it throws through {@link intoError}.
     * An {@link AppError} thrown by `fn` is rethrown unchanged.
     */
    wrap<T>(fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            throw err instanceof AppError ? err : this.intoError(err);
        }
    }

    /**
     * Await `promise`, converting a rejection through {@link intoError}.
     * An {@link AppError} rejection passes through unchanged.
     */
    async wrapAsync<T>(promise: PromiseLike<T>): Promise<T> {
        try {
            return await promise;
        } catch (err) {
            throw err instanceof AppError ? err : this.intoError(err);
        }
    }
}
