/**
 * The error record
 *
 * @module AppError
 */

import { AppCode } from "./AppCode.ts";
import type { CapturedBacktrace } from "./backtrace.ts";
import { captureBacktraceSnapshot } from "./backtrace.ts";
import { walkCauses } from "./cause.ts";
import type { DiagnosticVisibility } from "./Diagnostics.ts";
import { Diagnostics } from "./Diagnostics.ts";
import type { DisplayMode } from "./displayMode.ts";
import { currentDisplayMode } from "./displayMode.ts";
import type { Field } from "./field.ts";
import type { AppErrorKind } from "./kind.ts";
import { AppErrorKind as Kind, kindLabel } from "./kind.ts";
import type { ReadonlyMetadata } from "./Metadata.ts";
import { Metadata } from "./Metadata.ts";
import type { FieldRedaction } from "./redaction.ts";
import { MessageEditPolicy } from "./redaction.ts";
import { LOCAL_SOURCE_CHAIN_DEPTH, renderError } from "./render/index.ts";
import type { ErrorEvent } from "./telemetry.ts";
import { EventLevel, getErrorCounter, getErrorEventSink } from "./telemetry.ts";
import type { AppErrorOptions, ErrorDetails, RetryAdvice, SourceAttachment } from "./types.ts";

const EVENT_MESSAGE = "app error constructed";

/**
 * Structured application error.
 *
 * Carries a stable {@link AppCode}, a semantic {@link AppErrorKind}, an
 * optional message, typed metadata, diagnostics and an optional causal
 * source. Builder methods mutate the record and return it for chaining.
 *
 * Telemetry fires when a constructor returns and again after every builder
 * that changes externally observable state (code, fields, redaction, source,
 * retry, `WWW-Authenticate`). Repeated {@link emitTelemetry} calls without an
 * intervening change are no-ops.
 *
 * @example
 * ```typescript
 * throw AppError.notFound("user not found")
 *     .withField(field.str("user_id", id))
 *     .withHint("check the id is from the current tenant");
 * ```
 */
export class AppError extends Error {
    private kindValue: AppErrorKind;
    private codeValue: AppCode;
    private readonly messageValue: string | undefined;
    private metadataValue = new Metadata();
    private editPolicyValue: MessageEditPolicy;
    private retryValue: RetryAdvice | undefined;
    private wwwAuthenticateValue: string | undefined;
    private detailsValue: ErrorDetails | undefined;
    private sourceValue: SourceAttachment | undefined;
    private explicitBacktrace: CapturedBacktrace | undefined;
    /** `null` once capture was attempted and produced nothing */
    private capturedBacktrace: CapturedBacktrace | null | undefined;
    private diagnosticsValue: Diagnostics | undefined;
    private telemetryDirty = false;
    private tracingDirty = false;

    constructor(kind: AppErrorKind, message?: string, options: AppErrorOptions = {}) {
        super(message ?? kindLabel(kind));
        this.name = "AppError";
        this.kindValue = kind;
        this.codeValue = options.code ?? AppCode.fromKind(kind);
        this.messageValue = message;
        this.editPolicyValue = options.editPolicy ?? MessageEditPolicy.Preserve;
        this.retryValue = options.retry;
        this.wwwAuthenticateValue = options.wwwAuthenticate;
        this.detailsValue = options.details;
        this.explicitBacktrace = options.backtrace;
        if (options.fields) {
            this.metadataValue.extend(options.fields);
        }
        for (const [name, redaction] of options.redactions ?? []) {
            this.metadataValue.setRedaction(name, redaction);
        }
        if (options.source) {
            this.attach(options.source);
        }
        this.markDirty();
        this.emitTelemetry();
    }

    // =========================================================================
    // CONSTRUCTORS
    // =========================================================================

    /** Error with no message; renders the kind's label */
    static bare(kind: AppErrorKind): AppError {
        return new AppError(kind);
    }

    static notFound(message: string): AppError {
        return new AppError(Kind.NotFound, message);
    }

    static validation(message: string): AppError {
        return new AppError(Kind.Validation, message);
    }

    static conflict(message: string): AppError {
        return new AppError(Kind.Conflict, message);
    }

    static unauthorized(message: string): AppError {
        return new AppError(Kind.Unauthorized, message);
    }

    static forbidden(message: string): AppError {
        return new AppError(Kind.Forbidden, message);
    }

    static notImplemented(message: string): AppError {
        return new AppError(Kind.NotImplemented, message);
    }

    static internal(message: string): AppError {
        return new AppError(Kind.Internal, message);
    }

    static badRequest(message: string): AppError {
        return new AppError(Kind.BadRequest, message);
    }

    static database(message?: string): AppError {
        return new AppError(Kind.Database, message);
    }

    static service(message: string): AppError {
        return new AppError(Kind.Service, message);
    }

    static config(message: string): AppError {
        return new AppError(Kind.Config, message);
    }

    static timeout(message: string): AppError {
        return new AppError(Kind.Timeout, message);
    }

    static network(message: string): AppError {
        return new AppError(Kind.Network, message);
    }

    static rateLimited(message: string): AppError {
        return new AppError(Kind.RateLimited, message);
    }

    static dependencyUnavailable(message: string): AppError {
        return new AppError(Kind.DependencyUnavailable, message);
    }

    /** Same as {@link dependencyUnavailable} */
    static serviceUnavailable(message: string): AppError {
        return new AppError(Kind.DependencyUnavailable, message);
    }

    static serialization(message: string): AppError {
        return new AppError(Kind.Serialization, message);
    }

    static deserialization(message: string): AppError {
        return new AppError(Kind.Deserialization, message);
    }

    static externalApi(message: string): AppError {
        return new AppError(Kind.ExternalApi, message);
    }

    static queue(message: string): AppError {
        return new AppError(Kind.Queue, message);
    }

    static cache(message: string): AppError {
        return new AppError(Kind.Cache, message);
    }

    /**
     * Promote anything thrown into an AppError.
     *
     * AppErrors are returned unchanged. Anything else becomes the owned source
     * of a message-less error of the given kind, so the foreign message is
     * only shown where the source chain is.
     */
    static from(value: unknown, kind: AppErrorKind = Kind.Internal): AppError {
        if (value instanceof AppError) return value;
        return new AppError(kind, undefined, { source: { ownership: "owned", error: value } });
    }

    // =========================================================================
    // ACCESSORS
    // =========================================================================

    get kind(): AppErrorKind {
        return this.kindValue;
    }

    get code(): AppCode {
        return this.codeValue;
    }

    /** The message given at construction, if any */
    get explicitMessage(): string | undefined {
        return this.messageValue;
    }

    /** Read-only view; change fields through {@link withField} and {@link redactField} */
    get metadata(): ReadonlyMetadata {
        return this.metadataValue;
    }

    get editPolicy(): MessageEditPolicy {
        return this.editPolicyValue;
    }

    get isRedacted(): boolean {
        return this.editPolicyValue === MessageEditPolicy.Redact;
    }

    get retry(): RetryAdvice | undefined {
        return this.retryValue;
    }

    get wwwAuthenticate(): string | undefined {
        return this.wwwAuthenticateValue;
    }

    get details(): ErrorDetails | undefined {
        return this.detailsValue;
    }

    get diagnostics(): Diagnostics | undefined {
        return this.diagnosticsValue;
    }

    /** The causal source, whatever its ownership */
    get source(): unknown {
        return this.sourceValue?.error;
    }

    get sourceAttachment(): SourceAttachment | undefined {
        return this.sourceValue;
    }

    /**
     * Message text, falling back to the kind's label. Ignores the edit
     * policy: callers rendering for untrusted audiences check it themselves.
     */
    renderMessage(): string {
        return this.messageValue ?? kindLabel(this.kindValue);
    }

    /**
     * Message text for semi-trusted output: the kind's label when the message
     * is redactable. Used when this error is a level of another's source chain.
     */
    publicMessage(): string {
        return this.isRedacted ? kindLabel(this.kindValue) : this.renderMessage();
    }

    /**
     * Attached backtrace if one was given, otherwise the lazily captured one.
     */
    backtrace(): CapturedBacktrace | undefined {
        return this.explicitBacktrace ?? this.capturedBacktrace ?? undefined;
    }

    /**
     * This error followed by its causal chain.
     */
    *chain(maxDepth: number = LOCAL_SOURCE_CHAIN_DEPTH): Generator<unknown> {
        yield this;
        if (this.sourceValue) {
            yield* walkCauses(this.sourceValue.error, maxDepth);
        }
    }

    /**
     * Deepest reachable cause, or this error when it has no source.
     */
    rootCause(): unknown {
        let last: unknown = this;
        for (const level of this.chain()) {
            last = level;
        }
        return last;
    }

    /**
     * First cause in the chain that is an instance of `type`.
     */
    findSource<T>(type: abstract new (...args: never[]) => T): T | undefined {
        for (const level of this.chain()) {
            if (level !== this && level instanceof type) return level;
        }
        return undefined;
    }

    /**
     * Render for the given display mode (the process-wide mode by default).
     */
    render(mode: DisplayMode = currentDisplayMode()): string {
        return renderError(this, mode);
    }

    override toString(): string {
        return this.render();
    }

    // =========================================================================
    // BUILDERS
    // =========================================================================

    withCode(code: AppCode): this {
        this.codeValue = code;
        return this.changed();
    }

    /** Override the kind; the code is left as is */
    withKind(kind: AppErrorKind): this {
        this.kindValue = kind;
        return this.changed();
    }

    withField(field: Field): this {
        this.metadataValue.insert(field);
        return this.changed();
    }

    withFields(fields: Iterable<Field>): this {
        this.metadataValue.extend(fields);
        return this.changed();
    }

    /** Replace the metadata store */
    withMetadata(metadata: ReadonlyMetadata): this {
        this.metadataValue = metadata.clone();
        return this.changed();
    }

    redactField(name: string, redaction: FieldRedaction): this {
        this.metadataValue.setRedaction(name, redaction);
        return this.changed();
    }

    /** Mark the message as sensitive; public renderings fall back to the kind label */
    redactable(): this {
        this.editPolicyValue = MessageEditPolicy.Redact;
        return this.changed();
    }

    withRetryAfterSecs(seconds: number): this {
        if (!Number.isInteger(seconds) || seconds < 0) {
            throw new RangeError(`retry-after must be a non-negative integer, got ${seconds}`);
        }
        this.retryValue = { afterSeconds: seconds };
        return this.changed();
    }

    withWwwAuthenticate(challenge: string): this {
        this.wwwAuthenticateValue = challenge;
        return this.changed();
    }

    withDetailsJson(value: unknown): this {
        this.detailsValue = { type: "json", value };
        return this;
    }

    withDetailsText(text: string): this {
        this.detailsValue = { type: "text", value: text };
        return this;
    }

    /** Attach a source owned by this record */
    withSource(error: unknown): this {
        this.attach({ ownership: "owned", error });
        return this.changed();
    }

    /** Attach a source that other records may reference too */
    withSharedSource(error: unknown): this {
        this.attach({ ownership: "shared", error });
        return this.changed();
    }

    /** Attach an explicit backtrace; it always wins over lazy capture */
    withBacktrace(backtrace: CapturedBacktrace): this {
        this.explicitBacktrace = backtrace;
        return this;
    }

    withHint(message: string): this {
        this.ensureDiagnostics().pushHint(message);
        return this;
    }

    withHintVisible(message: string, visibility: DiagnosticVisibility): this {
        this.ensureDiagnostics().pushHint(message, visibility);
        return this;
    }

    withSuggestion(message: string): this {
        this.ensureDiagnostics().pushSuggestion(message);
        return this;
    }

    withSuggestionVisible(message: string, visibility: DiagnosticVisibility): this {
        this.ensureDiagnostics().pushSuggestion(message, undefined, visibility);
        return this;
    }

    withSuggestionCommand(message: string, command: string, visibility?: DiagnosticVisibility): this {
        this.ensureDiagnostics().pushSuggestion(message, command, visibility);
        return this;
    }

    /** Doc links are public unless a visibility is given */
    withDocs(url: string, visibility?: DiagnosticVisibility): this {
        this.ensureDiagnostics().setDocLink(url, undefined, visibility);
        return this;
    }

    withDocsTitled(url: string, title: string, visibility?: DiagnosticVisibility): this {
        this.ensureDiagnostics().setDocLink(url, title, visibility);
        return this;
    }

    withRelatedCode(code: AppCode | string): this {
        this.ensureDiagnostics().pushRelatedCode(code.toString());
        return this;
    }

    // =========================================================================
    // TELEMETRY
    // =========================================================================

    /**
     * Flush pending telemetry: on the first call after a change, capture the
     * backtrace (if enabled) and increment `error_total`; then emit the
     * structured event if a subscriber is interested.
     */
    emitTelemetry(): void {
        if (this.takeDirty()) {
            this.captureBacktrace();
            getErrorCounter()?.increment({ code: this.codeValue.toString(), category: this.kindValue });
        }
        this.flushTracing();
    }

    /**
     * Emit the structured event now, regardless of pending state.
     */
    log(): void {
        const sink = getErrorEventSink();
        if (sink?.enabled(EventLevel.Error)) {
            sink.emit(this.toEvent());
        }
    }

    private markDirty(): void {
        this.telemetryDirty = true;
        this.tracingDirty = true;
    }

    private takeDirty(): boolean {
        const dirty = this.telemetryDirty;
        this.telemetryDirty = false;
        return dirty;
    }

    private takeTracingDirty(): boolean {
        const dirty = this.tracingDirty;
        this.tracingDirty = false;
        return dirty;
    }

    private flushTracing(): void {
        if (!this.takeTracingDirty()) return;

        const sink = getErrorEventSink();
        if (!sink) {
            this.tracingDirty = true;
            return;
        }
        if (!sink.enabled(EventLevel.Error)) {
            sink.rebuildInterest();
            if (!sink.enabled(EventLevel.Error)) {
                this.tracingDirty = true;
                return;
            }
        }
        sink.emit(this.toEvent());
    }

    private captureBacktrace(): CapturedBacktrace | undefined {
        if (this.explicitBacktrace) return this.explicitBacktrace;
        if (this.capturedBacktrace === undefined) {
            this.capturedBacktrace = captureBacktraceSnapshot(AppError.prototype.emitTelemetry) ?? null;
        }
        return this.capturedBacktrace ?? undefined;
    }

    private toEvent(): ErrorEvent {
        return {
            level: EventLevel.Error,
            message: EVENT_MESSAGE,
            code: this.codeValue.toString(),
            category: this.kindValue,
            errorMessage: this.isRedacted ? undefined : this.messageValue,
            retrySeconds: this.retryValue?.afterSeconds,
            redactable: this.isRedacted,
            metadataLength: this.metadataValue.size,
            wwwAuthenticate: this.wwwAuthenticateValue,
        };
    }

    private changed(): this {
        this.markDirty();
        this.emitTelemetry();
        return this;
    }

    private attach(source: SourceAttachment): void {
        this.sourceValue = source;
        this.cause = source.error;
    }

    private ensureDiagnostics(): Diagnostics {
        if (!this.diagnosticsValue) {
            this.diagnosticsValue = new Diagnostics();
        }
        return this.diagnosticsValue;
    }
}
