/**
 * Telemetry sinks for error records
 *
 * The error core only knows the contract of its collaborators: a counter
 * keyed by `(code, category)` and a structured event sink that can report
 * whether anyone listens. `@faultline/otel` provides OpenTelemetry-backed
 * implementations; without configuration both sinks are no-ops.
 *
 * @module telemetry
 */

/**
 * Labels attached to every error counter increment
 */
export interface ErrorLabels {
    readonly code: string;
    readonly category: string;
}

/**
 * Counter sink (`error_total`)
 */
export interface ErrorCounter {
    increment(labels: ErrorLabels): void;
}

/**
 * Severity levels understood by event sinks
 */
export const EventLevel = {
    Debug: "debug",
    Info: "info",
    Warn: "warn",
    Error: "error",
} as const;

export type EventLevel = (typeof EventLevel)[keyof typeof EventLevel];

/**
 * Structured event emitted once per meaningful error state change
 */
export interface ErrorEvent {
    readonly level: EventLevel;
    readonly message: string;
    readonly code: string;
    readonly category: string;
    /** Omitted when the message is redactable */
    readonly errorMessage?: string | undefined;
    readonly retrySeconds?: number | undefined;
    readonly redactable: boolean;
    readonly metadataLength: number;
    readonly wwwAuthenticate?: string | undefined;
}

/**
 * Structured event sink
 */
export interface ErrorEventSink {
    /** Whether any subscriber is interested in events of this level */
    enabled(level: EventLevel): boolean;
    /** Drop cached interest so late subscribers are seen on the next check */
    rebuildInterest(): void;
    emit(event: ErrorEvent): void;
}

export interface ErrorTelemetryOptions {
    counter?: ErrorCounter | undefined;
    events?: ErrorEventSink | undefined;
}

let counter: ErrorCounter | undefined;
let events: ErrorEventSink | undefined;

/**
 * Install telemetry sinks. Sinks not given are cleared.
 *
 * @example
 * ```typescript
 * configureErrorTelemetry({
 *     counter: { increment: ({ code, category }) => stats.inc("errors", { code, category }) },
 * });
 * ```
 */
export function configureErrorTelemetry(options: ErrorTelemetryOptions): void {
    counter = options.counter;
    events = options.events;
}

export function getErrorCounter(): ErrorCounter | undefined {
    return counter;
}

export function getErrorEventSink(): ErrorEventSink | undefined {
    return events;
}
