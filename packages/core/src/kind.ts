/**
 * Semantic error categories
 *
 * The closed taxonomy every {@link AppError} is classified under. Variants may
 * be added over time but are never removed or renamed: the string values are
 * part of the wire contract (`"kind"` in rendered payloads, `category` label
 * in metrics).
 *
 * @module kind
 */

export const AppErrorKind = {
    NotFound: "NotFound",
    Validation: "Validation",
    Conflict: "Conflict",
    Unauthorized: "Unauthorized",
    Forbidden: "Forbidden",
    NotImplemented: "NotImplemented",
    Internal: "Internal",
    BadRequest: "BadRequest",
    Database: "Database",
    Service: "Service",
    Config: "Config",
    Timeout: "Timeout",
    Network: "Network",
    RateLimited: "RateLimited",
    DependencyUnavailable: "DependencyUnavailable",
    Serialization: "Serialization",
    Deserialization: "Deserialization",
    ExternalApi: "ExternalApi",
    Queue: "Queue",
    Cache: "Cache",
} as const;

export type AppErrorKind = (typeof AppErrorKind)[keyof typeof AppErrorKind];

const KIND_LABELS: Record<AppErrorKind, string> = {
    NotFound: "Not found",
    Validation: "Validation error",
    Conflict: "Conflict",
    Unauthorized: "Unauthorized",
    Forbidden: "Forbidden",
    NotImplemented: "Not implemented",
    Internal: "Internal server error",
    BadRequest: "Bad request",
    Database: "Database error",
    Service: "Service error",
    Config: "Configuration error",
    Timeout: "Operation timed out",
    Network: "Network error",
    RateLimited: "Rate limit exceeded",
    DependencyUnavailable: "External dependency unavailable",
    Serialization: "Serialization error",
    Deserialization: "Deserialization error",
    ExternalApi: "External API error",
    Queue: "Queue processing error",
    Cache: "Cache error",
};

const KIND_HTTP_STATUS: Record<AppErrorKind, number> = {
    NotFound: 404,
    Validation: 422,
    Conflict: 409,
    Unauthorized: 401,
    Forbidden: 403,
    NotImplemented: 501,
    Internal: 500,
    BadRequest: 400,
    Database: 500,
    Service: 500,
    Config: 500,
    Timeout: 504,
    Network: 503,
    RateLimited: 429,
    DependencyUnavailable: 503,
    Serialization: 500,
    Deserialization: 500,
    ExternalApi: 500,
    Queue: 500,
    Cache: 500,
};

/**
 * All kinds in declaration order.
 */
export const ALL_KINDS: readonly AppErrorKind[] = Object.values(AppErrorKind);

/**
 * Human-readable label, used as the message fallback whenever an error has
 * no message or its message is redacted.
 */
export function kindLabel(kind: AppErrorKind): string {
    return KIND_LABELS[kind];
}

/**
 * Canonical HTTP status for a kind.
 */
export function kindHttpStatus(kind: AppErrorKind): number {
    return KIND_HTTP_STATUS[kind];
}

/**
 * Server-side failures (5xx) are critical; client errors are warnings.
 */
export function isCriticalKind(kind: AppErrorKind): boolean {
    return KIND_HTTP_STATUS[kind] >= 500;
}

/**
 * Type guard for kind strings coming from untyped input.
 */
export function isAppErrorKind(value: unknown): value is AppErrorKind {
    return typeof value === "string" && Object.hasOwn(KIND_LABELS, value);
}
