/**
 * Causal chain traversal
 *
 * @module cause
 */

/**
 * Capability every level of a causal chain exposes.
 *
 * Native errors are adapted through their `message` and ES2022 `cause`;
 * custom sources may implement this interface directly.
 */
export interface ErrorCause {
    render(): string;
    nextCause(): ErrorCause | undefined;
}

export function isErrorCause(value: unknown): value is ErrorCause {
    if (value == null || typeof value !== "object") return false;
    return "render" in value && typeof value.render === "function" && "nextCause" in value && typeof value.nextCause === "function";
}

/**
 * Chain levels that hide part of their text from semi-trusted output.
 */
export interface PublicCause {
    publicMessage(): string;
}

export function isPublicCause(value: unknown): value is PublicCause {
    if (value == null || typeof value !== "object") return false;
    return "publicMessage" in value && typeof value.publicMessage === "function";
}

export interface CauseRenderOptions {
    /** Render levels through their public text where they have one */
    redact?: boolean;
}

/**
 * Textual rendering of a single chain level.
 */
export function renderCause(value: unknown, options: CauseRenderOptions = {}): string {
    if (options.redact && isPublicCause(value)) return value.publicMessage();
    if (isErrorCause(value)) return value.render();
    if (value instanceof Error) return value.message === "" ? value.name : value.message;
    return String(value);
}

/**
 * Next level below a chain level, if any.
 */
export function nextCauseOf(value: unknown): unknown {
    if (isErrorCause(value)) return value.nextCause();
    if (value instanceof Error) return value.cause;
    return undefined;
}

/**
 * Walk a causal chain starting at `source`, yielding at most `maxDepth`
 * levels. Stops early on a cycle.
 */
export function* walkCauses(source: unknown, maxDepth: number): Generator<unknown> {
    const seen = new Set<unknown>();
    let current = source;
    let depth = 0;
    while (current !== undefined && current !== null && depth < maxDepth && !seen.has(current)) {
        seen.add(current);
        yield current;
        current = nextCauseOf(current);
        depth++;
    }
}

/**
 * Rendered chain levels, bounded by `maxDepth`.
 */
export function causeChain(source: unknown, maxDepth: number, options: CauseRenderOptions = {}): string[] {
    return Array.from(walkCauses(source, maxDepth), (level) => renderCause(level, options));
}
