/**
 * Lazy backtrace capture
 *
 * @module backtrace
 */

import { parseEnvConfig } from "./config/envSchema.ts";

/**
 * Stack snapshot taken when an error's telemetry first fires.
 */
export interface CapturedBacktrace {
    readonly frames: readonly string[];
}

let capturePreference: boolean | undefined;
let preferenceOverride: boolean | undefined;

/**
 * Whether backtraces should be captured. Reads `FAULTLINE_BACKTRACE` once;
 * the answer is cached for the process.
 */
export function shouldCaptureBacktrace(): boolean {
    if (capturePreference === undefined) {
        capturePreference = preferenceOverride ?? parseEnvConfig().FAULTLINE_BACKTRACE;
    }
    return capturePreference;
}

/**
 * Build a backtrace from an `Error.stack` string, dropping the header line.
 */
export function backtraceFromStack(stack: string | undefined): CapturedBacktrace {
    const frames = (stack ?? "")
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.startsWith("at "));
    return { frames };
}

/**
 * Capture the current stack if capture is enabled.
 *
 * @param skip - Frames above and including this function are omitted
 */
// biome-ignore lint/complexity/noBannedTypes: captureStackTrace takes any function
export function captureBacktraceSnapshot(skip: Function = captureBacktraceSnapshot): CapturedBacktrace | undefined {
    if (!shouldCaptureBacktrace()) return undefined;
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, skip);
    return backtraceFromStack(holder.stack);
}

export function formatBacktrace(backtrace: CapturedBacktrace): string {
    return backtrace.frames.join("\n");
}

/** @internal test hook */
export function resetBacktracePreference(): void {
    capturePreference = undefined;
    preferenceOverride = undefined;
}

/** @internal test hook; takes precedence over the environment until reset */
export function setBacktracePreferenceOverride(value: boolean | undefined): void {
    preferenceOverride = value;
}
