/**
 * @faultline/core
 *
 * Structured error runtime.
 *
 * Provides:
 * - AppError: error record with stable code, kind, typed metadata and diagnostics
 * - Context: builder promoting foreign errors into AppErrors
 * - Rendering for prod, staging and local display modes
 * - Protocol mapping (HTTP, gRPC, problem details)
 * - Telemetry contract (error counter, structured events)
 *
 * @module @faultline/core
 */

// =============================================================================
// ERROR RECORD
// =============================================================================

export { AppError } from "./AppError.ts";
export { AppCode } from "./AppCode.ts";
export { AppErrorKind, ALL_KINDS, isAppErrorKind, isCriticalKind, kindHttpStatus, kindLabel } from "./kind.ts";
export { Context } from "./Context.ts";
export type { CallerLocation } from "./Context.ts";

// =============================================================================
// METADATA & DIAGNOSTICS
// =============================================================================

export { Field, field, fieldValueToJson, formatDuration, formatFieldValue } from "./field.ts";
export type { FieldJson, FieldValue, FieldValueType } from "./field.ts";
export { Metadata } from "./Metadata.ts";
export type { ReadonlyMetadata } from "./Metadata.ts";
export {
    FieldRedaction,
    MessageEditPolicy,
    REDACTED_PLACEHOLDER,
    applyRedaction,
    hashFieldValue,
    inferFieldRedaction,
    maskFieldValue,
    maskLast4,
} from "./redaction.ts";
export { DiagnosticVisibility, Diagnostics } from "./Diagnostics.ts";
export type { DocLink, Hint, Suggestion } from "./Diagnostics.ts";

// =============================================================================
// CAUSAL CHAIN & BACKTRACE
// =============================================================================

export { causeChain, isErrorCause, isPublicCause, nextCauseOf, renderCause, walkCauses } from "./cause.ts";
export type { CauseRenderOptions, ErrorCause, PublicCause } from "./cause.ts";
export { backtraceFromStack, formatBacktrace, shouldCaptureBacktrace } from "./backtrace.ts";
export type { CapturedBacktrace } from "./backtrace.ts";

// =============================================================================
// RENDERING
// =============================================================================

export { DisplayMode, currentDisplayMode, detectDisplayMode } from "./displayMode.ts";
export {
    LOCAL_SOURCE_CHAIN_DEPTH,
    STAGING_SOURCE_CHAIN_DEPTH,
    prodPayload,
    renderError,
    renderLocal,
    renderProd,
    renderStaging,
    stagingPayload,
    stripAnsi,
} from "./render/index.ts";
export type { LocalRenderOptions, PayloadHeader, ProdPayload, StagingPayload, StagingRenderOptions } from "./render/index.ts";

// =============================================================================
// PROTOCOL MAPPING
// =============================================================================

export { CODE_MAPPINGS, KIND_MAPPINGS, PROBLEM_TYPE_BASE, grpcStatusName, mappingFor, mappingForCode } from "./mapping.ts";
export type { CodeMapping, GrpcStatus } from "./mapping.ts";
export { ErrorResponse, isValidHttpStatus } from "./ErrorResponse.ts";
export type { ErrorResponseJson } from "./ErrorResponse.ts";
export { PROBLEM_JSON_CONTENT_TYPE, ProblemJson } from "./ProblemJson.ts";
export type { ProblemJsonBody } from "./ProblemJson.ts";

// =============================================================================
// TELEMETRY
// =============================================================================

export { EventLevel, configureErrorTelemetry, getErrorCounter, getErrorEventSink } from "./telemetry.ts";
export type { ErrorCounter, ErrorEvent, ErrorEventSink, ErrorLabels, ErrorTelemetryOptions } from "./telemetry.ts";

// =============================================================================
// TYPES
// =============================================================================

export type { AppErrorOptions, ErrorDetails, RetryAdvice, SourceAttachment } from "./types.ts";

// =============================================================================
// CONFIGURATION
// =============================================================================

export { FaultlineEnvSchema, parseEnvConfig, safeParseEnvConfig, type FaultlineEnv } from "./config/index.ts";
