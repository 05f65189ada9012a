/**
 * @faultline/otel
 *
 * OpenTelemetry bindings for the faultline error runtime.
 *
 * @module @faultline/otel
 */

// One-call wiring of counter + event sink
export { installOtelTelemetry } from "./install.ts";
export type { InstallOtelTelemetryOptions, InstalledOtelTelemetry } from "./install.ts";

// Event sink (log records + span events)
export { OtelErrorEventSink, buildEventAttributes } from "./events.ts";
export type { OtelErrorEventSinkOptions } from "./events.ts";

// Metrics
export { createErrorCounter, createErrorMetrics } from "./metrics.ts";
export type { ErrorMetrics } from "./metrics.ts";

// Logger (correlated logging with trace_id/span_id)
export { getLogger, traceCorrelation } from "./logger.ts";
export type { Logger, LoggerOptions } from "./logger.ts";

// Provider management
export { getProvider, initProvider, shutdownProvider } from "./provider.ts";
export type { ProviderOptions } from "./provider.ts";

// Attribute keys
export {
    ATTR_ERROR_CATEGORY,
    ATTR_ERROR_CODE,
    ATTR_ERROR_MESSAGE,
    ATTR_ERROR_METADATA_LENGTH,
    ATTR_ERROR_REDACTABLE,
    ATTR_ERROR_RETRY_AFTER,
    ATTR_ERROR_TYPE,
    ATTR_SPAN_ID,
    ATTR_TRACE_ID,
    ATTR_WWW_AUTHENTICATE,
    LABEL_CATEGORY,
    LABEL_CODE,
    METRIC_ERROR_TOTAL,
} from "./attributes.ts";

// Config
export { ExporterType, getCollectorOptions, getEventSettings, getOTLPSettings, getServiceMetadata } from "./config.ts";
export type { CollectorOptions, EventSettings, EventThreshold, OTLPSettings } from "./config.ts";

// Re-export OpenTelemetry API types for convenience
export type { Meter, Tracer } from "@opentelemetry/api";
