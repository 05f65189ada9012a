/**
 * OpenTelemetry configuration module
 *
 * Environment-based configuration for exporters and for the error event sink.
 *
 * @module config
 */

import type { EventLevel } from "@faultline/core";
import env from "env-var";

/**
 * Available exporter types
 *
 * - CONSOLE: Outputs telemetry to stdout
 * - OTLP_HTTP: Sends telemetry via OTLP/HTTP protocol
 * - OTLP_GRPC: Sends telemetry via OTLP/gRPC protocol
 * - NONE: Disables telemetry export
 */
export const ExporterType = {
    CONSOLE: "console",
    OTLP_HTTP: "otlp/http",
    OTLP_GRPC: "otlp/grpc",
    NONE: "none",
} as const;

export type ExporterType = (typeof ExporterType)[keyof typeof ExporterType];

const EXPORTER_TYPES: ExporterType[] = Object.values(ExporterType);

/**
 * Exporter per signal
 */
export interface OTLPSettings {
    traces: ExporterType;
    metrics: ExporterType;
    logs: ExporterType;
}

/**
 * Collector endpoint options
 */
export interface CollectorOptions {
    concurrencyLimit: number;
    url: string | undefined;
}

/**
 * Minimum severity the error event sink reports, or `off`
 */
export type EventThreshold = EventLevel | "off";

const EVENT_THRESHOLDS: EventThreshold[] = ["debug", "info", "warn", "error", "off"];

/**
 * Error event sink options
 */
export interface EventSettings {
    minLevel: EventThreshold;
}

/**
 * Gets exporter settings from environment variables
 *
 * Environment variables (each `console|otlp/http|otlp/grpc|none`, default `none`):
 * - OTEL_TRACES_EXPORTER
 * - OTEL_METRICS_EXPORTER
 * - OTEL_LOGS_EXPORTER
 */
export function getOTLPSettings(): OTLPSettings {
    return {
        traces: env.get("OTEL_TRACES_EXPORTER").default(ExporterType.NONE).asEnum(EXPORTER_TYPES),
        metrics: env.get("OTEL_METRICS_EXPORTER").default(ExporterType.NONE).asEnum(EXPORTER_TYPES),
        logs: env.get("OTEL_LOGS_EXPORTER").default(ExporterType.NONE).asEnum(EXPORTER_TYPES),
    };
}

/**
 * Gets collector endpoint options from environment variables
 *
 * Environment variables:
 * - OTEL_EXPORTER_OTLP_ENDPOINT: Collector endpoint URL (trailing slash removed)
 */
export function getCollectorOptions(): CollectorOptions {
    return {
        concurrencyLimit: 10,
        url: env.get("OTEL_EXPORTER_OTLP_ENDPOINT").asString()?.replace(/\/$/, ""),
    };
}

/**
 * Gets error event sink settings from environment variables
 *
 * Environment variables:
 * - FAULTLINE_EVENT_LEVEL: debug|info|warn|error|off (default: debug)
 */
export function getEventSettings(): EventSettings {
    return {
        minLevel: env.get("FAULTLINE_EVENT_LEVEL").default("debug").asEnum(EVENT_THRESHOLDS),
    };
}

/**
 * Gets service metadata from environment variables
 *
 * Uses OTEL_SERVICE_NAME as primary source, falls back to npm_package_name.
 */
export function getServiceMetadata(): { name: string; version: string } {
    return {
        name: process.env.OTEL_SERVICE_NAME || process.env.npm_package_name || "unknown-service",
        version: process.env.npm_package_version || "0.0.0",
    };
}
