/**
 * OpenTelemetry Provider
 *
 * Owns the tracer, meter and logger providers the error bindings emit
 * through, with explicit lifecycle control.
 *
 * @module provider
 */

import type { Meter, Tracer } from "@opentelemetry/api";
import { DiagConsoleLogger, DiagLogLevel, diag, metrics, trace } from "@opentelemetry/api";
import type { Logger } from "@opentelemetry/api-logs";
import { logs } from "@opentelemetry/api-logs";
import { OTLPLogExporter as OTLPLogExporterGRPC } from "@opentelemetry/exporter-logs-otlp-grpc";
import { OTLPLogExporter as OTLPLogExporterHTTP } from "@opentelemetry/exporter-logs-otlp-http";
import { OTLPMetricExporter as OTLPMetricExporterGRPC } from "@opentelemetry/exporter-metrics-otlp-grpc";
import { OTLPMetricExporter as OTLPMetricExporterHTTP } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPTraceExporter as OTLPTraceExporterGRPC } from "@opentelemetry/exporter-trace-otlp-grpc";
import { OTLPTraceExporter as OTLPTraceExporterHTTP } from "@opentelemetry/exporter-trace-otlp-http";
import type { Resource } from "@opentelemetry/resources";
import { resourceFromAttributes } from "@opentelemetry/resources";
import type { LogRecordExporter } from "@opentelemetry/sdk-logs";
import { ConsoleLogRecordExporter, LoggerProvider, SimpleLogRecordProcessor } from "@opentelemetry/sdk-logs";
import type { PushMetricExporter } from "@opentelemetry/sdk-metrics";
import { ConsoleMetricExporter, MeterProvider, PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { ConsoleSpanExporter, NodeTracerProvider, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-node";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import type { CollectorOptions, OTLPSettings } from "./config.ts";
import { ExporterType, getCollectorOptions, getOTLPSettings, getServiceMetadata } from "./config.ts";

const METRIC_EXPORT_INTERVAL_MS = 10_000;

/**
 * Options for initializing the OpenTelemetry provider
 */
export interface ProviderOptions {
    /** Override service name (defaults to OTEL_SERVICE_NAME or npm_package_name) */
    serviceName?: string;
    /** Override service version (defaults to npm_package_version) */
    serviceVersion?: string;
    /** Override exporter settings (defaults to env-based config) */
    settings?: Partial<OTLPSettings>;
}

type ActiveExporter = Exclude<ExporterType, "none">;

/** OTLP endpoint for a signal, or the exporter default when unset */
function signalUrl(collector: CollectorOptions, signal: "traces" | "metrics" | "logs"): { url?: string } {
    return collector.url === undefined ? {} : { url: `${collector.url}/v1/${signal}` };
}

function grpcOptions(collector: CollectorOptions): { url?: string; concurrencyLimit: number } {
    return collector.url === undefined ? { concurrencyLimit: collector.concurrencyLimit } : { url: collector.url, concurrencyLimit: collector.concurrencyLimit };
}

function createSpanExporter(type: ActiveExporter, collector: CollectorOptions): SpanExporter {
    switch (type) {
        case ExporterType.OTLP_HTTP:
            return new OTLPTraceExporterHTTP({ concurrencyLimit: collector.concurrencyLimit, ...signalUrl(collector, "traces") });
        case ExporterType.OTLP_GRPC:
            return new OTLPTraceExporterGRPC(grpcOptions(collector));
        case ExporterType.CONSOLE:
            return new ConsoleSpanExporter();
    }
}

function createMetricExporter(type: ActiveExporter, collector: CollectorOptions): PushMetricExporter {
    switch (type) {
        case ExporterType.OTLP_HTTP:
            return new OTLPMetricExporterHTTP({ concurrencyLimit: collector.concurrencyLimit, ...signalUrl(collector, "metrics") });
        case ExporterType.OTLP_GRPC:
            return new OTLPMetricExporterGRPC(grpcOptions(collector));
        case ExporterType.CONSOLE:
            return new ConsoleMetricExporter();
    }
}

function createLogExporter(type: ActiveExporter, collector: CollectorOptions): LogRecordExporter {
    switch (type) {
        case ExporterType.OTLP_HTTP:
            return new OTLPLogExporterHTTP({ concurrencyLimit: collector.concurrencyLimit, ...signalUrl(collector, "logs") });
        case ExporterType.OTLP_GRPC:
            return new OTLPLogExporterGRPC(grpcOptions(collector));
        case ExporterType.CONSOLE:
            return new ConsoleLogRecordExporter();
    }
}

/**
 * OpenTelemetry Provider
 *
 * A signal whose exporter is `none` uses the global no-op implementation.
 */
class OtelProvider {
    readonly tracer: Tracer;
    readonly meter: Meter;
    readonly logger: Logger;

    private traceProvider?: NodeTracerProvider;
    private meterProvider?: MeterProvider;
    private loggerProvider?: LoggerProvider;

    private readonly serviceName: string;
    private readonly serviceVersion: string;

    constructor(options?: ProviderOptions) {
        diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);

        const envSettings = getOTLPSettings();
        const settings: OTLPSettings = { ...envSettings, ...options?.settings };
        const collector = getCollectorOptions();

        const metadata = getServiceMetadata();
        this.serviceName = options?.serviceName ?? metadata.name;
        this.serviceVersion = options?.serviceVersion ?? metadata.version;

        const resource = resourceFromAttributes({
            [ATTR_SERVICE_NAME]: this.serviceName,
            [ATTR_SERVICE_VERSION]: this.serviceVersion,
        });

        this.tracer = this.createTracer(settings.traces, collector, resource);
        this.meter = this.createMeter(settings.metrics, collector, resource);
        this.logger = this.createLogger(settings.logs, collector, resource);
    }

    private createTracer(type: ExporterType, collector: CollectorOptions, resource: Resource): Tracer {
        if (type === ExporterType.NONE) {
            return trace.getTracer(this.serviceName, this.serviceVersion);
        }
        this.traceProvider = new NodeTracerProvider({
            resource,
            spanProcessors: [new SimpleSpanProcessor(createSpanExporter(type, collector))],
        });
        this.traceProvider.register();
        return this.traceProvider.getTracer(this.serviceName, this.serviceVersion);
    }

    private createMeter(type: ExporterType, collector: CollectorOptions, resource: Resource): Meter {
        if (type === ExporterType.NONE) {
            return metrics.getMeter(this.serviceName, this.serviceVersion);
        }
        this.meterProvider = new MeterProvider({
            resource,
            readers: [
                new PeriodicExportingMetricReader({
                    exporter: createMetricExporter(type, collector),
                    exportIntervalMillis: METRIC_EXPORT_INTERVAL_MS,
                }),
            ],
        });
        metrics.setGlobalMeterProvider(this.meterProvider);
        return this.meterProvider.getMeter(this.serviceName, this.serviceVersion);
    }

    private createLogger(type: ExporterType, collector: CollectorOptions, resource: Resource): Logger {
        if (type === ExporterType.NONE) {
            return logs.getLogger(this.serviceName, this.serviceVersion);
        }
        this.loggerProvider = new LoggerProvider({
            resource,
            processors: [new SimpleLogRecordProcessor(createLogExporter(type, collector))],
        });
        logs.setGlobalLoggerProvider(this.loggerProvider);
        return this.loggerProvider.getLogger(this.serviceName, this.serviceVersion);
    }

    /**
     * Flush and shut down every SDK provider this instance created
     */
    async shutdown(): Promise<void> {
        await this.traceProvider?.shutdown();
        await this.meterProvider?.shutdown();
        await this.loggerProvider?.shutdown();
    }
}

export type { OtelProvider };

// ---------------------------------------------------------------------------
// Module-level state
// ---------------------------------------------------------------------------

let provider: OtelProvider | undefined;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Initialize the OpenTelemetry provider with explicit options.
 *
 * Throws if already initialized -- call {@link shutdownProvider} first to
 * re-initialize.
 *
 * @throws Error if provider is already initialized
 */
export function initProvider(options?: ProviderOptions): void {
    if (provider !== undefined) {
        throw new Error("OTel provider already initialized. Call shutdownProvider() first.");
    }
    provider = new OtelProvider(options);
}

/**
 * Get the current OpenTelemetry provider, creating one from the environment
 * on first use.
 */
export function getProvider(): OtelProvider {
    if (provider === undefined) {
        provider = new OtelProvider();
    }
    return provider;
}

/**
 * Shut down the provider. Subsequent {@link getProvider} calls create a
 * fresh one. No-op when no provider exists.
 */
export async function shutdownProvider(): Promise<void> {
    if (provider === undefined) {
        return;
    }
    await provider.shutdown();
    provider = undefined;
}
