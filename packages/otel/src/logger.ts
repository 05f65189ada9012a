/**
 * Correlated logger
 *
 * Thin wrapper over the provider's OpenTelemetry logger that stamps every
 * record with the logger name and the active `trace_id`/`span_id`.
 *
 * @module logger
 */

import { isSpanContextValid, trace } from "@opentelemetry/api";
import type { AnyValueMap, LogRecord } from "@opentelemetry/api-logs";
import { SeverityNumber } from "@opentelemetry/api-logs";
import { ATTR_LOGGER_NAME, ATTR_SPAN_ID, ATTR_TRACE_ID } from "./attributes.ts";
import { getProvider } from "./provider.ts";

export interface LoggerOptions {
    defaultAttributes?: AnyValueMap;
}

export interface Logger {
    info(message: string, attributes?: AnyValueMap): void;
    warn(message: string, attributes?: AnyValueMap): void;
    error(message: string, attributes?: AnyValueMap): void;
    debug(message: string, attributes?: AnyValueMap): void;
    emit(record: LogRecord): void;
}

/**
 * `trace_id` and `span_id` of the active span, if any.
 */
export function traceCorrelation(): AnyValueMap {
    const spanContext = trace.getActiveSpan()?.spanContext();
    if (!spanContext || !isSpanContextValid(spanContext)) return {};
    return { [ATTR_TRACE_ID]: spanContext.traceId, [ATTR_SPAN_ID]: spanContext.spanId };
}

export function getLogger(name = "faultline", options?: LoggerOptions): Logger {
    const otelLogger = getProvider().logger;
    const defaultAttrs = options?.defaultAttributes;

    function buildAttributes(callAttributes?: AnyValueMap): AnyValueMap {
        return { [ATTR_LOGGER_NAME]: name, ...defaultAttrs, ...traceCorrelation(), ...callAttributes };
    }

    function emitLog(severityNumber: SeverityNumber, severityText: string, message: string, attributes?: AnyValueMap): void {
        otelLogger.emit({
            severityNumber,
            severityText,
            body: message,
            attributes: buildAttributes(attributes),
        });
    }

    return {
        info(message, attributes?) {
            emitLog(SeverityNumber.INFO, "INFO", message, attributes);
        },
        warn(message, attributes?) {
            emitLog(SeverityNumber.WARN, "WARN", message, attributes);
        },
        error(message, attributes?) {
            emitLog(SeverityNumber.ERROR, "ERROR", message, attributes);
        },
        debug(message, attributes?) {
            emitLog(SeverityNumber.DEBUG, "DEBUG", message, attributes);
        },
        emit(record) {
            otelLogger.emit(record);
        },
    };
}
