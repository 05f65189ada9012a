/**
 * OpenTelemetry error event sink
 *
 * Emits each error event as a log record correlated with the active trace
 * and, when a span is active, as an event on that span.
 *
 * @module events
 */

import type { ErrorEvent, ErrorEventSink, EventLevel } from "@faultline/core";
import type { Attributes } from "@opentelemetry/api";
import { trace } from "@opentelemetry/api";
import type { AnyValueMap } from "@opentelemetry/api-logs";
import { SeverityNumber } from "@opentelemetry/api-logs";
import {
    ATTR_ERROR_CATEGORY,
    ATTR_ERROR_CODE,
    ATTR_ERROR_MESSAGE,
    ATTR_ERROR_METADATA_LENGTH,
    ATTR_ERROR_REDACTABLE,
    ATTR_ERROR_RETRY_AFTER,
    ATTR_ERROR_TYPE,
    ATTR_WWW_AUTHENTICATE,
    ERROR_TYPE_APP_ERROR,
} from "./attributes.ts";
import type { EventThreshold } from "./config.ts";
import { getEventSettings } from "./config.ts";
import type { Logger } from "./logger.ts";
import { getLogger, traceCorrelation } from "./logger.ts";

const LEVEL_ORDER: Record<EventLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const SEVERITY: Record<EventLevel, { number: SeverityNumber; text: string }> = {
    debug: { number: SeverityNumber.DEBUG, text: "DEBUG" },
    info: { number: SeverityNumber.INFO, text: "INFO" },
    warn: { number: SeverityNumber.WARN, text: "WARN" },
    error: { number: SeverityNumber.ERROR, text: "ERROR" },
};

export interface OtelErrorEventSinkOptions {
    /** Logger receiving the records (defaults to `getLogger("faultline")`) */
    logger?: Logger;
    /** Fixed threshold; read from FAULTLINE_EVENT_LEVEL when omitted */
    minLevel?: EventThreshold;
    /** Also add an event to the active span @default true */
    spanEvents?: boolean;
}

/**
 * Attributes describing an error event. Optional values are left out
 * rather than sent empty.
 */
export function buildEventAttributes(event: ErrorEvent): Attributes {
    const attributes: Attributes = {
        [ATTR_ERROR_TYPE]: ERROR_TYPE_APP_ERROR,
        [ATTR_ERROR_CODE]: event.code,
        [ATTR_ERROR_CATEGORY]: event.category,
        [ATTR_ERROR_REDACTABLE]: event.redactable,
        [ATTR_ERROR_METADATA_LENGTH]: event.metadataLength,
    };
    if (event.errorMessage !== undefined) attributes[ATTR_ERROR_MESSAGE] = event.errorMessage;
    if (event.retrySeconds !== undefined) attributes[ATTR_ERROR_RETRY_AFTER] = event.retrySeconds;
    if (event.wwwAuthenticate !== undefined) attributes[ATTR_WWW_AUTHENTICATE] = event.wwwAuthenticate;
    return attributes;
}

function toLogAttributes(attributes: Attributes): AnyValueMap {
    const result: AnyValueMap = {};
    for (const [key, value] of Object.entries(attributes)) {
        if (value !== undefined) result[key] = value;
    }
    return result;
}

/**
 * {@link ErrorEventSink} backed by OpenTelemetry logs and spans.
 *
 * Interest is resolved once and cached; {@link rebuildInterest} drops the
 * cache so a threshold changed after start-up is picked up.
 */
export class OtelErrorEventSink implements ErrorEventSink {
    private readonly logger: Logger;
    private readonly fixedThreshold: EventThreshold | undefined;
    private readonly spanEvents: boolean;
    private threshold: EventThreshold | undefined;

    constructor(options: OtelErrorEventSinkOptions = {}) {
        this.logger = options.logger ?? getLogger("faultline");
        this.fixedThreshold = options.minLevel;
        this.spanEvents = options.spanEvents ?? true;
    }

    enabled(level: EventLevel): boolean {
        const threshold = this.resolveThreshold();
        return threshold !== "off" && LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
    }

    rebuildInterest(): void {
        this.threshold = undefined;
    }

    emit(event: ErrorEvent): void {
        const attributes = buildEventAttributes(event);
        const severity = SEVERITY[event.level];
        this.logger.emit({
            severityNumber: severity.number,
            severityText: severity.text,
            body: event.message,
            attributes: { ...toLogAttributes(attributes), ...traceCorrelation() },
        });
        if (this.spanEvents) {
            trace.getActiveSpan()?.addEvent(event.message, attributes);
        }
    }

    private resolveThreshold(): EventThreshold {
        if (this.threshold === undefined) {
            this.threshold = this.fixedThreshold ?? getEventSettings().minLevel;
        }
        return this.threshold;
    }
}
