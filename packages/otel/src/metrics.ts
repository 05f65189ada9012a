/**
 * Error metrics for OpenTelemetry
 *
 * @module metrics
 */

import type { ErrorCounter, ErrorLabels } from "@faultline/core";
import type { Counter, Meter } from "@opentelemetry/api";
import { LABEL_CATEGORY, LABEL_CODE, METRIC_ERROR_TOTAL } from "./attributes.ts";

/**
 * Pre-configured error metric instruments
 */
export interface ErrorMetrics {
    /** Counter of error records, labelled by `code` and `category` */
    errorTotal: Counter;
}

/**
 * Creates error metric instruments from the given meter
 *
 * @example
 * ```typescript
 * import { metrics } from '@opentelemetry/api';
 * import { createErrorMetrics } from '@faultline/otel';
 *
 * const { errorTotal } = createErrorMetrics(metrics.getMeter('my-service'));
 * errorTotal.add(1, { code: 'NOT_FOUND', category: 'NotFound' });
 * ```
 */
export function createErrorMetrics(meter: Meter): ErrorMetrics {
    const errorTotal = meter.createCounter(METRIC_ERROR_TOTAL, {
        description: "Number of application error records",
        unit: "{error}",
    });
    return { errorTotal };
}

/**
 * Adapts an `error_total` counter to the error runtime's counter sink
 */
export function createErrorCounter(meter: Meter): ErrorCounter {
    const { errorTotal } = createErrorMetrics(meter);
    return {
        increment(labels: ErrorLabels): void {
            errorTotal.add(1, { [LABEL_CODE]: labels.code, [LABEL_CATEGORY]: labels.category });
        },
    };
}
