/**
 * Wire the error runtime's telemetry sinks to OpenTelemetry
 *
 * @module install
 */

import type { ErrorCounter } from "@faultline/core";
import { configureErrorTelemetry } from "@faultline/core";
import type { Meter } from "@opentelemetry/api";
import type { OtelErrorEventSinkOptions } from "./events.ts";
import { OtelErrorEventSink } from "./events.ts";
import { createErrorCounter } from "./metrics.ts";
import { getProvider } from "./provider.ts";

export interface InstallOtelTelemetryOptions extends OtelErrorEventSinkOptions {
    /** Meter for `error_total` (defaults to the provider's meter) */
    meter?: Meter;
}

export interface InstalledOtelTelemetry {
    counter: ErrorCounter;
    events: OtelErrorEventSink;
}

/**
 * Install the `error_total` counter and the log/span event sink as the
 * process-wide error telemetry.
 *
 * @example
 * ```typescript
 * import { initProvider, installOtelTelemetry } from '@faultline/otel';
 *
 * initProvider({ serviceName: 'billing' });
 * installOtelTelemetry();
 *
 * throw AppError.notFound('invoice not found'); // counted and logged once
 * ```
 */
export function installOtelTelemetry(options: InstallOtelTelemetryOptions = {}): InstalledOtelTelemetry {
    const { meter = getProvider().meter, ...sinkOptions } = options;
    const counter = createErrorCounter(meter);
    const events = new OtelErrorEventSink(sinkOptions);
    configureErrorTelemetry({ counter, events });
    return { counter, events };
}
