/**
 * Test harness hooks
 *
 * Process-wide caches (display mode, backtrace toggle) are resolved once per
 * process. Test suites that vary the environment reset them here; production
 * code has no reason to import this module.
 *
 * @module @faultline/core/testing
 */

import { resetBacktracePreference, setBacktracePreferenceOverride } from "../backtrace.ts";
import { resetDisplayModeCache } from "../displayMode.ts";
import { configureErrorTelemetry } from "../telemetry.ts";

export { resetBacktracePreference, resetDisplayModeCache, setBacktracePreferenceOverride };

/**
 * Reset every process-wide cache and remove installed telemetry sinks.
 */
export function resetFaultlineState(): void {
    resetDisplayModeCache();
    resetBacktracePreference();
    configureErrorTelemetry({});
}
