/**
 * Display mode resolution
 *
 * Display mode is a property of the deployment, not of a request: it is
 * resolved from the environment once and cached for the rest of the process.
 *
 * @module displayMode
 */

import type { FaultlineEnv } from "./config/envSchema.ts";
import { DisplayModeOverrideSchema, parseEnvConfig } from "./config/envSchema.ts";

export const DisplayMode = {
    /** JSON without internals; only unredacted data */
    Prod: "prod",
    /** Human-readable, everything shown */
    Local: "local",
    /** JSON with a bounded source chain and semi-trusted metadata */
    Staging: "staging",
} as const;

export type DisplayMode = (typeof DisplayMode)[keyof typeof DisplayMode];

const OVERRIDES: Record<string, DisplayMode> = {
    prod: DisplayMode.Prod,
    production: DisplayMode.Prod,
    local: DisplayMode.Local,
    dev: DisplayMode.Local,
    development: DisplayMode.Local,
    staging: DisplayMode.Staging,
    stage: DisplayMode.Staging,
};

/**
 * Resolve the display mode from environment configuration.
 *
 * Priority: explicit `FAULTLINE_ENV` override, then the orchestration
 * marker (`KUBERNETES_SERVICE_HOST` → prod), then the build mode
 * (`NODE_ENV=production` → prod, anything else → local). An unrecognized
 * override falls through to the next rule.
 */
export function detectDisplayMode(env: FaultlineEnv): DisplayMode {
    const override = DisplayModeOverrideSchema.safeParse(env.FAULTLINE_ENV);
    if (override.success) {
        const mode = OVERRIDES[override.data];
        if (mode) return mode;
    }
    if (env.KUBERNETES_SERVICE_HOST !== undefined) {
        return DisplayMode.Prod;
    }
    return env.NODE_ENV === "production" ? DisplayMode.Prod : DisplayMode.Local;
}

let cachedMode: DisplayMode | undefined;

/**
 * Process-wide display mode, detected on first call.
 */
export function currentDisplayMode(): DisplayMode {
    if (cachedMode === undefined) {
        cachedMode = detectDisplayMode(parseEnvConfig());
    }
    return cachedMode;
}

/** @internal test hook, re-exported from `@faultline/core/testing` */
export function resetDisplayModeCache(): void {
    cachedMode = undefined;
}
