/**
 * Environment configuration validation with Zod
 *
 * Every value the error runtime derives from the process environment goes
 * through this schema. All variables are optional: a missing or odd value
 * must never make error construction fail.
 *
 * @module @faultline/core/config
 */

import { z } from "zod";

/**
 * Recognized display mode override values
 */
export const DisplayModeOverrideSchema = z.enum(["prod", "production", "local", "dev", "development", "staging", "stage"]);

/**
 * Toggle parsed the way runtime backtrace switches are: absent, blank, `0`,
 * `off` and `false` disable; any other value enables.
 */
export const ToggleFromStringSchema = z
    .string()
    .optional()
    .transform((value) => {
        if (value === undefined) return false;
        const normalized = value.trim().toLowerCase();
        return normalized !== "" && normalized !== "0" && normalized !== "off" && normalized !== "false";
    });

/**
 * Faultline environment configuration schema
 *
 * @example
 * ```typescript
 * const config = FaultlineEnvSchema.parse(process.env);
 * console.log(config.FAULTLINE_ENV); // 'staging' | undefined
 * console.log(config.FAULTLINE_BACKTRACE); // false (default)
 * ```
 */
export const FaultlineEnvSchema = z.object({
    /**
     * Display mode override (prod|production|local|dev|development|staging|stage).
     * Unrecognized values are kept and ignored by the resolver.
     */
    FAULTLINE_ENV: z.string().optional(),

    /**
     * Orchestration marker; any value selects production rendering
     */
    KUBERNETES_SERVICE_HOST: z.string().optional(),

    /**
     * Release-build signal: `production` means release, anything else debug
     */
    NODE_ENV: z.string().optional(),

    /**
     * Capture backtraces for constructed errors
     * @default false
     */
    FAULTLINE_BACKTRACE: ToggleFromStringSchema,

    /**
     * Presence disables ANSI colour in local rendering
     */
    NO_COLOR: z.string().optional(),
});

/**
 * Faultline environment configuration type
 */
export type FaultlineEnv = z.infer<typeof FaultlineEnvSchema>;

/**
 * Parse environment configuration
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ FAULTLINE_ENV: 'staging' });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): FaultlineEnv {
    return FaultlineEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return FaultlineEnvSchema.safeParse(env);
}
