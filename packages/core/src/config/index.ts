/**
 * Configuration module
 *
 * Type-safe parsing of the environment variables the error runtime reads.
 *
 * @example
 * ```typescript
 * import { parseEnvConfig, type FaultlineEnv } from '@faultline/core/config';
 *
 * const config = parseEnvConfig();
 * console.log(`Backtraces: ${config.FAULTLINE_BACKTRACE}`);
 * ```
 *
 * @module @faultline/core/config
 */

export {
    FaultlineEnvSchema,
    DisplayModeOverrideSchema,
    ToggleFromStringSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    type FaultlineEnv,
} from "./envSchema.ts";
