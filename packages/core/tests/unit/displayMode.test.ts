/**
 * Unit tests for display mode resolution
 */

import assert from "node:assert";
import { afterEach, describe, it } from "node:test";
import { parseEnvConfig } from "../../src/config/envSchema.ts";
import { DisplayMode, currentDisplayMode, detectDisplayMode, resetDisplayModeCache } from "../../src/displayMode.ts";

describe("detectDisplayMode", () => {
    it("should honour an explicit override", () => {
        assert.strictEqual(detectDisplayMode(parseEnvConfig({ FAULTLINE_ENV: "staging" })), DisplayMode.Staging);
        assert.strictEqual(detectDisplayMode(parseEnvConfig({ FAULTLINE_ENV: "stage" })), DisplayMode.Staging);
        assert.strictEqual(detectDisplayMode(parseEnvConfig({ FAULTLINE_ENV: "dev" })), DisplayMode.Local);
        assert.strictEqual(detectDisplayMode(parseEnvConfig({ FAULTLINE_ENV: "production" })), DisplayMode.Prod);
    });

    it("should prefer the override over the orchestration marker", () => {
        const env = parseEnvConfig({ FAULTLINE_ENV: "local", KUBERNETES_SERVICE_HOST: "10.0.0.1" });
        assert.strictEqual(detectDisplayMode(env), DisplayMode.Local);
    });

    it("should select prod under orchestration", () => {
        assert.strictEqual(detectDisplayMode(parseEnvConfig({ KUBERNETES_SERVICE_HOST: "10.0.0.1" })), DisplayMode.Prod);
    });

    it("should fall through an unrecognized override", () => {
        assert.strictEqual(detectDisplayMode(parseEnvConfig({ FAULTLINE_ENV: "qa", NODE_ENV: "production" })), DisplayMode.Prod);
        assert.strictEqual(detectDisplayMode(parseEnvConfig({ FAULTLINE_ENV: "qa" })), DisplayMode.Local);
    });

    it("should use the build mode last", () => {
        assert.strictEqual(detectDisplayMode(parseEnvConfig({ NODE_ENV: "production" })), DisplayMode.Prod);
        assert.strictEqual(detectDisplayMode(parseEnvConfig({ NODE_ENV: "test" })), DisplayMode.Local);
        assert.strictEqual(detectDisplayMode(parseEnvConfig({})), DisplayMode.Local);
    });
});

describe("currentDisplayMode", () => {
    const saved = process.env.FAULTLINE_ENV;

    afterEach(() => {
        if (saved === undefined) {
            delete process.env.FAULTLINE_ENV;
        } else {
            process.env.FAULTLINE_ENV = saved;
        }
        resetDisplayModeCache();
    });

    it("should cache the first detection", () => {
        resetDisplayModeCache();
        process.env.FAULTLINE_ENV = "staging";
        assert.strictEqual(currentDisplayMode(), DisplayMode.Staging);
        process.env.FAULTLINE_ENV = "prod";
        assert.strictEqual(currentDisplayMode(), DisplayMode.Staging);
        resetDisplayModeCache();
        assert.strictEqual(currentDisplayMode(), DisplayMode.Prod);
    });
});
