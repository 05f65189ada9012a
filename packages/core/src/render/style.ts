/**
 * ANSI styling for local rendering
 *
 * Styles wrap whole substrings and never alter the text inside them.
 *
 * @module render/style
 */

import type { FaultlineEnv } from "../config/envSchema.ts";
import { parseEnvConfig } from "../config/envSchema.ts";

const RESET = "\x1b[0m";

const CODES = {
    bold: "\x1b[1m",
    dim: "\x1b[2m",
    underline: "\x1b[4m",
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
    blue: "\x1b[34m",
    magenta: "\x1b[35m",
    cyan: "\x1b[36m",
    brightWhite: "\x1b[97m",
} as const;

type StyleName = keyof typeof CODES;

// biome-ignore lint/suspicious/noControlCharactersInRegex: matches ANSI escapes
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export interface LocalStyle {
    kind(text: string, critical: boolean): string;
    code(text: string): string;
    message(text: string): string;
    source(text: string): string;
    metadataKey(text: string): string;
    hintLabel(text: string): string;
    suggestionLabel(text: string): string;
    command(text: string): string;
    docsLabel(text: string): string;
    url(text: string): string;
    relatedLabel(text: string): string;
}

function paint(enabled: boolean, ...styles: StyleName[]): (text: string) => string {
    if (!enabled) return (text) => text;
    const prefix = styles.map((name) => CODES[name]).join("");
    return (text) => `${prefix}${text}${RESET}`;
}

export function createLocalStyle(enabled: boolean): LocalStyle {
    const critical = paint(enabled, "red");
    const warning = paint(enabled, "yellow");
    return {
        kind: (text, isCritical) => (isCritical ? critical(text) : warning(text)),
        code: paint(enabled, "cyan"),
        message: paint(enabled, "bold"),
        source: paint(enabled, "dim"),
        metadataKey: paint(enabled, "green"),
        hintLabel: paint(enabled, "blue"),
        suggestionLabel: paint(enabled, "magenta"),
        command: paint(enabled, "bold", "brightWhite"),
        docsLabel: paint(enabled, "cyan"),
        url: paint(enabled, "underline", "cyan"),
        relatedLabel: paint(enabled, "dim"),
    };
}

/**
 * Colour is on when stderr is a terminal and `NO_COLOR` is not set.
 */
export function isColorEnabled(env: FaultlineEnv = parseEnvConfig(), stream: { isTTY?: boolean } = process.stderr): boolean {
    return env.NO_COLOR === undefined && stream.isTTY === true;
}

export function stripAnsi(text: string): string {
    return text.replace(ANSI_PATTERN, "");
}
