/**
 * Local (developer terminal) rendering
 *
 * @module render/local
 */

import type { AppError } from "../AppError.ts";
import { causeChain } from "../cause.ts";
import { DiagnosticVisibility } from "../Diagnostics.ts";
import { formatFieldValue } from "../field.ts";
import { isCriticalKind, kindLabel } from "../kind.ts";
import { LOCAL_SOURCE_CHAIN_DEPTH } from "./helpers.ts";
import { createLocalStyle, isColorEnabled } from "./style.ts";

export interface LocalRenderOptions {
    /** Force ANSI colour on or off; detected from the terminal when omitted */
    color?: boolean;
}

const COMMAND_INDENT = " ".repeat(14);

/**
 * Human-readable text with every section the record carries.
 *
 * Local output is trusted: metadata is shown unredacted and diagnostics are
 * filtered at `DevOnly`, which keeps everything.
 *
 * @example
 * ```text
 * Not found
 * Code: NOT_FOUND
 * Message: user not found
 *
 *   Caused by: connection reset
 *
 * Context:
 *   user_id: 42
 * ```
 */
export function renderLocal(error: AppError, options: LocalRenderOptions = {}): string {
    const style = createLocalStyle(options.color ?? isColorEnabled());
    const lines: string[] = [
        style.kind(kindLabel(error.kind), isCriticalKind(error.kind)),
        `Code: ${style.code(error.code.toString())}`,
        `Message: ${style.message(error.renderMessage())}`,
    ];

    if (error.source !== undefined) {
        const chain = causeChain(error.source, LOCAL_SOURCE_CHAIN_DEPTH);
        if (chain.length > 0) {
            lines.push("");
            for (const level of chain) {
                lines.push(`  ${style.source(`Caused by: ${level}`)}`);
            }
        }
    }

    if (!error.metadata.isEmpty()) {
        lines.push("", "Context:");
        for (const [name, value] of error.metadata) {
            lines.push(`  ${style.metadataKey(name)}: ${formatFieldValue(value)}`);
        }
    }

    const diagnostics = error.diagnostics;
    if (diagnostics && !diagnostics.isEmpty()) {
        const min = DiagnosticVisibility.DevOnly;
        const hints = Array.from(diagnostics.visibleHints(min));
        if (hints.length > 0) {
            lines.push("");
            for (const hint of hints) {
                lines.push(`  ${style.hintLabel("hint:")} ${hint.message}`);
            }
        }
        for (const suggestion of diagnostics.visibleSuggestions(min)) {
            lines.push("", `  ${style.suggestionLabel("suggestion:")} ${suggestion.message}`);
            if (suggestion.command !== undefined) {
                lines.push(`${COMMAND_INDENT}${style.command(suggestion.command)}`);
            }
        }
        const docLink = diagnostics.visibleDocLink(min);
        if (docLink) {
            const target = docLink.title === undefined ? style.url(docLink.url) : `${docLink.title} (${style.url(docLink.url)})`;
            lines.push("", `  ${style.docsLabel("docs:")} ${target}`);
        }
        if (diagnostics.relatedCodes.length > 0) {
            lines.push("", `  ${style.relatedLabel("see also:")} ${diagnostics.relatedCodes.join(", ")}`);
        }
    }

    const backtrace = error.backtrace();
    if (backtrace && backtrace.frames.length > 0) {
        lines.push("", "Backtrace:");
        for (const frame of backtrace.frames) {
            lines.push(`  ${frame}`);
        }
    }

    return lines.join("\n");
}
