/**
 * Diagnostic hints, suggestions and documentation links
 *
 * @module Diagnostics
 */

/**
 * Ordered visibility tiers: `DevOnly < Internal < Public`.
 *
 * An item is shown under a rendering whose minimum visibility is at or below
 * the item's tier.
 */
export const DiagnosticVisibility = {
    DevOnly: 0,
    Internal: 1,
    Public: 2,
} as const;

export type DiagnosticVisibility = (typeof DiagnosticVisibility)[keyof typeof DiagnosticVisibility];

export interface Hint {
    readonly message: string;
    readonly visibility: DiagnosticVisibility;
}

export interface Suggestion {
    readonly message: string;
    readonly command?: string | undefined;
    readonly visibility: DiagnosticVisibility;
}

export interface DocLink {
    readonly url: string;
    readonly title?: string | undefined;
    readonly visibility: DiagnosticVisibility;
}

/**
 * Developer-facing guidance attached to an error.
 *
 * Queries return generators so filtering never copies unless the caller
 * collects the result.
 */
export class Diagnostics {
    readonly hints: Hint[] = [];
    readonly suggestions: Suggestion[] = [];
    readonly relatedCodes: string[] = [];
    docLink: DocLink | undefined;

    /**
     * @param visibility - Defaults to the most restrictive tier, `DevOnly`
     */
    pushHint(message: string, visibility: DiagnosticVisibility = DiagnosticVisibility.DevOnly): this {
        this.hints.push({ message, visibility });
        return this;
    }

    pushSuggestion(message: string, command?: string, visibility: DiagnosticVisibility = DiagnosticVisibility.DevOnly): this {
        this.suggestions.push({ message, command, visibility });
        return this;
    }

    /**
     * Set or replace the documentation link. Links are public by default.
     */
    setDocLink(url: string, title?: string, visibility: DiagnosticVisibility = DiagnosticVisibility.Public): this {
        this.docLink = { url, title, visibility };
        return this;
    }

    pushRelatedCode(code: string): this {
        this.relatedCodes.push(code);
        return this;
    }

    isEmpty(): boolean {
        return this.hints.length === 0 && this.suggestions.length === 0 && this.docLink === undefined && this.relatedCodes.length === 0;
    }

    hasVisibleContent(min: DiagnosticVisibility): boolean {
        return (
            this.hints.some((hint) => hint.visibility >= min) ||
            this.suggestions.some((suggestion) => suggestion.visibility >= min) ||
            (this.docLink !== undefined && this.docLink.visibility >= min)
        );
    }

    *visibleHints(min: DiagnosticVisibility): Generator<Hint> {
        for (const hint of this.hints) {
            if (hint.visibility >= min) yield hint;
        }
    }

    *visibleSuggestions(min: DiagnosticVisibility): Generator<Suggestion> {
        for (const suggestion of this.suggestions) {
            if (suggestion.visibility >= min) yield suggestion;
        }
    }

    visibleDocLink(min: DiagnosticVisibility): DocLink | undefined {
        return this.docLink !== undefined && this.docLink.visibility >= min ? this.docLink : undefined;
    }
}
