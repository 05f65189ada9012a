/**
 * Unit tests for diagnostics
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { DiagnosticVisibility, Diagnostics } from "../../src/Diagnostics.ts";

describe("Diagnostics", () => {
    it("should start empty", () => {
        const diagnostics = new Diagnostics();
        assert.strictEqual(diagnostics.isEmpty(), true);
        assert.strictEqual(diagnostics.hasVisibleContent(DiagnosticVisibility.DevOnly), false);
    });

    it("should default hints and suggestions to DevOnly and doc links to Public", () => {
        const diagnostics = new Diagnostics().pushHint("check the id").pushSuggestion("retry", "make retry").setDocLink("https://docs.test/errors");
        assert.strictEqual(diagnostics.hints[0]?.visibility, DiagnosticVisibility.DevOnly);
        assert.strictEqual(diagnostics.suggestions[0]?.visibility, DiagnosticVisibility.DevOnly);
        assert.strictEqual(diagnostics.suggestions[0]?.command, "make retry");
        assert.strictEqual(diagnostics.docLink?.visibility, DiagnosticVisibility.Public);
    });

    it("should filter by minimum visibility", () => {
        const diagnostics = new Diagnostics()
            .pushHint("dev")
            .pushHint("internal", DiagnosticVisibility.Internal)
            .pushHint("public", DiagnosticVisibility.Public);

        const messages = (min: DiagnosticVisibility) => Array.from(diagnostics.visibleHints(min), (hint) => hint.message);
        assert.deepStrictEqual(messages(DiagnosticVisibility.DevOnly), ["dev", "internal", "public"]);
        assert.deepStrictEqual(messages(DiagnosticVisibility.Internal), ["internal", "public"]);
        assert.deepStrictEqual(messages(DiagnosticVisibility.Public), ["public"]);
    });

    it("should hide DevOnly suggestions from higher tiers", () => {
        const diagnostics = new Diagnostics().pushSuggestion("restart the worker");
        assert.strictEqual(Array.from(diagnostics.visibleSuggestions(DiagnosticVisibility.Internal)).length, 0);
        assert.strictEqual(diagnostics.hasVisibleContent(DiagnosticVisibility.Internal), false);
        assert.strictEqual(diagnostics.hasVisibleContent(DiagnosticVisibility.DevOnly), true);
    });

    it("should replace the doc link and filter it", () => {
        const diagnostics = new Diagnostics()
            .setDocLink("https://docs.test/old")
            .setDocLink("https://docs.test/new", "Guide", DiagnosticVisibility.Internal);
        assert.deepStrictEqual(diagnostics.visibleDocLink(DiagnosticVisibility.Internal), {
            url: "https://docs.test/new",
            title: "Guide",
            visibility: DiagnosticVisibility.Internal,
        });
        assert.strictEqual(diagnostics.visibleDocLink(DiagnosticVisibility.Public), undefined);
    });

    it("should count related codes as content", () => {
        const diagnostics = new Diagnostics().pushRelatedCode("CONFLICT");
        assert.strictEqual(diagnostics.isEmpty(), false);
        assert.deepStrictEqual(diagnostics.relatedCodes, ["CONFLICT"]);
    });
});
