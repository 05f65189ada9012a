/**
 * Rendering engine
 *
 * @module render
 */

import type { AppError } from "../AppError.ts";
import { DisplayMode } from "../displayMode.ts";
import { renderLocal } from "./local.ts";
import { renderProd } from "./prod.ts";
import { renderStaging } from "./staging.ts";

/**
 * Render an error for a display mode.
 */
export function renderError(error: AppError, mode: DisplayMode): string {
    switch (mode) {
        case DisplayMode.Prod:
            return renderProd(error);
        case DisplayMode.Staging:
            return renderStaging(error);
        case DisplayMode.Local:
            return renderLocal(error);
    }
}

export { LOCAL_SOURCE_CHAIN_DEPTH, STAGING_SOURCE_CHAIN_DEPTH, renderableDetails, toPlainJson } from "./helpers.ts";
export type { PayloadHeader } from "./helpers.ts";
export { renderLocal } from "./local.ts";
export type { LocalRenderOptions } from "./local.ts";
export { prodPayload, renderProd } from "./prod.ts";
export type { ProdPayload } from "./prod.ts";
export { renderStaging, stagingPayload } from "./staging.ts";
export type { StagingPayload, StagingRenderOptions } from "./staging.ts";
export { createLocalStyle, isColorEnabled, stripAnsi } from "./style.ts";
export type { LocalStyle } from "./style.ts";
