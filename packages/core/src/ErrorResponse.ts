/**
 * Transport-neutral error response payload
 *
 * @module ErrorResponse
 */

import type { AppCode } from "./AppCode.ts";
import { AppError } from "./AppError.ts";
import { kindHttpStatus, kindLabel } from "./kind.ts";
import { renderableDetails } from "./render/index.ts";
import type { RetryAdvice } from "./types.ts";

const MIN_STATUS = 100;
const MAX_STATUS = 599;

/**
 * Wire form of {@link ErrorResponse}
 */
export interface ErrorResponseJson {
    status: number;
    code: string;
    message: string;
    details?: unknown;
    retry?: { after_seconds: number };
    www_authenticate?: string;
}

export function isValidHttpStatus(status: number): boolean {
    return Number.isInteger(status) && status >= MIN_STATUS && status <= MAX_STATUS;
}

/**
 * Public error payload: status, code, a message safe to show and optional
 * retry and authentication hints.
 */
export class ErrorResponse {
    readonly status: number;
    readonly code: AppCode;
    readonly message: string;
    details: unknown;
    retry: RetryAdvice | undefined;
    wwwAuthenticate: string | undefined;

    private constructor(status: number, code: AppCode, message: string) {
        this.status = status;
        this.code = code;
        this.message = message;
    }

    /**
     * @throws AppError of kind `Validation` when `status` is not an HTTP status
     */
    static create(status: number, code: AppCode, message: string): ErrorResponse {
        if (!isValidHttpStatus(status)) {
            throw AppError.validation(`invalid HTTP status: ${status}`);
        }
        return new ErrorResponse(status, code, message);
    }

    /**
     * Build the public response for an error. A redactable message is
     * replaced by the kind's label and its details are dropped.
     */
    static fromAppError(error: AppError): ErrorResponse {
        const redacted = error.isRedacted;
        const message = redacted ? kindLabel(error.kind) : error.renderMessage();
        const response = new ErrorResponse(kindHttpStatus(error.kind), error.code, message);
        response.details = redacted ? undefined : renderableDetails(error.details);
        response.retry = error.retry;
        response.wwwAuthenticate = error.wwwAuthenticate;
        return response;
    }

    withDetails(details: unknown): this {
        this.details = details;
        return this;
    }

    withRetryAfterSecs(seconds: number): this {
        this.retry = { afterSeconds: seconds };
        return this;
    }

    withWwwAuthenticate(challenge: string): this {
        this.wwwAuthenticate = challenge;
        return this;
    }

    toJSON(): ErrorResponseJson {
        const json: ErrorResponseJson = {
            status: this.status,
            code: this.code.toString(),
            message: this.message,
        };
        if (this.details !== undefined) json.details = this.details;
        if (this.retry) json.retry = { after_seconds: this.retry.afterSeconds };
        if (this.wwwAuthenticate !== undefined) json.www_authenticate = this.wwwAuthenticate;
        return json;
    }
}
