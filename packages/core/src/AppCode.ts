/**
 * Stable machine-readable error codes
 *
 * @module AppCode
 */

import { AppErrorKind } from "./kind.ts";

const CODE_PATTERN = /^[A-Z0-9]+(?:_[A-Z0-9]+)*$/;

/**
 * SCREAMING_SNAKE_CASE identifier distinct from the human message.
 *
 * Codes are compared by value. Built-in codes are interned: parsing
 * `"NOT_FOUND"` returns the very same {@link AppCode.NotFound} instance.
 */
export class AppCode {
    static readonly NotFound = new AppCode("NOT_FOUND");
    static readonly Validation = new AppCode("VALIDATION");
    static readonly Conflict = new AppCode("CONFLICT");
    static readonly UserAlreadyExists = new AppCode("USER_ALREADY_EXISTS");
    static readonly Unauthorized = new AppCode("UNAUTHORIZED");
    static readonly Forbidden = new AppCode("FORBIDDEN");
    static readonly NotImplemented = new AppCode("NOT_IMPLEMENTED");
    static readonly BadRequest = new AppCode("BAD_REQUEST");
    static readonly RateLimited = new AppCode("RATE_LIMITED");
    static readonly Internal = new AppCode("INTERNAL");
    static readonly Database = new AppCode("DATABASE");
    static readonly Service = new AppCode("SERVICE");
    static readonly Config = new AppCode("CONFIG");
    static readonly Timeout = new AppCode("TIMEOUT");
    static readonly Network = new AppCode("NETWORK");
    static readonly DependencyUnavailable = new AppCode("DEPENDENCY_UNAVAILABLE");
    static readonly Serialization = new AppCode("SERIALIZATION");
    static readonly Deserialization = new AppCode("DESERIALIZATION");
    static readonly ExternalApi = new AppCode("EXTERNAL_API");
    static readonly Queue = new AppCode("QUEUE");
    static readonly Cache = new AppCode("CACHE");

    private constructor(private readonly value: string) {}

    /**
     * Create a code from a literal. An invalid literal is a programming
     * error and throws.
     *
     * @throws TypeError if the literal is not SCREAMING_SNAKE_CASE
     */
    static of(literal: string): AppCode {
        const code = AppCode.parse(literal);
        if (code === undefined) {
            throw new TypeError(`AppCode literals must be SCREAMING_SNAKE_CASE, got "${literal}"`);
        }
        return code;
    }

    /**
     * Parse untrusted input. Returns `undefined` for anything that is not a
     * valid code.
     */
    static parse(value: string): AppCode | undefined {
        const builtin = BUILTIN_CODES.get(value);
        if (builtin) return builtin;
        if (!CODE_PATTERN.test(value)) return undefined;
        return new AppCode(value);
    }

    /**
     * Canonical default code for a kind.
     */
    static fromKind(kind: AppErrorKind): AppCode {
        return KIND_CODES[kind];
    }

    get isBuiltin(): boolean {
        return BUILTIN_CODES.get(this.value) === this;
    }

    equals(other: AppCode): boolean {
        return this === other || this.value === other.value;
    }

    toString(): string {
        return this.value;
    }

    toJSON(): string {
        return this.value;
    }
}

const KIND_CODES: Record<AppErrorKind, AppCode> = {
    [AppErrorKind.NotFound]: AppCode.NotFound,
    [AppErrorKind.Validation]: AppCode.Validation,
    [AppErrorKind.Conflict]: AppCode.Conflict,
    [AppErrorKind.Unauthorized]: AppCode.Unauthorized,
    [AppErrorKind.Forbidden]: AppCode.Forbidden,
    [AppErrorKind.NotImplemented]: AppCode.NotImplemented,
    [AppErrorKind.Internal]: AppCode.Internal,
    [AppErrorKind.BadRequest]: AppCode.BadRequest,
    [AppErrorKind.Database]: AppCode.Database,
    [AppErrorKind.Service]: AppCode.Service,
    [AppErrorKind.Config]: AppCode.Config,
    [AppErrorKind.Timeout]: AppCode.Timeout,
    [AppErrorKind.Network]: AppCode.Network,
    [AppErrorKind.RateLimited]: AppCode.RateLimited,
    [AppErrorKind.DependencyUnavailable]: AppCode.DependencyUnavailable,
    [AppErrorKind.Serialization]: AppCode.Serialization,
    [AppErrorKind.Deserialization]: AppCode.Deserialization,
    [AppErrorKind.ExternalApi]: AppCode.ExternalApi,
    [AppErrorKind.Queue]: AppCode.Queue,
    [AppErrorKind.Cache]: AppCode.Cache,
};

const BUILTIN_CODES: ReadonlyMap<string, AppCode> = new Map(
    [...Object.values(KIND_CODES), AppCode.UserAlreadyExists].map((code) => [code.toString(), code]),
);
