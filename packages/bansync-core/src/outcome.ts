/*
 * bansync-core/src/outcome.ts
 * ------------------------------------------------------------
 * Discriminated results returned across the core's public surface.
 *
 * Membership, permission and actuator failures are values, not exceptions.
 * Exceptions are reserved for storage adapters (PersistenceError) and document
 * shape checks (SchemaError); the service converts both to PERSISTENCE_FAILURE.
 */

export type ErrorCode =
    | "PERMISSION_DENIED"
    | "VALIDATION_ERROR"
    | "NOT_FOUND"
    | "ALREADY_EXISTS"
    | "ALREADY_MEMBER"
    | "NOT_MEMBER"
    | "NO_NETWORKS"
    | "ACTUATOR_FORBIDDEN"
    | "ACTUATOR_UNREACHABLE"
    | "ACTUATOR_FAILED"
    | "PERSISTENCE_FAILURE";

export interface Success<T> {
    ok: true;
    value: T;
}

export interface Failure<C extends ErrorCode = ErrorCode> {
    ok: false;
    code: C;
    message: string;
}

export type Outcome<T, C extends ErrorCode = ErrorCode> = Success<T> | Failure<C>;

export function success<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function failure<C extends ErrorCode>(code: C, message: string): Failure<C> {
    return { ok: false, code, message };
}

/** Thrown by blob store adapters when a document cannot be read or written. */
export class PersistenceError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "PersistenceError";
    }
}
