/**
 * Either a decoded value or the error that stopped it.
 */
export type Result<T, E = Error> = { ok: true; data: T } | { ok: false; error: E };

export function ok<T>(data: T): Result<T, never> {
    return { ok: true, data };
}

export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Returns the data of a successful Result, throws the error otherwise.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
    if (!result.ok) {
        throw result.error;
    }
    return result.data;
}
