import { SafeError, SafeResult } from "./types"

export function safeResult<T>(res: T): SafeResult<T> {
    return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
    return [err, undefined]
}
