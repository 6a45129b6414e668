import { toError } from "./errors";

export type Result<T, R extends string = string> =
    | { ok: true; value: T }
    | { ok: false; reason: R; error: Error };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function fail<R extends string>(reason: R, error: unknown): { ok: false; reason: R; error: Error } {
    return { ok: false, reason, error: toError(error) };
}

/** Runs `task`, turning a rejection into a failure tagged with `reason`. */
export async function attempt<T, R extends string>(reason: R, task: () => Promise<T>): Promise<Result<T, R>> {
    try {
        return ok(await task());
    } catch (error) {
        return fail(reason, error);
    }
}
