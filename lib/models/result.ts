/**
 * Outcome of a single load: either the fetched bytes or the engine's failure
 */
export type LoadResult =
    | { readonly kind: 'data'; readonly data: Buffer }
    | { readonly kind: 'error'; readonly error: Error };

export const LoadResult = {
    // Copies the bytes so later writes to the engine's buffer cannot change the result.
    data(bytes: Buffer): LoadResult {
        const result: LoadResult = { kind: 'data', data: Buffer.from(bytes) };
        return Object.freeze(result);
    },

    error(failure: Error): LoadResult {
        const result: LoadResult = { kind: 'error', error: failure };
        return Object.freeze(result);
    },
};
