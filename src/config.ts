/**
 * Number of simultaneously present elements a membership checker tracks
 * unless an instance asks for another capacity.
 */
export const DEFAULT_CHECKER_CAPACITY = 1024 * 8;

/** Validates a capacity option, falling back to `DEFAULT_CHECKER_CAPACITY`. */
export function resolveCapacity(capacity: number = DEFAULT_CHECKER_CAPACITY): number {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
        throw new RangeError(`Checker capacity must be a positive integer, got ${capacity}`);
    }
    return capacity;
}
