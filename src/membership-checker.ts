/**
 * @module membership-checker
 * @description
 * Fixed-capacity shadow set used to validate accumulator call discipline.
 *
 * * Storage: one `BigUint64Array` of probe keys; the occupied prefix `[0, count)` is dense.
 * * Lookups: linear scan, O(capacity) worst case. No hash table, no resizing.
 * * Copies: `clone()` duplicates the slot array, so two checkers never share state.
 * * Probe keys are element hashes. Colliding elements are treated as equal.
 */

import { resolveCapacity } from './config';
import { CheckerCapacityError } from './errors';
import { MASK_64, hashValue } from './hasher';
import type { Hashable, HashFunction } from './hasher';

export interface MembershipCheckerOptions<E extends Hashable> {
    /** Probe-key function. Must match the accumulator's hash. Defaults to `hashValue`. */
    hash?: HashFunction<E>;
    /** Maximum number of simultaneously present elements. Defaults to 8192. */
    capacity?: number;
}

/**
 * Exact (up to hash collisions) membership tracking over a bounded slot array.
 * @template E Element type. Only used to type `insert`/`remove`.
 */
export class BoundedMembershipChecker<E extends Hashable = Hashable> {
    declare protected readonly phantom: (element: E) => E;

    readonly #slots: BigUint64Array;
    readonly #hash: HashFunction<E>;
    #count: number;

    private constructor(slots: BigUint64Array, count: number, hash: HashFunction<E>) {
        this.#slots = slots;
        this.#count = count;
        this.#hash = hash;
    }

    static empty<E extends Hashable = Hashable>(options: MembershipCheckerOptions<E> = {}): BoundedMembershipChecker<E> {
        const capacity = resolveCapacity(options.capacity);
        return new BoundedMembershipChecker<E>(new BigUint64Array(capacity), 0, options.hash ?? hashValue);
    }

    /**
     * Builds a checker holding every key of `keys`. Duplicates collapse.
     * `E` is not inferred from `keys`, so `from(['a'])` stays open to other strings.
     */
    static from<E extends Hashable = Hashable>(keys: Iterable<NoInfer<E>>, options: MembershipCheckerOptions<E> = {}): BoundedMembershipChecker<E> {
        const checker = BoundedMembershipChecker.empty<E>(options);
        for (const key of keys) {
            checker.insert(key);
        }
        return checker;
    }

    get size(): number { return this.#count; }
    get capacity(): number { return this.#slots.length; }

    /**
     * Records `key` as present.
     * @returns `false` if it already was (nothing changes).
     * @throws {CheckerCapacityError} when a new key arrives and every slot is taken.
     */
    insert(key: E): boolean {
        const probe = this.#hash(key) & MASK_64;
        if (this.indexOf(probe) !== -1) return false;

        if (this.#count === this.#slots.length) {
            throw new CheckerCapacityError(this.#slots.length);
        }
        this.#slots[this.#count] = probe;
        this.#count++;
        return true;
    }

    /**
     * Forgets `key`.
     * **Algorithm: Swap & Pop.** The last occupied slot moves into the gap.
     * @returns `false` if the key was not present.
     */
    remove(key: E): boolean {
        const idx = this.indexOf(this.#hash(key) & MASK_64);
        if (idx === -1) return false;

        const last = this.#count - 1;
        const removed = this.#slots[idx];
        this.#slots[idx] = this.#slots[last];
        this.#slots[last] = removed;
        this.#count = last;
        return true;
    }

    has(key: E): boolean {
        return this.indexOf(this.#hash(key) & MASK_64) !== -1;
    }

    /** Independent copy. Mutating one never affects the other. */
    clone(): BoundedMembershipChecker<E> {
        return new BoundedMembershipChecker<E>(this.#slots.slice(), this.#count, this.#hash);
    }

    /** Same capacity and the same probe keys in the same slot order. */
    equals(other: BoundedMembershipChecker<E>): boolean {
        if (this === other) return true;
        if (this.capacity !== other.capacity || this.#count !== other.#count) return false;
        for (let i = 0; i < this.#count; i++) {
            if (this.#slots[i] !== other.#slots[i]) return false;
        }
        return true;
    }

    toString(): string {
        return `BoundedMembershipChecker(${this.#count}/${this.#slots.length})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    private indexOf(probe: bigint): number {
        const slots = this.#slots;
        const count = this.#count;
        for (let i = 0; i < count; i++) {
            if (slots[i] === probe) return i;
        }
        return -1;
    }
}
