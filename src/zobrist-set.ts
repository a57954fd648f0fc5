/**
 * @module zobrist-set
 * @description
 * Incremental, order-independent fingerprint of a mutable set.
 *
 * * Engine: Zobrist hashing without a table. Each element's 64-bit hash is
 *   XOR-folded into a single running value, so add and remove are O(1).
 * * Order independence: XOR is commutative, associative and self-inverse.
 *   `add(k); remove(k)` restores the previous value exactly.
 * * Two builds:
 *   - `ZobristHashSet`: bare accumulator, no auxiliary state, never throws.
 *   - `CheckedZobristHashSet`: also drives a `BoundedMembershipChecker` and
 *     throws on double adds, removals of absent elements and capacity overflow.
 *   The `zobrist-set/checked` entry point (or the `zobrist-check` export
 *   condition) swaps the second in under the first one's name.
 *
 * @example
 * ```ts
 * const board = ZobristHashSet.empty<readonly [number, number, Piece]>();
 * board.add([1, 0, Piece.WhitePawn]);
 * const key = board.value; // bigint in [0, 2^64)
 * ```
 */

import { BoundedMembershipChecker } from './membership-checker';
import { SetBehaviorError } from './errors';
import { MASK_64, hashValue } from './hasher';
import type { Hashable, HashFunction } from './hasher';

// ============================================================================
// 1. OPTIONS
// ============================================================================

export interface ZobristHashSetOptions<E extends Hashable> {
    /** Element hash. Defaults to `hashValue` (FxHash). */
    hash?: HashFunction<E>;
}

export interface CheckedZobristHashSetOptions<E extends Hashable> extends ZobristHashSetOptions<E> {
    /** Checker capacity. Defaults to `DEFAULT_CHECKER_CAPACITY`. */
    capacity?: number;
}

function checkRaw(raw: bigint): bigint {
    if (raw < 0n || raw > MASK_64) {
        throw new RangeError(`Raw Zobrist value must fit in 64 unsigned bits, got ${raw}`);
    }
    return raw;
}

// ============================================================================
// 2. PRODUCTION ACCUMULATOR
// ============================================================================

/**
 * XOR-fold fingerprint of the elements currently "present".
 * What counts as present is defined entirely by the caller's add/remove calls.
 *
 * @template E Element type. Carries no runtime data; it only keeps
 * `ZobristHashSet<A>` and `ZobristHashSet<B>` from being mixed.
 */
export class ZobristHashSet<E extends Hashable = Hashable> {
    declare protected readonly phantom: (element: E) => E;

    protected _value: bigint;
    protected readonly _hash: HashFunction<E>;

    protected constructor(value: bigint, hash: HashFunction<E>) {
        this._value = value;
        this._hash = hash;
    }

    static empty<E extends Hashable = Hashable>(options: ZobristHashSetOptions<E> = {}): ZobristHashSet<E> {
        return new ZobristHashSet<E>(0n, options.hash ?? hashValue);
    }

    /**
     * Rebuilds an accumulator from a value previously read with `toBigInt()`.
     * @throws {RangeError} if `raw` is negative or wider than 64 bits.
     */
    static from<E extends Hashable = Hashable>(raw: bigint, options: ZobristHashSetOptions<E> = {}): ZobristHashSet<E> {
        return new ZobristHashSet<E>(checkRaw(raw), options.hash ?? hashValue);
    }

    get value(): bigint { return this._value; }

    add(key: E): void {
        this._value ^= this._hash(key) & MASK_64;
    }

    /** Same bit operation as `add`: XOR is its own inverse. */
    remove(key: E): void {
        this._value ^= this._hash(key) & MASK_64;
    }

    toBigInt(): bigint { return this._value; }
    valueOf(): bigint { return this._value; }

    clone(): ZobristHashSet<E> {
        return new ZobristHashSet<E>(this._value, this._hash);
    }

    equals(other: ZobristHashSet<E>): boolean {
        return this._value === other._value;
    }

    toString(): string {
        return `ZobristHashSet(0x${this._value.toString(16).padStart(16, '0')})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 3. CHECKED ACCUMULATOR
// ============================================================================

/**
 * Accumulator that validates every call against a `BoundedMembershipChecker`
 * before folding. Value transitions are identical to `ZobristHashSet` for any
 * sequence the checker accepts.
 *
 * Instances made with `from(raw)` have no checker: the element set behind a
 * raw value is unknown, so their calls are not validated.
 */
export class CheckedZobristHashSet<E extends Hashable = Hashable> extends ZobristHashSet<E> {
    readonly #checker: BoundedMembershipChecker<E> | null;

    private constructor(value: bigint, hash: HashFunction<E>, checker: BoundedMembershipChecker<E> | null) {
        super(value, hash);
        this.#checker = checker;
    }

    static empty<E extends Hashable = Hashable>(options: CheckedZobristHashSetOptions<E> = {}): CheckedZobristHashSet<E> {
        const hash = options.hash ?? hashValue;
        const checker = BoundedMembershipChecker.empty<E>({ hash, capacity: options.capacity });
        return new CheckedZobristHashSet<E>(0n, hash, checker);
    }

    /** No checker is attached, so only `hash` is taken from the options. */
    static from<E extends Hashable = Hashable>(raw: bigint, options: ZobristHashSetOptions<E> = {}): CheckedZobristHashSet<E> {
        return new CheckedZobristHashSet<E>(checkRaw(raw), options.hash ?? hashValue, null);
    }

    /** Whether calls are being validated (false after `from(raw)`). */
    get isChecked(): boolean { return this.#checker !== null; }

    /**
     * @throws {SetBehaviorError} if `key` is already present.
     * @throws {CheckerCapacityError} if the checker is full.
     */
    add(key: E): void {
        if (this.#checker !== null && !this.#checker.insert(key)) {
            throw new SetBehaviorError('Cannot add an element that is already in the set');
        }
        super.add(key);
    }

    /** @throws {SetBehaviorError} if `key` is not present. */
    remove(key: E): void {
        if (this.#checker !== null && !this.#checker.remove(key)) {
            throw new SetBehaviorError('Cannot remove an element that is not in the set');
        }
        super.remove(key);
    }

    /** Copies the checker as well, so the two sets validate independently. */
    clone(): CheckedZobristHashSet<E> {
        return new CheckedZobristHashSet<E>(this._value, this._hash, this.#checker?.clone() ?? null);
    }
}
