/**
 * @module hasher
 * @description
 * Fast, deterministic, non-cryptographic 64-bit hashing for set elements.
 *
 * * Algorithm: FxHash word folding over BigInt lanes.
 *   `h = (rotl64(h, 5) ^ word) * 0x517cc1b727220a95  (mod 2^64)`
 * * Value universe: number | string | boolean | bigint | Hash | readonly Hashable[].
 * * Stable across runs: no per-process seed.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * Objects that know how to feed themselves into a hasher.
 * Implementations must write the same words for logically equal values.
 */
export interface Hash {
    hash(hasher: FxHasher): void;
}

/** Every value `hashValue` accepts. Tuples and arrays nest recursively. */
export type Hashable =
    | number
    | string
    | boolean
    | bigint
    | Hash
    | ReadonlyArray<Hashable>;

/** Maps an element to a 64-bit digest. Results outside [0, 2^64) are truncated by callers. */
export type HashFunction<E> = (element: E) => bigint;

// ============================================================================
// 2. CONSTANTS
// ============================================================================

export const MASK_64 = 0xffffffffffffffffn;

const FX_SEED = 0x517cc1b727220a95n;
const ROTATE = 5n;

// Type tags keep `1`, `'1'`, `true` and `1n` apart.
const TAG_NUMBER = 1n;
const TAG_STRING = 2n;
const TAG_BOOLEAN = 3n;
const TAG_BIGINT = 4n;
const TAG_SEQUENCE = 5n;
const TAG_STRUCTURAL = 6n;

const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

function rotl64(x: bigint): bigint {
    return ((x << ROTATE) | (x >> (64n - ROTATE))) & MASK_64;
}

function isSequence(value: Hash | ReadonlyArray<Hashable>): value is ReadonlyArray<Hashable> {
    return Array.isArray(value);
}

// ============================================================================
// 3. STREAMING HASHER
// ============================================================================

/**
 * Streaming FxHash state. Writers return `this` so calls can be chained:
 *
 * ```ts
 * const h = new FxHasher().writeNumber(3).writeString('rook').finish();
 * ```
 */
export class FxHasher {
    #state = 0n;

    /** Folds one 64-bit word. Negative or oversized input is reduced mod 2^64. */
    writeU64(word: bigint): this {
        this.#state = ((rotl64(this.#state) ^ (word & MASK_64)) * FX_SEED) & MASK_64;
        return this;
    }

    /**
     * Safe integers are written as one signed 64-bit word (so `-0` and `0` agree).
     * Everything else goes through its IEEE-754 bit pattern.
     */
    writeNumber(value: number): this {
        if (Number.isSafeInteger(value)) return this.writeU64(BigInt(value));
        view.setFloat64(0, value, true);
        return this.writeU64(view.getBigUint64(0, true));
    }

    /** Length word, then UTF-16 code units packed four per word. */
    writeString(value: string): this {
        const len = value.length;
        this.writeU64(BigInt(len));
        for (let i = 0; i < len; i += 4) {
            // charCodeAt past the end is NaN, which the bit ops turn into 0
            const lo = (value.charCodeAt(i) | (value.charCodeAt(i + 1) << 16)) >>> 0;
            const hi = (value.charCodeAt(i + 2) | (value.charCodeAt(i + 3) << 16)) >>> 0;
            this.writeU64((BigInt(hi) << 32n) | BigInt(lo));
        }
        return this;
    }

    writeBoolean(value: boolean): this {
        return this.writeU64(value ? 1n : 0n);
    }

    /** 64-bit limbs, least significant first, followed by a sign word. */
    writeBigInt(value: bigint): this {
        let rest = value;
        do {
            this.writeU64(rest & MASK_64);
            rest >>= 64n;
        } while (rest !== 0n && rest !== -1n);
        return this.writeU64(value < 0n ? 1n : 0n);
    }

    /** Writes a type tag and then the payload of any `Hashable`. */
    write(value: Hashable): this {
        switch (typeof value) {
            case 'number':
                return this.writeU64(TAG_NUMBER).writeNumber(value);
            case 'string':
                return this.writeU64(TAG_STRING).writeString(value);
            case 'boolean':
                return this.writeU64(TAG_BOOLEAN).writeBoolean(value);
            case 'bigint':
                return this.writeU64(TAG_BIGINT).writeBigInt(value);
        }

        if (isSequence(value)) {
            this.writeU64(TAG_SEQUENCE).writeU64(BigInt(value.length));
            for (let i = 0; i < value.length; i++) {
                this.write(value[i]);
            }
            return this;
        }

        this.writeU64(TAG_STRUCTURAL);
        value.hash(this);
        return this;
    }

    finish(): bigint {
        return this.#state;
    }
}

/**
 * One-shot hash of a value.
 * This is the default hash function of accumulators and checkers.
 */
export function hashValue(value: Hashable): bigint {
    return new FxHasher().write(value).finish();
}
