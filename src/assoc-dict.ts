/**
 * @module assoc-dict
 * @description
 * Immutable association list with insertion-order iteration.
 *
 * Keys are located by linear scan with an `Eq<K>` capability; no hash or ordering
 * is ever computed. Every operation returns a new dictionary (or the receiver when
 * nothing changes) and never touches the entry array of an existing instance.
 *
 * Contracts:
 * - Entries are stored most-recently-inserted first.
 * - No two entries hold keys equal under the dictionary's key equality.
 * - Binary operations use the receiver's (left operand's) equalities.
 */

import { defaultEq, type Eq, type Structural } from './equality';

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

export type Entry<K, V> = readonly [key: K, value: V];

export interface DictOptions<K, V> {
    /** Equality used to locate keys. Defaults to `structuralEquals`. */
    readonly keyEq?: Eq<K>;
    /** Equality used by `eq` to compare values. Defaults to `structuralEquals`. */
    readonly valueEq?: Eq<V>;
}

/**
 * Human-readable rendering shared by `toString` of the collections.
 */
export function formatValue(v: unknown): string {
    if (Array.isArray(v)) return `[${v.map(formatValue).join(', ')}]`;
    return String(v);
}

// ============================================================================
// 2. ASSOCIATION DICTIONARY
// ============================================================================

/**
 * An ordered, key-unique collection of `[key, value]` entries.
 *
 * @template K Key type. Only an equality test is required.
 * @template V Value type.
 */
export class AssocDict<K, V> implements Structural, Iterable<Entry<K, V>> {
    private readonly _entries: readonly Entry<K, V>[];
    private readonly _keyEq: Eq<K>;
    private readonly _valueEq: Eq<V>;

    private constructor(entries: readonly Entry<K, V>[], keyEq: Eq<K>, valueEq: Eq<V>) {
        this._entries = entries;
        this._keyEq = keyEq;
        this._valueEq = valueEq;
    }

    static empty<K, V>(options: DictOptions<K, V> = {}): AssocDict<K, V> {
        return new AssocDict<K, V>([], options.keyEq ?? defaultEq, options.valueEq ?? defaultEq);
    }

    static singleton<K, V>(key: K, value: V, options: DictOptions<K, V> = {}): AssocDict<K, V> {
        return AssocDict.empty<K, V>(options).insert(key, value);
    }

    /**
     * Folds right over `entries` with `insert`: for a repeated key the first
     * occurrence in reading order is inserted last and ends up most recent.
     */
    static fromEntries<K, V>(entries: Iterable<Entry<K, V>>, options: DictOptions<K, V> = {}): AssocDict<K, V> {
        return Array.from(entries).reduceRight(
            (dict, [key, value]) => dict.insert(key, value),
            AssocDict.empty<K, V>(options)
        );
    }

    get size(): number { return this._entries.length; }
    get keyEquality(): Eq<K> { return this._keyEq; }
    isEmpty(): boolean { return this._entries.length === 0; }

    private derive(entries: readonly Entry<K, V>[]): AssocDict<K, V> {
        return new AssocDict(entries, this._keyEq, this._valueEq);
    }

    /** Linear scan with this dictionary's key equality; stops at the first hit. */
    private locate(entries: readonly Entry<K, V>[], key: K): number {
        const len = entries.length;
        for (let i = 0; i < len; i++) {
            if (this._keyEq.equals(entries[i][0], key)) return i;
        }
        return -1;
    }

    member(key: K): boolean {
        return this.locate(this._entries, key) !== -1;
    }

    lookup(key: K): V | undefined {
        const idx = this.locate(this._entries, key);
        return idx === -1 ? undefined : this._entries[idx][1];
    }

    findWithDefault(fallback: V, key: K): V {
        const idx = this.locate(this._entries, key);
        return idx === -1 ? fallback : this._entries[idx][1];
    }

    /**
     * Adds or replaces the entry for `key`.
     * A replaced entry moves to the most-recent position as well.
     * @complexity O(n)
     */
    insert(key: K, value: V): AssocDict<K, V> {
        const arr = this._entries;
        const len = arr.length;
        const idx = this.locate(arr, key);

        const next: Entry<K, V>[] = [[key, value]];
        for (let i = 0; i < len; i++) {
            if (i !== idx) next.push(arr[i]);
        }
        return this.derive(next);
    }

    /**
     * Drops the entry for `key`. Returns the receiver itself if `key` is absent.
     * @complexity O(n)
     */
    remove(key: K): AssocDict<K, V> {
        const idx = this.locate(this._entries, key);
        if (idx === -1) return this;
        return this.derive(this._entries.filter((_, i) => i !== idx));
    }

    /**
     * Order-independent equality: same size, and every `[key, value]` of the
     * receiver has an equal key in `other` holding an equal value.
     * Since keys are unique on both sides, this is a bijection check.
     */
    eq(other: AssocDict<K, V>): boolean {
        if (this === other) return true;
        if (this.size !== other.size) return false;

        const theirs = other._entries;
        for (const [key, value] of this._entries) {
            const idx = this.locate(theirs, key);
            if (idx === -1) return false;
            if (!this._valueEq.equals(value, theirs[idx][1])) return false;
        }
        return true;
    }

    /**
     * Receiver's entries first (they win on collision and keep their position),
     * followed by `other`'s entries whose key the receiver lacks.
     * @complexity O(n·m)
     */
    union(other: AssocDict<K, V>): AssocDict<K, V> {
        if (other.isEmpty()) return this;

        const mine = this._entries;
        const res = mine.slice();
        for (const entry of other._entries) {
            if (this.locate(mine, entry[0]) === -1) res.push(entry);
        }
        return this.derive(res);
    }

    intersect(other: AssocDict<K, V>): AssocDict<K, V> {
        const theirs = other._entries;
        return this.derive(this._entries.filter(([key]) => this.locate(theirs, key) !== -1));
    }

    diff(other: AssocDict<K, V>): AssocDict<K, V> {
        const theirs = other._entries;
        return this.derive(this._entries.filter(([key]) => this.locate(theirs, key) === -1));
    }

    /** Keys, most recently inserted first. */
    keys(): K[] { return this._entries.map(([key]) => key); }

    values(): V[] { return this._entries.map(([, value]) => value); }

    entries(): Entry<K, V>[] { return this._entries.slice(); }

    /** Visits entries from most recent to least recent. */
    foldl<A>(f: (acc: A, key: K, value: V) => A, init: A): A {
        let acc = init;
        for (const [key, value] of this._entries) acc = f(acc, key, value);
        return acc;
    }

    /**
     * Mirror image of `foldl`: `f` is applied to the least recent entry first,
     * so the most recent entry sees the fully accumulated value.
     */
    foldr<A>(f: (key: K, value: V, acc: A) => A, init: A): A {
        const arr = this._entries;
        let acc = init;
        for (let i = arr.length - 1; i >= 0; i--) acc = f(arr[i][0], arr[i][1], acc);
        return acc;
    }

    filter(pred: (key: K, value: V) => boolean): AssocDict<K, V> {
        return this.derive(this._entries.filter(([key, value]) => pred(key, value)));
    }

    /** Splits into `[matching, rest]`, both in the receiver's order. */
    partition(pred: (key: K, value: V) => boolean): [AssocDict<K, V>, AssocDict<K, V>] {
        const yes: Entry<K, V>[] = [];
        const no: Entry<K, V>[] = [];
        for (const entry of this._entries) {
            if (pred(entry[0], entry[1])) yes.push(entry);
            else no.push(entry);
        }
        return [this.derive(yes), this.derive(no)];
    }

    /**
     * Same keys in the same order with transformed values.
     * The result compares values with `structuralEquals`.
     */
    mapValues<W>(f: (value: V, key: K) => W): AssocDict<K, W> {
        const mapped = this._entries.map(([key, value]): Entry<K, W> => [key, f(value, key)]);
        return new AssocDict<K, W>(mapped, this._keyEq, defaultEq);
    }

    [Symbol.iterator](): Iterator<Entry<K, V>> { return this._entries[Symbol.iterator](); }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof AssocDict)) return false;
        return this.eq(other);
    }

    toString(): string {
        const parts = this._entries.map(([key, value]) => `${formatValue(key)} => ${formatValue(value)}`);
        return `{${parts.join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 3. PUBLIC EXPORTS
// ============================================================================

/** Creates an empty AssocDict. */
export function emptyDict<K, V>(options?: DictOptions<K, V>): AssocDict<K, V> {
    return AssocDict.empty<K, V>(options);
}
