/**
 * @module assoc-set
 * @description
 * Set of arbitrary values backed by an `AssocDict<K, Unit>`.
 * Each operation forwards to one dictionary operation; ordering, equality and
 * complexity are exactly those of the dictionary.
 */

import { AssocDict, formatValue } from './assoc-dict';
import type { Eq, Structural } from './equality';

export type Unit = undefined;

export interface SetOptions<K> {
    /** Equality used to locate elements. Defaults to `structuralEquals`. */
    readonly keyEq?: Eq<K>;
}

export class AssocSet<K> implements Structural, Iterable<K> {
    private readonly _dict: AssocDict<K, Unit>;

    private constructor(dict: AssocDict<K, Unit>) {
        this._dict = dict;
    }

    static empty<K>(options: SetOptions<K> = {}): AssocSet<K> {
        return new AssocSet(AssocDict.empty<K, Unit>(options));
    }

    static singleton<K>(element: K, options: SetOptions<K> = {}): AssocSet<K> {
        return new AssocSet(AssocDict.singleton<K, Unit>(element, undefined, options));
    }

    /**
     * Inserts from right to left. Duplicates collapse onto the first occurrence,
     * which becomes the most recent element:
     * `fromList([3, 1, 2, 3]).toList()` is `[3, 1, 2]`.
     */
    static fromList<K>(list: readonly K[], options: SetOptions<K> = {}): AssocSet<K> {
        return list.reduceRight((set, element) => set.insert(element), AssocSet.empty<K>(options));
    }

    static fromIterable<K>(iterable: Iterable<K>, options: SetOptions<K> = {}): AssocSet<K> {
        return AssocSet.fromList(Array.from(iterable), options);
    }

    get size(): number { return this._dict.size; }
    isEmpty(): boolean { return this._dict.isEmpty(); }
    member(element: K): boolean { return this._dict.member(element); }

    insert(element: K): AssocSet<K> {
        return new AssocSet(this._dict.insert(element, undefined));
    }

    remove(element: K): AssocSet<K> {
        const next = this._dict.remove(element);
        return next === this._dict ? this : new AssocSet(next);
    }

    /** Same elements, in any order. */
    eq(other: AssocSet<K>): boolean { return this._dict.eq(other._dict); }

    union(other: AssocSet<K>): AssocSet<K> { return new AssocSet(this._dict.union(other._dict)); }
    intersect(other: AssocSet<K>): AssocSet<K> { return new AssocSet(this._dict.intersect(other._dict)); }
    diff(other: AssocSet<K>): AssocSet<K> { return new AssocSet(this._dict.diff(other._dict)); }

    symmetricDifference(other: AssocSet<K>): AssocSet<K> {
        return this.diff(other).union(other.diff(this));
    }

    isSubsetOf(other: AssocSet<K>): boolean { return this.diff(other).isEmpty(); }

    /** Elements, most recently inserted first. */
    toList(): K[] { return this._dict.keys(); }

    toDict(): AssocDict<K, Unit> { return this._dict; }

    foldl<A>(f: (acc: A, element: K) => A, init: A): A {
        return this._dict.foldl((acc, key) => f(acc, key), init);
    }

    foldr<A>(f: (element: K, acc: A) => A, init: A): A {
        return this._dict.foldr((key, _unit, acc) => f(key, acc), init);
    }

    /**
     * Collects images in `foldl` order, reversed (the same list prepending
     * would build), then runs `fromList` over them. For an injective `f` the
     * result lists the images in reverse source order; when several elements
     * share an image, the one visited last by `foldl` keeps its place. Only the element set is meant to be relied upon.
     */
    map<B>(f: (element: K) => B): AssocSet<B> {
        const images = this.foldl<B[]>((acc, element) => {
            acc.push(f(element));
            return acc;
        }, []);
        return AssocSet.fromList(images.reverse());
    }

    filter(pred: (element: K) => boolean): AssocSet<K> {
        return new AssocSet(this._dict.filter((key) => pred(key)));
    }

    partition(pred: (element: K) => boolean): [AssocSet<K>, AssocSet<K>] {
        const [yes, no] = this._dict.partition((key) => pred(key));
        return [new AssocSet(yes), new AssocSet(no)];
    }

    [Symbol.iterator](): Iterator<K> { return this.toList()[Symbol.iterator](); }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof AssocSet)) return false;
        return this.eq(other);
    }

    toString(): string {
        return `{${this.toList().map(formatValue).join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// PUBLIC EXPORTS
// ============================================================================

/** Creates an empty AssocSet. */
export function emptySet<K>(options?: SetOptions<K>): AssocSet<K> { return AssocSet.empty(options); }

/** Creates an AssocSet containing a single element. */
export function singleton<K>(element: K, options?: SetOptions<K>): AssocSet<K> {
    return AssocSet.singleton(element, options);
}

export function fromList<K>(list: readonly K[], options?: SetOptions<K>): AssocSet<K> {
    return AssocSet.fromList(list, options);
}

export function fromIterable<K>(iterable: Iterable<K>, options?: SetOptions<K>): AssocSet<K> {
    return AssocSet.fromIterable(iterable, options);
}
