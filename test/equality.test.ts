import { describe, expect, it } from 'vitest';
import { defaultEq, eqBy, structuralEquals } from '../src/equality';
import { fromList } from '../src/assoc-set';
import { AssocDict } from '../src/assoc-dict';

describe('structuralEquals', () => {
    it('compares primitives by value', () => {
        expect(structuralEquals(1, 1)).toBe(true);
        expect(structuralEquals('hel' + 'lo', 'hello')).toBe(true);
        expect(structuralEquals(1, 2)).toBe(false);
        expect(structuralEquals(1, '1')).toBe(false);
        expect(structuralEquals(null, undefined)).toBe(false);
        expect(structuralEquals(null, null)).toBe(true);
    });

    it('treats NaN as equal to itself and 0 as equal to -0', () => {
        expect(structuralEquals(NaN, NaN)).toBe(true);
        expect(structuralEquals(0, -0)).toBe(true);
        expect(structuralEquals(NaN, 0)).toBe(false);
    });

    it('compares arrays element-wise', () => {
        expect(structuralEquals([1, [2, 3]], [1, [2, 3]])).toBe(true);
        expect(structuralEquals([1, 2], [2, 1])).toBe(false);
        expect(structuralEquals([1, 2], [1, 2, 3])).toBe(false);
        expect(structuralEquals([], {})).toBe(false);
        expect(structuralEquals({}, [])).toBe(false);
    });

    it('compares plain records regardless of key order', () => {
        const a = { name: 'x', tags: ['a', 'b'], nested: { depth: 2 } };
        const b = { nested: { depth: 2 }, tags: ['a', 'b'], name: 'x' };
        expect(structuralEquals(a, b)).toBe(true);
        expect(structuralEquals({ a: 1 }, { a: 1, b: undefined })).toBe(false);
        expect(structuralEquals({ a: 1, c: 2 }, { a: 1, b: 2 })).toBe(false);
    });

    it('compares dates by timestamp', () => {
        expect(structuralEquals(new Date(1000), new Date(1000))).toBe(true);
        expect(structuralEquals(new Date(1000), new Date(2000))).toBe(false);
        expect(structuralEquals(new Date(1000), 1000)).toBe(false);
    });

    it('compares functions by reference', () => {
        const f = (x: number) => x + 1;
        const g = (x: number) => x + 1;
        expect(structuralEquals(f, f)).toBe(true);
        expect(structuralEquals(f, g)).toBe(false);
        expect(structuralEquals({ run: f }, { run: f })).toBe(true);
    });

    it('compares class instances without equals() by reference', () => {
        class Point { constructor(readonly x: number) {} }
        const p = new Point(1);
        expect(structuralEquals(p, p)).toBe(true);
        expect(structuralEquals(p, new Point(1))).toBe(false);
    });

    it('defers to an inherited equals() method', () => {
        class Caseless {
            constructor(readonly s: string) {}
            equals(other: unknown): boolean {
                return other instanceof Caseless && other.s.toLowerCase() === this.s.toLowerCase();
            }
        }
        expect(structuralEquals(new Caseless('Ab'), new Caseless('aB'))).toBe(true);
        expect(structuralEquals(new Caseless('Ab'), new Caseless('ac'))).toBe(false);
    });

    it('treats an own equals field as record data', () => {
        let calls = 0;
        const cmp = (x: unknown, y: unknown) => {
            calls++;
            return x === y;
        };
        const r1 = { name: 'byValue', equals: cmp };
        const r2 = { name: 'byValue', equals: cmp };
        expect(structuralEquals(r1, r2)).toBe(true);
        expect(structuralEquals(r1, { name: 'other', equals: cmp })).toBe(false);
        expect(structuralEquals(r1, { name: 'byValue', equals: (x: unknown, y: unknown) => x === y })).toBe(false);
        expect(calls).toBe(0);

        const s = fromList([r1, r2]);
        expect(s.size).toBe(1);
        expect(s.member({ ...r1 })).toBe(true);
    });

    it('compares nested collections order-independently', () => {
        expect(structuralEquals(fromList([1, 2]), fromList([2, 1]))).toBe(true);
        expect(structuralEquals([fromList([1, 2])], [fromList([2, 1])])).toBe(true);
        expect(structuralEquals(fromList([1, 2]), fromList([1]))).toBe(false);

        const d1 = AssocDict.fromEntries<string, number>([['a', 1], ['b', 2]]);
        const d2 = AssocDict.fromEntries<string, number>([['b', 2], ['a', 1]]);
        expect(structuralEquals(d1, d2)).toBe(true);
        expect(structuralEquals(d1, fromList(['a', 'b']))).toBe(false);
    });
});

describe('eqBy', () => {
    it('compares projections', () => {
        const byId = eqBy((u: { id: number; name: string }) => u.id);
        expect(byId.equals({ id: 1, name: 'a' }, { id: 1, name: 'b' })).toBe(true);
        expect(byId.equals({ id: 1, name: 'a' }, { id: 2, name: 'a' })).toBe(false);
    });

    it('accepts a custom base equality', () => {
        const caseless = eqBy((s: string) => s.toLowerCase(), { equals: (a: string, b: string) => a === b });
        expect(caseless.equals('ABC', 'abc')).toBe(true);
    });

    it('compares class instances by a projection', () => {
        class Point { constructor(readonly x: number, readonly y: number) {} }
        const byCoords = eqBy((p: Point) => [p.x, p.y]);
        expect(structuralEquals(new Point(1, 2), new Point(1, 2))).toBe(false);
        expect(byCoords.equals(new Point(1, 2), new Point(1, 2))).toBe(true);
        expect(fromList([new Point(1, 2), new Point(1, 2)], { keyEq: byCoords }).size).toBe(1);
    });

    it('defaults to structuralEquals', () => {
        expect(defaultEq.equals([1, { a: 2 }], [1, { a: 2 }])).toBe(true);
        const byPair = eqBy((p: { pair: number[] }) => p.pair);
        expect(byPair.equals({ pair: [1, 2] }, { pair: [1, 2] })).toBe(true);
    });
});
