import { describe, it, expect } from 'vitest';
import { ValidationError } from './errors';
import {
    Values,
    cloneValue,
    isValue,
    mergeFields,
    toJS,
    validateValue,
    valueEquals,
    valueTypeName,
    type Value,
} from './value';

function nested(depth: number): Value {
    let value: Value = Values.int(1);
    for (let i = 1; i < depth; i++) {
        value = Values.array([value]);
    }
    return value;
}

describe('Values', () => {
    it('builds ints as 64-bit bigints', () => {
        expect(Values.int(42)).toEqual({ type: 'int', value: 42n });
        expect(Values.int(2n ** 63n - 1n)).toEqual({ type: 'int', value: 9223372036854775807n });
    });

    it('rejects ints outside the 64-bit range', () => {
        expect(() => Values.int(2n ** 63n)).toThrow(RangeError);
    });

    it('converts plain data with fromJS', () => {
        const value = Values.fromJS({ hp: 10, speed: 1.5, name: 'orc', pos: { $vec3: [1, 2, 3] }, tags: ['a'], none: null });
        expect(value.type).toBe('object');
        if (value.type !== 'object') return;
        expect(value.fields.get('hp')).toEqual({ type: 'int', value: 10n });
        expect(value.fields.get('speed')).toEqual({ type: 'float', value: 1.5 });
        expect(value.fields.get('name')).toEqual({ type: 'string', value: 'orc' });
        expect(value.fields.get('pos')).toEqual({ type: 'vec3', value: [1, 2, 3] });
        expect(value.fields.get('tags')).toEqual({ type: 'array', items: [{ type: 'string', value: 'a' }] });
        expect(value.fields.get('none')).toEqual({ type: 'null' });
    });

    it('treats an object with extra keys beside $vec3 as a plain object', () => {
        const value = Values.fromJS({ $vec3: [1, 2, 3], extra: true });
        expect(value.type).toBe('object');
    });

    it('fromJS refuses nesting deeper than the limit', () => {
        const input = [[[1]]];
        expect(() => Values.fromJS(input, { maxDepth: 3, maxCollectionSize: 10 })).toThrow(ValidationError);
        expect(Values.fromJS(input, { maxDepth: 4, maxCollectionSize: 10 }).type).toBe('array');
    });

    it('fromJS passes existing Values through', () => {
        const vec = Values.vec3(0, 0, 1);
        expect(Values.fromJS({ v: vec })).toEqual(Values.object({ v: vec }));
    });
});

describe('toJS', () => {
    it('round-trips plain data', () => {
        const data = { hp: 10, speed: 1.5, pos: { $vec3: [1, 2, 3] }, list: [true, null, 'x'] };
        expect(toJS(Values.fromJS(data))).toEqual(data);
    });

    it('keeps ints beyond the safe range as bigints', () => {
        expect(toJS(Values.int(2n ** 60n))).toBe(1152921504606846976n);
    });
});

describe('isValue', () => {
    it('recognises values by tag and payload slot', () => {
        expect(isValue(Values.null())).toBe(true);
        expect(isValue(Values.object({}))).toBe(true);
        expect(isValue({ type: 'object', fields: {} })).toBe(false);
        expect(isValue({ type: 'colour', value: 1 })).toBe(false);
        expect(isValue('int')).toBe(false);
    });
});

describe('valueTypeName', () => {
    it('names each variant', () => {
        expect(valueTypeName(Values.float(1))).toBe('Float');
        expect(valueTypeName(Values.vec3(1, 2, 3))).toBe('Vec3');
        expect(valueTypeName(Values.array([]))).toBe('Array');
    });
});

describe('validateValue', () => {
    it('accepts values at exactly the max depth', () => {
        expect(validateValue(nested(5), { maxDepth: 5, maxCollectionSize: 10 })).toBeNull();
    });

    it('returns PayloadTooLarge one level past the max depth', () => {
        const error = validateValue(nested(6), { maxDepth: 5, maxCollectionSize: 10 });
        expect(error).toBeInstanceOf(ValidationError);
        expect(error?.kind).toBe('PayloadTooLarge');
        expect(error?.message).toBe('Value nesting exceeds max depth of 5');
    });

    it('handles very deep values without recursion', () => {
        const error = validateValue(nested(100_000));
        expect(error?.kind).toBe('PayloadTooLarge');
    });

    it('bounds collection sizes', () => {
        const error = validateValue(Values.array([Values.null(), Values.null(), Values.null()]), {
            maxDepth: 8,
            maxCollectionSize: 2,
        });
        expect(error?.message).toBe('Array of 3 items exceeds max collection size of 2');
        const objectError = validateValue(Values.object({ a: Values.null(), b: Values.null(), c: Values.null() }), {
            maxDepth: 8,
            maxCollectionSize: 2,
        });
        expect(objectError?.message).toBe('Object of 3 fields exceeds max collection size of 2');
    });
});

describe('valueEquals', () => {
    it('compares objects regardless of key order', () => {
        const a = Values.object({ x: Values.int(1), y: Values.string('b') });
        const b = Values.object({ y: Values.string('b'), x: Values.int(1) });
        expect(valueEquals(a, b)).toBe(true);
    });

    it('never equates an int with a float', () => {
        expect(valueEquals(Values.int(1), Values.float(1))).toBe(false);
    });

    it('detects nested differences', () => {
        const a = Values.fromJS({ list: [1, 2, { deep: 'x' }] });
        const b = Values.fromJS({ list: [1, 2, { deep: 'y' }] });
        expect(valueEquals(a, b)).toBe(false);
        expect(valueEquals(a, Values.fromJS({ list: [1, 2, { deep: 'x' }] }))).toBe(true);
    });

    it('compares vec3 component-wise', () => {
        expect(valueEquals(Values.vec3(1, 2, 3), Values.vec3(1, 2, 3))).toBe(true);
        expect(valueEquals(Values.vec3(1, 2, 3), Values.vec3(1, 2, 4))).toBe(false);
    });

    it('distinguishes objects with different field sets', () => {
        expect(valueEquals(Values.object({ a: Values.null() }), Values.object({ b: Values.null() }))).toBe(false);
    });
});

describe('cloneValue', () => {
    it('produces an equal value that shares no collections', () => {
        const original = Values.fromJS({ list: [1, 2], pos: { $vec3: [0, 1, 0] } });
        const copy = cloneValue(original);
        expect(valueEquals(copy, original)).toBe(true);
        if (copy.type !== 'object' || original.type !== 'object') return;
        expect(copy.fields).not.toBe(original.fields);
        expect(copy.fields.get('list')).not.toBe(original.fields.get('list'));
    });
});

describe('mergeFields', () => {
    it('writes fields over the base without touching it', () => {
        const base = Values.object({ hp: Values.int(10), max: Values.int(10) });
        const merged = mergeFields(base, new Map([['hp', Values.int(4)]]));
        expect(toJS(merged)).toEqual({ hp: 4, max: 10 });
        expect(toJS(base)).toEqual({ hp: 10, max: 10 });
    });
});
