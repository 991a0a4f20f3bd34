/**
 * @file value.ts
 * @brief The schema-agnostic payload carried by every patch.
 *
 * A `Value` is a closed tagged union. Object keys are unique and their
 * order is irrelevant to equality. Values are always fully materialized
 * before they enter the bus, and `validateValue` bounds their depth and
 * collection sizes before anything else walks them.
 *
 * @example
 * ```typescript
 * import { Values, valueEquals } from 'patchbus';
 *
 * const transform = Values.object({
 *   position: Values.vec3(0, 1, 0),
 *   layer: Values.int(3),
 * });
 * valueEquals(transform, Values.fromJS({ position: { $vec3: [0, 1, 0] }, layer: 3 }));
 * ```
 */
import { ValidationError } from './errors';

export type Vec3 = readonly [number, number, number];

export type Value =
    | { readonly type: 'null' }
    | { readonly type: 'bool'; readonly value: boolean }
    | { readonly type: 'int'; readonly value: bigint }
    | { readonly type: 'float'; readonly value: number }
    | { readonly type: 'string'; readonly value: string }
    | { readonly type: 'vec3'; readonly value: Vec3 }
    | { readonly type: 'array'; readonly items: readonly Value[] }
    | { readonly type: 'object'; readonly fields: ReadonlyMap<string, Value> };

export type ValueType = Value['type'];

export type ObjectValue = Extract<Value, { type: 'object' }>;

export interface ValueLimits {
    /** Deepest nesting accepted; a scalar has depth 1. */
    maxDepth: number;
    /** Largest array length or object field count accepted. */
    maxCollectionSize: number;
}

export const DEFAULT_VALUE_LIMITS: ValueLimits = {
    maxDepth: 64,
    maxCollectionSize: 65536,
};

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const NULL_VALUE: Value = Object.freeze({ type: 'null' });

function toInt64(value: number | bigint): bigint {
    const big = typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
    if (big < INT64_MIN || big > INT64_MAX) {
        throw new RangeError(`Int value ${big} is outside the 64-bit range`);
    }
    return big;
}

/**
 * Constructors for every Value variant.
 */
export const Values = {
    null(): Value {
        return NULL_VALUE;
    },
    bool(value: boolean): Value {
        return { type: 'bool', value };
    },
    int(value: number | bigint): Value {
        return { type: 'int', value: toInt64(value) };
    },
    float(value: number): Value {
        return { type: 'float', value };
    },
    string(value: string): Value {
        return { type: 'string', value };
    },
    vec3(x: number, y: number, z: number): Value {
        return { type: 'vec3', value: [x, y, z] };
    },
    array(items: readonly Value[]): Value {
        return { type: 'array', items: [...items] };
    },
    object(fields: Record<string, Value> | ReadonlyMap<string, Value>): ObjectValue {
        const entries = fields instanceof Map ? Array.from(fields.entries()) : Object.entries(fields);
        return { type: 'object', fields: new Map(entries) };
    },

    /**
     * Converts plain JavaScript data. Integral numbers become `int`, other
     * numbers `float`, and `{ $vec3: [x, y, z] }` becomes a vec3.
     *
     * @throws {ValidationError} PayloadTooLarge when nesting exceeds `limits.maxDepth`
     */
    fromJS(input: unknown, limits: ValueLimits = DEFAULT_VALUE_LIMITS): Value {
        return fromJSAt(input, 1, limits);
    },
};

function isVec3Literal(input: object): input is { $vec3: Vec3 } {
    if (!('$vec3' in input) || Object.keys(input).length !== 1) return false;
    const raw: unknown = input.$vec3;
    return Array.isArray(raw) && raw.length === 3 && raw.every((n) => typeof n === 'number');
}

function fromJSAt(input: unknown, depth: number, limits: ValueLimits): Value {
    if (depth > limits.maxDepth) {
        throw new ValidationError('PayloadTooLarge', `Value nesting exceeds max depth of ${limits.maxDepth}`);
    }
    if (input === null || input === undefined) return NULL_VALUE;
    if (typeof input === 'boolean') return Values.bool(input);
    if (typeof input === 'bigint') return Values.int(input);
    if (typeof input === 'number') {
        return Number.isSafeInteger(input) ? Values.int(input) : Values.float(input);
    }
    if (typeof input === 'string') return Values.string(input);
    if (Array.isArray(input)) {
        return { type: 'array', items: input.map((item) => fromJSAt(item, depth + 1, limits)) };
    }
    if (isValue(input)) return input;
    if (typeof input === 'object') {
        if (isVec3Literal(input)) {
            const [x, y, z] = input.$vec3;
            return Values.vec3(x, y, z);
        }
        const fields = new Map<string, Value>();
        for (const [key, item] of Object.entries(input)) {
            fields.set(key, fromJSAt(item, depth + 1, limits));
        }
        return { type: 'object', fields };
    }
    throw new ValidationError('TypeMismatch', `Cannot convert ${typeof input} to a Value`);
}

const VALUE_TYPES: ReadonlySet<string> = new Set<ValueType>([
    'null', 'bool', 'int', 'float', 'string', 'vec3', 'array', 'object',
]);

/**
 * Shallow structural check: tag plus the payload slot of that tag.
 */
export function isValue(input: unknown): input is Value {
    if (typeof input !== 'object' || input === null || !('type' in input)) return false;
    const tag = input.type;
    if (typeof tag !== 'string' || !VALUE_TYPES.has(tag)) return false;
    switch (tag) {
        case 'null': return true;
        case 'array': return 'items' in input && Array.isArray(input.items);
        case 'object': return 'fields' in input && input.fields instanceof Map;
        default: return 'value' in input;
    }
}

/**
 * Converts a Value back to plain JavaScript data. Ints inside the safe
 * integer range become numbers, wider ones stay bigints.
 */
export function toJS(value: Value): unknown {
    switch (value.type) {
        case 'null': return null;
        case 'bool':
        case 'float':
        case 'string':
            return value.value;
        case 'int': {
            const n = Number(value.value);
            return Number.isSafeInteger(n) ? n : value.value;
        }
        case 'vec3': return { $vec3: [...value.value] };
        case 'array': return value.items.map(toJS);
        case 'object': {
            const result: Record<string, unknown> = {};
            for (const [key, item] of value.fields) {
                result[key] = toJS(item);
            }
            return result;
        }
    }
}

export function valueTypeName(value: Value): string {
    switch (value.type) {
        case 'null': return 'Null';
        case 'bool': return 'Bool';
        case 'int': return 'Int';
        case 'float': return 'Float';
        case 'string': return 'String';
        case 'vec3': return 'Vec3';
        case 'array': return 'Array';
        case 'object': return 'Object';
    }
}

/**
 * Checks depth and collection sizes with an explicit stack, so an
 * adversarial payload cannot exhaust the call stack.
 *
 * @returns a PayloadTooLarge error, or null when the value is within limits
 */
export function validateValue(value: Value, limits: ValueLimits = DEFAULT_VALUE_LIMITS): ValidationError | null {
    const stack: Array<[Value, number]> = [[value, 1]];
    while (stack.length > 0) {
        const next = stack.pop();
        if (!next) break;
        const [current, depth] = next;
        if (depth > limits.maxDepth) {
            return new ValidationError('PayloadTooLarge', `Value nesting exceeds max depth of ${limits.maxDepth}`);
        }
        if (current.type === 'array') {
            if (current.items.length > limits.maxCollectionSize) {
                return new ValidationError('PayloadTooLarge', `Array of ${current.items.length} items exceeds max collection size of ${limits.maxCollectionSize}`);
            }
            for (const item of current.items) stack.push([item, depth + 1]);
        } else if (current.type === 'object') {
            if (current.fields.size > limits.maxCollectionSize) {
                return new ValidationError('PayloadTooLarge', `Object of ${current.fields.size} fields exceeds max collection size of ${limits.maxCollectionSize}`);
            }
            for (const item of current.fields.values()) stack.push([item, depth + 1]);
        }
    }
    return null;
}

/**
 * Structural equality. Ints and floats never compare equal to each other.
 */
export function valueEquals(a: Value, b: Value): boolean {
    const stack: Array<[Value, Value]> = [[a, b]];
    while (stack.length > 0) {
        const pair = stack.pop();
        if (!pair) break;
        const [left, right] = pair;
        if (left === right) continue;

        switch (left.type) {
            case 'null':
                if (right.type !== 'null') return false;
                break;
            case 'bool':
                if (right.type !== 'bool' || right.value !== left.value) return false;
                break;
            case 'int':
                if (right.type !== 'int' || right.value !== left.value) return false;
                break;
            case 'string':
                if (right.type !== 'string' || right.value !== left.value) return false;
                break;
            case 'float':
                if (right.type !== 'float' || !Object.is(right.value, left.value)) return false;
                break;
            case 'vec3':
                if (right.type !== 'vec3') return false;
                if (left.value.some((component, i) => !Object.is(component, right.value[i]))) return false;
                break;
            case 'array':
                if (right.type !== 'array' || right.items.length !== left.items.length) return false;
                left.items.forEach((item, i) => stack.push([item, right.items[i]]));
                break;
            case 'object':
                if (right.type !== 'object' || right.fields.size !== left.fields.size) return false;
                for (const [key, item] of left.fields) {
                    const other = right.fields.get(key);
                    if (other === undefined) return false;
                    stack.push([item, other]);
                }
                break;
        }
    }
    return true;
}

/**
 * Deep copy. The result shares no arrays or maps with the input.
 */
export function cloneValue(value: Value): Value {
    switch (value.type) {
        case 'null': return NULL_VALUE;
        case 'vec3': return { type: 'vec3', value: [value.value[0], value.value[1], value.value[2]] };
        case 'array': return { type: 'array', items: value.items.map(cloneValue) };
        case 'object': {
            const fields = new Map<string, Value>();
            for (const [key, item] of value.fields) {
                fields.set(key, cloneValue(item));
            }
            return { type: 'object', fields };
        }
        default: return { ...value };
    }
}

/**
 * Returns `base` with `fields` written over it. Both must be objects.
 */
export function mergeFields(base: ObjectValue, fields: ReadonlyMap<string, Value>): ObjectValue {
    const merged = new Map(base.fields);
    for (const [key, item] of fields) {
        merged.set(key, item);
    }
    return { type: 'object', fields: merged };
}
