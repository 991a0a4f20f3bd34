/**
 * @file codec.ts
 * @brief Binary wire format for Values and Patches.
 *
 * MessagePack with four extension types so the Value union survives the
 * trip intact: 64-bit ints and floats stay distinct (`Int(1)` is not
 * `Float(1.0)`), vec3s keep their arity, and objects keep string keys
 * without going through JavaScript object semantics.
 *
 * @example
 * ```typescript
 * import { encodePatch, decodePatch } from 'patchbus';
 *
 * const bytes = encodePatch(patch);
 * const copy = decodePatch(bytes);
 * ```
 */
import { encode, decode, ExtensionCodec } from '@msgpack/msgpack';
import { z } from 'zod';
import { MessageError, PatchBusError, ValidationError } from './errors';
import { createPatch, MAX_PRIORITY, MIN_PRIORITY } from './core/Patches';
import { DEFAULT_VALUE_LIMITS, type Value, type ValueLimits, type Vec3 } from './value';
import type { Patch, PatchKind } from './types';

const EXT_INT = 1;
const EXT_FLOAT = 2;
const EXT_VEC3 = 3;
const EXT_OBJECT = 4;

const WIRE_VERSION = 1;

class IntBox {
    constructor(public readonly value: bigint) { }
}

class FloatBox {
    constructor(public readonly value: number) { }
}

class Vec3Box {
    constructor(public readonly value: Vec3) { }
}

/** Flattened key/value pairs: `[k0, v0, k1, v1, ...]`. */
class ObjectBox {
    constructor(public readonly entries: readonly unknown[]) { }
}

interface CodecContext {
    depth: number;
    maxDepth: number;
}

const extensionCodec = new ExtensionCodec<CodecContext>();

extensionCodec.register({
    type: EXT_INT,
    encode: (input: unknown): Uint8Array | null => {
        if (!(input instanceof IntBox)) return null;
        const bytes = new Uint8Array(8);
        new DataView(bytes.buffer).setBigInt64(0, input.value);
        return bytes;
    },
    decode: (data: Uint8Array): IntBox => {
        if (data.byteLength !== 8) throw new MessageError(`Int extension must be 8 bytes, got ${data.byteLength}`);
        return new IntBox(new DataView(data.buffer, data.byteOffset, data.byteLength).getBigInt64(0));
    },
});

extensionCodec.register({
    type: EXT_FLOAT,
    encode: (input: unknown): Uint8Array | null => {
        if (!(input instanceof FloatBox)) return null;
        const bytes = new Uint8Array(8);
        new DataView(bytes.buffer).setFloat64(0, input.value);
        return bytes;
    },
    decode: (data: Uint8Array): FloatBox => {
        if (data.byteLength !== 8) throw new MessageError(`Float extension must be 8 bytes, got ${data.byteLength}`);
        return new FloatBox(new DataView(data.buffer, data.byteOffset, data.byteLength).getFloat64(0));
    },
});

extensionCodec.register({
    type: EXT_VEC3,
    encode: (input: unknown): Uint8Array | null => {
        if (!(input instanceof Vec3Box)) return null;
        const bytes = new Uint8Array(24);
        const view = new DataView(bytes.buffer);
        input.value.forEach((component, i) => view.setFloat64(i * 8, component));
        return bytes;
    },
    decode: (data: Uint8Array): Vec3Box => {
        if (data.byteLength !== 24) throw new MessageError(`Vec3 extension must be 24 bytes, got ${data.byteLength}`);
        const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
        return new Vec3Box([view.getFloat64(0), view.getFloat64(8), view.getFloat64(16)]);
    },
});

extensionCodec.register({
    type: EXT_OBJECT,
    encode: (input: unknown, context: CodecContext): Uint8Array | null => {
        if (!(input instanceof ObjectBox)) return null;
        return encode<CodecContext>(input.entries, { extensionCodec, context });
    },
    decode: (data: Uint8Array, _extType: number, context: CodecContext): ObjectBox => {
        const depth = context.depth + 1;
        if (depth > context.maxDepth) {
            throw new ValidationError('PayloadTooLarge', `Value nesting exceeds max depth of ${context.maxDepth}`);
        }
        const entries = decode<CodecContext>(data, { extensionCodec, context: { depth, maxDepth: context.maxDepth } });
        if (!Array.isArray(entries) || entries.length % 2 !== 0) {
            throw new MessageError('Object extension must hold key/value pairs');
        }
        return new ObjectBox(entries);
    },
});

// ============================================================================
// Value <-> wire tree
// ============================================================================

function valueToWire(value: Value): unknown {
    switch (value.type) {
        case 'null': return null;
        case 'bool':
        case 'string':
            return value.value;
        case 'int': return new IntBox(value.value);
        case 'float': return new FloatBox(value.value);
        case 'vec3': return new Vec3Box(value.value);
        case 'array': return value.items.map(valueToWire);
        case 'object': return mapToWire(value.fields);
    }
}

function mapToWire(fields: ReadonlyMap<string, Value>): ObjectBox {
    const entries: unknown[] = [];
    for (const [key, item] of fields) {
        entries.push(key, valueToWire(item));
    }
    return new ObjectBox(entries);
}

function valueFromWire(input: unknown, depth: number, limits: ValueLimits): Value {
    if (depth > limits.maxDepth) {
        throw new ValidationError('PayloadTooLarge', `Value nesting exceeds max depth of ${limits.maxDepth}`);
    }
    if (input === null) return { type: 'null' };
    if (typeof input === 'boolean') return { type: 'bool', value: input };
    if (typeof input === 'string') return { type: 'string', value: input };
    if (typeof input === 'bigint') return { type: 'int', value: input };
    // Plain numbers only come from foreign encoders.
    if (typeof input === 'number') {
        return Number.isInteger(input) ? { type: 'int', value: BigInt(input) } : { type: 'float', value: input };
    }
    if (input instanceof IntBox) return { type: 'int', value: input.value };
    if (input instanceof FloatBox) return { type: 'float', value: input.value };
    if (input instanceof Vec3Box) return { type: 'vec3', value: input.value };
    if (Array.isArray(input)) {
        if (input.length > limits.maxCollectionSize) {
            throw new ValidationError('PayloadTooLarge', `Array of ${input.length} items exceeds max collection size of ${limits.maxCollectionSize}`);
        }
        return { type: 'array', items: input.map((item: unknown) => valueFromWire(item, depth + 1, limits)) };
    }
    if (input instanceof ObjectBox) {
        return { type: 'object', fields: mapFromWire(input, depth, limits) };
    }
    throw new MessageError(`Unexpected ${typeof input} in encoded value`);
}

function mapFromWire(box: ObjectBox, depth: number, limits: ValueLimits): Map<string, Value> {
    const size = box.entries.length / 2;
    if (size > limits.maxCollectionSize) {
        throw new ValidationError('PayloadTooLarge', `Object of ${size} fields exceeds max collection size of ${limits.maxCollectionSize}`);
    }
    const fields = new Map<string, Value>();
    for (let i = 0; i < box.entries.length; i += 2) {
        const key = box.entries[i];
        if (typeof key !== 'string') throw new MessageError('Object keys must be strings');
        if (fields.has(key)) throw new MessageError(`Duplicate object key "${key}"`);
        fields.set(key, valueFromWire(box.entries[i + 1], depth + 1, limits));
    }
    return fields;
}

function wireDecode(bytes: Uint8Array, limits: ValueLimits): unknown {
    try {
        return decode<CodecContext>(bytes, { extensionCodec, context: { depth: 0, maxDepth: limits.maxDepth } });
    } catch (error) {
        if (error instanceof PatchBusError) throw error;
        throw new MessageError(`Failed to decode MessagePack: ${error instanceof Error ? error.message : String(error)}`);
    }
}

function wireEncode(tree: unknown): Uint8Array {
    return encode<CodecContext>(tree, {
        extensionCodec,
        context: { depth: 0, maxDepth: DEFAULT_VALUE_LIMITS.maxDepth },
        ignoreUndefined: true,
    });
}

export function encodeValue(value: Value): Uint8Array {
    return wireEncode(valueToWire(value));
}

/**
 * @throws {MessageError} If the bytes are not an encoded Value
 * @throws {ValidationError} PayloadTooLarge if the Value exceeds `limits`
 */
export function decodeValue(bytes: Uint8Array, limits: ValueLimits = DEFAULT_VALUE_LIMITS): Value {
    return valueFromWire(wireDecode(bytes, limits), 1, limits);
}

/**
 * Encoded size of every Value a patch carries. This is what the
 * `maxPayloadBytes` quota counts.
 */
export function payloadSize(values: readonly Value[]): number {
    let total = 0;
    for (const value of values) {
        total += encodeValue(value).byteLength;
    }
    return total;
}

// ============================================================================
// Patch envelope
// ============================================================================

const EntityRefSchema = z.object({
    namespace: z.number().int().nonnegative(),
    localId: z.number().int().nonnegative(),
});

const objectBox = z.instanceof(ObjectBox);

const EntityOpSchema = z.discriminatedUnion('op', [
    z.object({ op: z.literal('create'), archetype: z.string().optional(), components: objectBox }),
    z.object({ op: z.literal('destroy') }),
    z.object({ op: z.literal('enable') }),
    z.object({ op: z.literal('disable') }),
    z.object({ op: z.literal('setParent'), parent: EntityRefSchema.nullable() }),
    z.object({ op: z.literal('addTag'), tag: z.string() }),
    z.object({ op: z.literal('removeTag'), tag: z.string() }),
]);

const ComponentOpSchema = z.discriminatedUnion('op', [
    z.object({ op: z.literal('set'), data: z.unknown() }),
    z.object({ op: z.literal('update'), fields: objectBox }),
    z.object({ op: z.literal('remove') }),
]);

const LayerOpSchema = z.discriminatedUnion('op', [
    z.object({ op: z.literal('create'), layerType: z.string(), priority: z.number().int() }),
    z.object({
        op: z.literal('update'),
        priority: z.number().int().optional(),
        visible: z.boolean().optional(),
        blendMode: z.string().optional(),
    }),
    z.object({ op: z.literal('destroy') }),
]);

const AssetOpSchema = z.discriminatedUnion('op', [
    z.object({ op: z.literal('load'), path: z.string(), assetType: z.string().optional() }),
    z.object({ op: z.literal('unload') }),
    z.object({ op: z.literal('update'), data: z.unknown() }),
]);

const HierarchyOpSchema = z.discriminatedUnion('op', [
    z.object({ op: z.literal('setParent'), parent: EntityRefSchema }),
    z.object({ op: z.literal('removeParent') }),
    z.object({ op: z.literal('setSiblingIndex'), index: z.number().int().nonnegative() }),
    z.object({ op: z.literal('setVisible'), visible: z.boolean() }),
]);

const CameraOpSchema = z.discriminatedUnion('op', [
    z.object({ op: z.literal('setMain') }),
    z.object({ op: z.literal('clearMain') }),
    z.object({ op: z.literal('setActive'), active: z.boolean() }),
    z.object({ op: z.literal('setClipPlanes'), near: z.number(), far: z.number() }),
    z.object({ op: z.literal('setClearColor'), color: z.tuple([z.number(), z.number(), z.number(), z.number()]) }),
    z.object({ op: z.literal('setPriority'), priority: z.number().int() }),
]);

const KindSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('entity'), entity: EntityRefSchema, op: EntityOpSchema }),
    z.object({ type: z.literal('component'), entity: EntityRefSchema, component: z.string().min(1), op: ComponentOpSchema }),
    z.object({ type: z.literal('layer'), layerId: z.string().min(1), op: LayerOpSchema }),
    z.object({ type: z.literal('asset'), assetId: z.string().min(1), op: AssetOpSchema }),
    z.object({ type: z.literal('hierarchy'), entity: EntityRefSchema, op: HierarchyOpSchema }),
    z.object({ type: z.literal('camera'), entity: EntityRefSchema, op: CameraOpSchema }),
]);

const EnvelopeSchema = z.object({
    v: z.literal(WIRE_VERSION),
    source: z.number().int().nonnegative(),
    priority: z.number().int().min(MIN_PRIORITY).max(MAX_PRIORITY),
    timestamp: z.number().nonnegative(),
    kind: KindSchema,
});

type WireKind = z.output<typeof KindSchema>;

function kindToWire(kind: PatchKind): unknown {
    switch (kind.type) {
        case 'entity':
            if (kind.op.op === 'create') {
                return { ...kind, op: { ...kind.op, components: mapToWire(kind.op.components) } };
            }
            return kind;
        case 'component':
            if (kind.op.op === 'set') return { ...kind, op: { op: 'set', data: valueToWire(kind.op.data) } };
            if (kind.op.op === 'update') return { ...kind, op: { op: 'update', fields: mapToWire(kind.op.fields) } };
            return kind;
        case 'asset':
            if (kind.op.op === 'update') return { ...kind, op: { op: 'update', data: valueToWire(kind.op.data) } };
            return kind;
        default:
            return kind;
    }
}

function kindFromWire(kind: WireKind, limits: ValueLimits): PatchKind {
    switch (kind.type) {
        case 'entity': {
            const op = kind.op;
            if (op.op === 'create') {
                const components = mapFromWire(op.components, 1, limits);
                return {
                    type: 'entity',
                    entity: kind.entity,
                    op: op.archetype === undefined
                        ? { op: 'create', components }
                        : { op: 'create', archetype: op.archetype, components },
                };
            }
            return { type: 'entity', entity: kind.entity, op };
        }
        case 'component': {
            const op = kind.op;
            if (op.op === 'set') {
                return { ...kind, op: { op: 'set', data: valueFromWire(op.data, 1, limits) } };
            }
            if (op.op === 'update') {
                return { ...kind, op: { op: 'update', fields: mapFromWire(op.fields, 1, limits) } };
            }
            return { ...kind, op };
        }
        case 'asset': {
            const op = kind.op;
            if (op.op === 'update') {
                return { ...kind, op: { op: 'update', data: valueFromWire(op.data, 1, limits) } };
            }
            return { ...kind, op };
        }
        case 'layer':
        case 'hierarchy':
        case 'camera':
            return kind;
    }
}

export function encodePatch(patch: Patch): Uint8Array {
    return wireEncode({
        v: WIRE_VERSION,
        source: patch.source,
        priority: patch.priority,
        timestamp: patch.timestamp,
        kind: kindToWire(patch.kind),
    });
}

/**
 * Decodes and validates a wire patch.
 *
 * @throws {MessageError} If the bytes are malformed or the envelope is invalid
 * @throws {ValidationError} PayloadTooLarge if a payload exceeds `limits`
 */
export function decodePatch(bytes: Uint8Array, limits: ValueLimits = DEFAULT_VALUE_LIMITS): Patch {
    const result = EnvelopeSchema.safeParse(wireDecode(bytes, limits));
    if (!result.success) {
        const errorMessages = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join(', ');
        throw new MessageError(`Invalid patch envelope: ${errorMessages}`);
    }
    const envelope = result.data;
    return createPatch(envelope.source, kindFromWire(envelope.kind, limits), {
        priority: envelope.priority,
        timestamp: envelope.timestamp,
    });
}
