import type {
    AssetId,
    AssetOp,
    CameraOp,
    ComponentOp,
    EntityOp,
    EntityRef,
    HierarchyOp,
    LayerId,
    LayerOp,
    NamespaceId,
    Patch,
    PatchKind,
    RGBA,
} from '../types';
import type { Value } from '../value';

export const MAX_PRIORITY = 2 ** 31 - 1;
export const MIN_PRIORITY = -(2 ** 31);

export function entityRef(namespace: NamespaceId, localId: number): EntityRef {
    return Object.freeze({ namespace, localId });
}

export function entityKey(ref: EntityRef): string {
    return `${ref.namespace}:${ref.localId}`;
}

export function sameEntity(a: EntityRef, b: EntityRef): boolean {
    return a.namespace === b.namespace && a.localId === b.localId;
}

export interface PatchOptions {
    priority?: number;
    timestamp?: number;
}

/**
 * Wraps a kind into an immutable patch.
 */
export function createPatch(source: NamespaceId, kind: PatchKind, options: PatchOptions = {}): Patch {
    const priority = options.priority ?? 0;
    if (!Number.isInteger(priority) || priority < MIN_PRIORITY || priority > MAX_PRIORITY) {
        throw new RangeError(`Patch priority ${priority} is not a 32-bit integer`);
    }
    return Object.freeze({
        source,
        kind,
        priority,
        timestamp: options.timestamp ?? Date.now(),
    });
}

function toMap(fields: Record<string, Value> | ReadonlyMap<string, Value>): ReadonlyMap<string, Value> {
    return fields instanceof Map ? new Map(fields) : new Map(Object.entries(fields));
}

/**
 * Builders for every patch kind.
 *
 * @example
 * ```typescript
 * const kind = Patches.setComponent(player, 'Health', Values.object({ hp: Values.int(100) }));
 * handle.submit(createPatch(handle.id, kind, { priority: 5 }));
 * ```
 */
export const Patches = {
    entity(entity: EntityRef, op: EntityOp): PatchKind {
        return { type: 'entity', entity, op };
    },
    createEntity(
        entity: EntityRef,
        components: Record<string, Value> | ReadonlyMap<string, Value> = {},
        archetype?: string
    ): PatchKind {
        const op: EntityOp = archetype === undefined
            ? { op: 'create', components: toMap(components) }
            : { op: 'create', archetype, components: toMap(components) };
        return { type: 'entity', entity, op };
    },
    destroyEntity(entity: EntityRef): PatchKind {
        return { type: 'entity', entity, op: { op: 'destroy' } };
    },
    enableEntity(entity: EntityRef): PatchKind {
        return { type: 'entity', entity, op: { op: 'enable' } };
    },
    disableEntity(entity: EntityRef): PatchKind {
        return { type: 'entity', entity, op: { op: 'disable' } };
    },
    setEntityParent(entity: EntityRef, parent: EntityRef | null): PatchKind {
        return { type: 'entity', entity, op: { op: 'setParent', parent } };
    },
    addTag(entity: EntityRef, tag: string): PatchKind {
        return { type: 'entity', entity, op: { op: 'addTag', tag } };
    },
    removeTag(entity: EntityRef, tag: string): PatchKind {
        return { type: 'entity', entity, op: { op: 'removeTag', tag } };
    },

    component(entity: EntityRef, component: string, op: ComponentOp): PatchKind {
        return { type: 'component', entity, component, op };
    },
    setComponent(entity: EntityRef, component: string, data: Value): PatchKind {
        return { type: 'component', entity, component, op: { op: 'set', data } };
    },
    updateComponent(
        entity: EntityRef,
        component: string,
        fields: Record<string, Value> | ReadonlyMap<string, Value>
    ): PatchKind {
        return { type: 'component', entity, component, op: { op: 'update', fields: toMap(fields) } };
    },
    removeComponent(entity: EntityRef, component: string): PatchKind {
        return { type: 'component', entity, component, op: { op: 'remove' } };
    },

    layer(layerId: LayerId, op: LayerOp): PatchKind {
        return { type: 'layer', layerId, op };
    },
    createLayer(layerId: LayerId, layerType: string, priority: number = 0): PatchKind {
        return { type: 'layer', layerId, op: { op: 'create', layerType, priority } };
    },
    destroyLayer(layerId: LayerId): PatchKind {
        return { type: 'layer', layerId, op: { op: 'destroy' } };
    },

    asset(assetId: AssetId, op: AssetOp): PatchKind {
        return { type: 'asset', assetId, op };
    },
    loadAsset(assetId: AssetId, path: string, assetType?: string): PatchKind {
        const op: AssetOp = assetType === undefined ? { op: 'load', path } : { op: 'load', path, assetType };
        return { type: 'asset', assetId, op };
    },
    unloadAsset(assetId: AssetId): PatchKind {
        return { type: 'asset', assetId, op: { op: 'unload' } };
    },
    updateAsset(assetId: AssetId, data: Value): PatchKind {
        return { type: 'asset', assetId, op: { op: 'update', data } };
    },

    hierarchy(entity: EntityRef, op: HierarchyOp): PatchKind {
        return { type: 'hierarchy', entity, op };
    },
    setParent(entity: EntityRef, parent: EntityRef): PatchKind {
        return { type: 'hierarchy', entity, op: { op: 'setParent', parent } };
    },
    removeParent(entity: EntityRef): PatchKind {
        return { type: 'hierarchy', entity, op: { op: 'removeParent' } };
    },
    setSiblingIndex(entity: EntityRef, index: number): PatchKind {
        return { type: 'hierarchy', entity, op: { op: 'setSiblingIndex', index } };
    },
    setVisible(entity: EntityRef, visible: boolean): PatchKind {
        return { type: 'hierarchy', entity, op: { op: 'setVisible', visible } };
    },

    camera(entity: EntityRef, op: CameraOp): PatchKind {
        return { type: 'camera', entity, op };
    },
    setMainCamera(entity: EntityRef): PatchKind {
        return { type: 'camera', entity, op: { op: 'setMain' } };
    },
    setClearColor(entity: EntityRef, color: RGBA): PatchKind {
        return { type: 'camera', entity, op: { op: 'setClearColor', color } };
    },
};

/**
 * The entity a patch is addressed to, if any.
 */
export function targetEntity(kind: PatchKind): EntityRef | null {
    switch (kind.type) {
        case 'entity':
        case 'component':
        case 'hierarchy':
        case 'camera':
            return kind.entity;
        case 'layer':
        case 'asset':
            return null;
    }
}

/**
 * Every entity a patch writes to or links against, parents included.
 */
export function touchedEntities(kind: PatchKind): EntityRef[] {
    const target = targetEntity(kind);
    if (!target) return [];
    const touched = [target];
    if (kind.type === 'entity' && kind.op.op === 'setParent' && kind.op.parent) {
        touched.push(kind.op.parent);
    }
    if (kind.type === 'hierarchy' && kind.op.op === 'setParent') {
        touched.push(kind.op.parent);
    }
    return touched;
}

/**
 * The Value payloads a patch carries.
 */
export function patchPayloads(kind: PatchKind): Value[] {
    switch (kind.type) {
        case 'entity':
            return kind.op.op === 'create' ? Array.from(kind.op.components.values()) : [];
        case 'component':
            if (kind.op.op === 'set') return [kind.op.data];
            if (kind.op.op === 'update') return Array.from(kind.op.fields.values());
            return [];
        case 'asset':
            return kind.op.op === 'update' ? [kind.op.data] : [];
        default:
            return [];
    }
}

/**
 * Keys of everything a patch reads or writes: each entity it touches, or
 * its layer or asset. Two patches sharing a key must apply in the order
 * they were submitted.
 */
export function resourceKeys(kind: PatchKind): string[] {
    switch (kind.type) {
        case 'layer':
            return [`layer:${kind.layerId}`];
        case 'asset':
            return [`asset:${kind.assetId}`];
        default:
            return touchedEntities(kind).map((ref) => `entity:${entityKey(ref)}`);
    }
}

export function isEntityCreate(kind: PatchKind): kind is Extract<PatchKind, { type: 'entity' }> & { op: Extract<EntityOp, { op: 'create' }> } {
    return kind.type === 'entity' && kind.op.op === 'create';
}

export function isEntityDestroy(kind: PatchKind): boolean {
    return kind.type === 'entity' && kind.op.op === 'destroy';
}

/**
 * Short human-readable description, used in logs and the CLI.
 */
export function describeKind(kind: PatchKind): string {
    switch (kind.type) {
        case 'component':
            return `component.${kind.op.op} ${kind.component} on ${entityKey(kind.entity)}`;
        case 'layer':
            return `layer.${kind.op.op} ${kind.layerId}`;
        case 'asset':
            return `asset.${kind.op.op} ${kind.assetId}`;
        default:
            return `${kind.type}.${kind.op.op} ${entityKey(kind.entity)}`;
    }
}
