import { ApplyError } from '../errors';
import { entityKey } from '../core/Patches';
import type {
    AppliedTransaction,
    ApplyReport,
    AssetSnapshot,
    BackingStore,
    CameraState,
    ComponentSnapshot,
    EntityRef,
    EntitySnapshot,
    LayerSnapshot,
    NamespaceId,
    Patch,
    WorldState,
} from '../types';
import { logger } from '../utils/Logger';
import { cloneValue, mergeFields, type Value } from '../value';

interface EntityRecord {
    ref: EntityRef;
    archetype?: string;
    enabled: boolean;
    visible: boolean;
    parent: EntityRef | null;
    siblingIndex?: number;
    tags: Set<string>;
    components: Map<string, Value>;
    camera?: CameraState;
}

interface LayerRecord {
    id: string;
    layerType: string;
    priority: number;
    visible: boolean;
    blendMode?: string;
}

interface AssetRecord {
    id: string;
    path: string;
    assetType?: string;
    data?: Value;
}

/**
 * Working copy for one transaction. Maps are copied up front, records on
 * first write, so an aborted apply leaves the committed state untouched.
 */
class Draft {
    readonly entities: Map<string, EntityRecord>;
    readonly layers: Map<string, LayerRecord>;
    readonly assets: Map<string, AssetRecord>;
    private copied = new Set<string>();

    constructor(entities: Map<string, EntityRecord>, layers: Map<string, LayerRecord>, assets: Map<string, AssetRecord>) {
        this.entities = new Map(entities);
        this.layers = new Map(layers);
        this.assets = new Map(assets);
    }

    entity(ref: EntityRef): EntityRecord {
        const key = entityKey(ref);
        const record = this.entities.get(key);
        if (!record) throw new ApplyError(`Entity ${key} does not exist`);
        if (this.copied.has(key)) return record;
        const copy: EntityRecord = {
            ...record,
            tags: new Set(record.tags),
            components: new Map(record.components),
            camera: record.camera ? { ...record.camera } : undefined,
        };
        this.entities.set(key, copy);
        this.copied.add(key);
        return copy;
    }

    add(record: EntityRecord): void {
        const key = entityKey(record.ref);
        this.entities.set(key, record);
        this.copied.add(key);
    }

    layer(id: string): LayerRecord {
        const record = this.layers.get(id);
        if (!record) throw new ApplyError(`Layer "${id}" does not exist`);
        const copy = { ...record };
        this.layers.set(id, copy);
        return copy;
    }

    asset(id: string): AssetRecord {
        const record = this.assets.get(id);
        if (!record) throw new ApplyError(`Asset "${id}" is not loaded`);
        const copy = { ...record };
        this.assets.set(id, copy);
        return copy;
    }
}

function defaultCamera(): CameraState {
    return { main: false, active: true, priority: 0 };
}

/**
 * Reference backing store held in memory.
 *
 * Applies are atomic (copy-on-write) and strict: an operation on a missing
 * entity, layer or asset, a duplicate create, or a parent cycle refuses the
 * whole transaction with an `ApplyError`. Layer creates and asset loads
 * replace what is there.
 */
export class InMemoryStore implements BackingStore {
    private entities = new Map<string, EntityRecord>();
    private layers = new Map<string, LayerRecord>();
    private assets = new Map<string, AssetRecord>();
    private version = 0;
    private readonly log = logger.child('InMemoryStore');

    public get currentVersion(): number {
        return this.version;
    }

    public get entityCount(): number {
        return this.entities.size;
    }

    public apply(transaction: AppliedTransaction): ApplyReport {
        const draft = new Draft(this.entities, this.layers, this.assets);
        for (const patch of transaction.patches) {
            this.applyPatch(draft, patch);
        }
        this.entities = draft.entities;
        this.layers = draft.layers;
        this.assets = draft.assets;
        this.version++;
        this.log.debug(`Applied transaction ${transaction.id} (${transaction.patches.length} patches), version ${this.version}`);
        return { applied: transaction.patches.length, version: this.version };
    }

    private applyPatch(draft: Draft, patch: Patch): void {
        const kind = patch.kind;
        switch (kind.type) {
            case 'entity': {
                const op = kind.op;
                if (op.op === 'create') {
                    const key = entityKey(kind.entity);
                    if (draft.entities.has(key)) throw new ApplyError(`Entity ${key} already exists`);
                    const components = new Map<string, Value>();
                    for (const [name, data] of op.components) components.set(name, cloneValue(data));
                    draft.add({
                        ref: { namespace: kind.entity.namespace, localId: kind.entity.localId },
                        archetype: op.archetype,
                        enabled: true,
                        visible: true,
                        parent: null,
                        tags: new Set(),
                        components,
                    });
                    return;
                }
                if (op.op === 'destroy') {
                    draft.entity(kind.entity);
                    this.removeEntities(draft, (ref) => ref.namespace === kind.entity.namespace && ref.localId === kind.entity.localId);
                    return;
                }
                const record = draft.entity(kind.entity);
                switch (op.op) {
                    case 'enable': record.enabled = true; return;
                    case 'disable': record.enabled = false; return;
                    case 'addTag': record.tags.add(op.tag); return;
                    case 'removeTag': record.tags.delete(op.tag); return;
                    case 'setParent': this.setParent(draft, record, op.parent); return;
                }
                return;
            }
            case 'component': {
                const record = draft.entity(kind.entity);
                const op = kind.op;
                if (op.op === 'set') {
                    record.components.set(kind.component, cloneValue(op.data));
                } else if (op.op === 'update') {
                    const current = record.components.get(kind.component);
                    if (!current || current.type !== 'object') {
                        throw new ApplyError(`Cannot update component "${kind.component}" on ${entityKey(kind.entity)}: no object value present`);
                    }
                    const fields = new Map<string, Value>();
                    for (const [name, data] of op.fields) fields.set(name, cloneValue(data));
                    record.components.set(kind.component, mergeFields(current, fields));
                } else {
                    record.components.delete(kind.component);
                }
                return;
            }
            case 'layer': {
                const op = kind.op;
                if (op.op === 'create') {
                    draft.layers.set(kind.layerId, { id: kind.layerId, layerType: op.layerType, priority: op.priority, visible: true });
                } else if (op.op === 'update') {
                    const layer = draft.layer(kind.layerId);
                    if (op.priority !== undefined) layer.priority = op.priority;
                    if (op.visible !== undefined) layer.visible = op.visible;
                    if (op.blendMode !== undefined) layer.blendMode = op.blendMode;
                } else {
                    draft.layer(kind.layerId);
                    draft.layers.delete(kind.layerId);
                }
                return;
            }
            case 'asset': {
                const op = kind.op;
                if (op.op === 'load') {
                    draft.assets.set(kind.assetId, { id: kind.assetId, path: op.path, assetType: op.assetType });
                } else if (op.op === 'update') {
                    draft.asset(kind.assetId).data = cloneValue(op.data);
                } else {
                    draft.asset(kind.assetId);
                    draft.assets.delete(kind.assetId);
                }
                return;
            }
            case 'hierarchy': {
                const record = draft.entity(kind.entity);
                const op = kind.op;
                switch (op.op) {
                    case 'setParent': this.setParent(draft, record, op.parent); return;
                    case 'removeParent': record.parent = null; return;
                    case 'setSiblingIndex': record.siblingIndex = op.index; return;
                    case 'setVisible': record.visible = op.visible; return;
                }
                return;
            }
            case 'camera': {
                const record = draft.entity(kind.entity);
                const camera = record.camera ?? defaultCamera();
                record.camera = camera;
                const op = kind.op;
                switch (op.op) {
                    case 'setMain':
                        for (const other of Array.from(draft.entities.values())) {
                            if (other !== record && other.camera?.main) draft.entity(other.ref).camera = { ...other.camera, main: false };
                        }
                        camera.main = true;
                        return;
                    case 'clearMain': camera.main = false; return;
                    case 'setActive': camera.active = op.active; return;
                    case 'setClipPlanes':
                        if (op.near >= op.far) throw new ApplyError(`Camera near plane ${op.near} must be below far plane ${op.far}`);
                        camera.near = op.near;
                        camera.far = op.far;
                        return;
                    case 'setClearColor': camera.clearColor = [...op.color]; return;
                    case 'setPriority': camera.priority = op.priority; return;
                }
            }
        }
    }

    private setParent(draft: Draft, record: EntityRecord, parent: EntityRef | null): void {
        if (!parent) {
            record.parent = null;
            return;
        }
        // Walk up from the new parent; reaching the child means a cycle.
        let cursor: EntityRef | null = parent;
        while (cursor) {
            const key = entityKey(cursor);
            if (key === entityKey(record.ref)) {
                throw new ApplyError(`Parenting ${entityKey(record.ref)} under ${entityKey(parent)} would create a cycle`);
            }
            const ancestor = draft.entities.get(key);
            if (!ancestor) throw new ApplyError(`Entity ${key} does not exist`);
            cursor = ancestor.parent;
        }
        record.parent = { namespace: parent.namespace, localId: parent.localId };
    }

    /**
     * Deletes matching entities and detaches their surviving children.
     */
    private removeEntities(draft: Draft, match: (ref: EntityRef) => boolean): number {
        const removed = new Set<string>();
        for (const [key, record] of Array.from(draft.entities)) {
            if (match(record.ref)) {
                draft.entities.delete(key);
                removed.add(key);
            }
        }
        if (removed.size === 0) return 0;
        for (const record of Array.from(draft.entities.values())) {
            if (record.parent && removed.has(entityKey(record.parent))) {
                draft.entity(record.ref).parent = null;
            }
        }
        return removed.size;
    }

    /**
     * Cascading destroy of every entity the namespace owns.
     */
    public releaseNamespace(namespace: NamespaceId): void {
        const draft = new Draft(this.entities, this.layers, this.assets);
        const count = this.removeEntities(draft, (ref) => ref.namespace === namespace);
        this.entities = draft.entities;
        this.version++;
        this.log.debug(`Released namespace ${namespace}: ${count} entities destroyed`);
    }

    public read(): WorldState {
        const records = Array.from(this.entities.values()).sort((a, b) =>
            a.ref.namespace - b.ref.namespace || a.ref.localId - b.ref.localId
        );
        const entities: EntitySnapshot[] = [];
        const components: ComponentSnapshot[] = [];
        for (const record of records) {
            entities.push(this.snapshotEntity(record));
            const names = Array.from(record.components.keys()).sort();
            for (const name of names) {
                const data = record.components.get(name);
                if (data) components.push({ entity: { ...record.ref }, component: name, data: cloneValue(data) });
            }
        }
        const layers: LayerSnapshot[] = Array.from(this.layers.values())
            .sort((a, b) => a.id.localeCompare(b.id))
            .map((layer) => ({ ...layer }));
        const assets: AssetSnapshot[] = Array.from(this.assets.values())
            .sort((a, b) => a.id.localeCompare(b.id))
            .map((asset) => (asset.data ? { ...asset, data: cloneValue(asset.data) } : { ...asset }));
        return { version: this.version, entities, components, layers, assets };
    }

    private snapshotEntity(record: EntityRecord): EntitySnapshot {
        return {
            ref: { ...record.ref },
            archetype: record.archetype,
            enabled: record.enabled,
            visible: record.visible,
            parent: record.parent ? { ...record.parent } : null,
            siblingIndex: record.siblingIndex,
            tags: Array.from(record.tags).sort(),
        };
    }

    public hasEntity(ref: EntityRef): boolean {
        return this.entities.has(entityKey(ref));
    }

    public getEntity(ref: EntityRef): EntitySnapshot | undefined {
        const record = this.entities.get(entityKey(ref));
        return record ? this.snapshotEntity(record) : undefined;
    }

    public getComponent(ref: EntityRef, component: string): Value | undefined {
        return this.entities.get(entityKey(ref))?.components.get(component);
    }

    public componentNames(ref: EntityRef): string[] {
        const record = this.entities.get(entityKey(ref));
        return record ? Array.from(record.components.keys()).sort() : [];
    }

    public getCamera(ref: EntityRef): Readonly<CameraState> | undefined {
        return this.entities.get(entityKey(ref))?.camera;
    }

    public getLayer(id: string): LayerSnapshot | undefined {
        const layer = this.layers.get(id);
        return layer ? { ...layer } : undefined;
    }

    public getAsset(id: string): AssetSnapshot | undefined {
        const asset = this.assets.get(id);
        return asset ? { ...asset } : undefined;
    }

    public clear(): void {
        this.entities.clear();
        this.layers.clear();
        this.assets.clear();
        this.version++;
    }
}
