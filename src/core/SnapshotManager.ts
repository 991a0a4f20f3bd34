import { SnapshotError } from '../errors';
import type {
    AssetSnapshot,
    ComponentSnapshot,
    EntityRef,
    EntitySnapshot,
    LayerSnapshot,
    PatchKind,
    StateSnapshot,
    TransactionResult,
    WorldState,
} from '../types';
import { Logger } from '../utils/Logger';
import { valueEquals } from '../value';
import { Limits, Permissions } from './Namespace';
import type { NamespaceHandle } from './NamespaceHandle';
import type { PatchBus } from './PatchBus';
import { entityKey, MAX_PRIORITY, Patches, sameEntity } from './Patches';

/** Restores outrank every organically produced patch. */
export const RESTORE_PRIORITY = MAX_PRIORITY;

export interface SnapshotManagerOptions {
    /** Snapshots kept for `get`/`latest`; defaults to the bus's `maxSnapshots`. */
    maxSnapshots?: number;
    /**
     * Name of the manager's namespace. Defaults to `snapshots`, or to the
     * bus's generated name when another namespace already has that one.
     */
    name?: string;
}

function sameParent(a: EntityRef | null, b: EntityRef | null): boolean {
    if (a === null || b === null) return a === b;
    return sameEntity(a, b);
}

function componentKey(snapshot: ComponentSnapshot): string {
    return `${entityKey(snapshot.entity)}/${snapshot.component}`;
}

/**
 * Patches that bring a fresh entity to `entity`'s recorded state, beyond
 * its Create.
 */
function entityStatePatches(entity: EntitySnapshot, from?: EntitySnapshot): PatchKind[] {
    const kinds: PatchKind[] = [];
    const ref = entity.ref;
    if (entity.enabled !== (from ? from.enabled : true)) {
        kinds.push(entity.enabled ? Patches.enableEntity(ref) : Patches.disableEntity(ref));
    }
    if (entity.visible !== (from ? from.visible : true)) {
        kinds.push(Patches.setVisible(ref, entity.visible));
    }
    if (!sameParent(entity.parent, from ? from.parent : null)) {
        kinds.push(entity.parent ? Patches.setParent(ref, entity.parent) : Patches.removeParent(ref));
    }
    if (entity.siblingIndex !== undefined && entity.siblingIndex !== from?.siblingIndex) {
        kinds.push(Patches.setSiblingIndex(ref, entity.siblingIndex));
    }
    const before = new Set(from ? from.tags : []);
    const after = new Set(entity.tags);
    for (const tag of entity.tags) {
        if (!before.has(tag)) kinds.push(Patches.addTag(ref, tag));
    }
    for (const tag of before) {
        if (!after.has(tag)) kinds.push(Patches.removeTag(ref, tag));
    }
    return kinds;
}

function layerPatches(layer: LayerSnapshot, from?: LayerSnapshot): PatchKind[] {
    if (!from || from.layerType !== layer.layerType) {
        const kinds = [Patches.createLayer(layer.id, layer.layerType, layer.priority)];
        if (!layer.visible || layer.blendMode !== undefined) {
            kinds.push(Patches.layer(layer.id, { op: 'update', visible: layer.visible, blendMode: layer.blendMode }));
        }
        return kinds;
    }
    const changed = from.priority !== layer.priority || from.visible !== layer.visible || from.blendMode !== layer.blendMode;
    if (!changed) return [];
    return [Patches.layer(layer.id, {
        op: 'update',
        priority: layer.priority,
        visible: layer.visible,
        blendMode: layer.blendMode,
    })];
}

function assetPatches(asset: AssetSnapshot, from?: AssetSnapshot): PatchKind[] {
    const kinds: PatchKind[] = [];
    const reload = !from || from.path !== asset.path || from.assetType !== asset.assetType;
    if (reload) kinds.push(Patches.loadAsset(asset.id, asset.path, asset.assetType));
    const dataChanged = asset.data !== undefined && (reload || !from.data || !valueEquals(from.data, asset.data));
    if (asset.data !== undefined && dataChanged) kinds.push(Patches.updateAsset(asset.id, asset.data));
    return kinds;
}

/**
 * The patch kinds that turn state `from` into state `to`.
 */
export function diffStates(from: WorldState, to: WorldState): PatchKind[] {
    const kinds: PatchKind[] = [];

    const fromEntities = new Map(from.entities.map((e) => [entityKey(e.ref), e]));
    const toEntities = new Map(to.entities.map((e) => [entityKey(e.ref), e]));
    // Every create goes ahead of the state patches, which may name a new
    // entity as parent.
    for (const [key, entity] of toEntities) {
        if (!fromEntities.has(key)) kinds.push(Patches.createEntity(entity.ref, {}, entity.archetype));
    }
    for (const [key, entity] of toEntities) {
        kinds.push(...entityStatePatches(entity, fromEntities.get(key)));
    }
    for (const [key, entity] of fromEntities) {
        if (!toEntities.has(key)) kinds.push(Patches.destroyEntity(entity.ref));
    }

    const fromComponents = new Map(from.components.map((c) => [componentKey(c), c]));
    const toComponents = new Map(to.components.map((c) => [componentKey(c), c]));
    for (const [key, component] of toComponents) {
        const before = fromComponents.get(key);
        if (!before || !valueEquals(before.data, component.data)) {
            kinds.push(Patches.setComponent(component.entity, component.component, component.data));
        }
    }
    for (const [key, component] of fromComponents) {
        // Components of destroyed entities go with them.
        if (!toComponents.has(key) && toEntities.has(entityKey(component.entity))) {
            kinds.push(Patches.removeComponent(component.entity, component.component));
        }
    }

    const fromLayers = new Map(from.layers.map((l) => [l.id, l]));
    const toLayers = new Map(to.layers.map((l) => [l.id, l]));
    for (const [id, layer] of toLayers) kinds.push(...layerPatches(layer, fromLayers.get(id)));
    for (const id of fromLayers.keys()) {
        if (!toLayers.has(id)) kinds.push(Patches.destroyLayer(id));
    }

    const fromAssets = new Map(from.assets.map((a) => [a.id, a]));
    const toAssets = new Map(to.assets.map((a) => [a.id, a]));
    for (const [id, asset] of toAssets) kinds.push(...assetPatches(asset, fromAssets.get(id)));
    for (const id of fromAssets.keys()) {
        if (!toAssets.has(id)) kinds.push(Patches.unloadAsset(id));
    }

    return kinds;
}

const EMPTY_STATE: WorldState = { version: 0, entities: [], components: [], layers: [], assets: [] };

/**
 * Captures and restores committed state.
 *
 * Capture takes the bus's exclusivity token, so it never sees a
 * half-applied transaction. Restore and rollback go through the normal
 * pipeline as patches from the manager's own namespace.
 */
export class SnapshotManager {
    private readonly handle: NamespaceHandle;
    private readonly maxSnapshots: number;
    private readonly logger: Logger;
    private snapshots: StateSnapshot[] = [];
    private nextId = 1;

    constructor(private readonly bus: PatchBus, options: SnapshotManagerOptions = {}) {
        this.maxSnapshots = options.maxSnapshots ?? bus.config.maxSnapshots;
        const name = options.name ?? (bus.findNamespace('snapshots') === undefined ? 'snapshots' : undefined);
        this.handle = bus.register(Permissions.full(), Limits.unlimited(), name);
        this.logger = new Logger('patchbus:SnapshotManager', bus.config.debug);
    }

    /**
     * Captures committed state and keeps it for later lookup.
     */
    public async capture(): Promise<StateSnapshot> {
        const state = await this.bus.readCommitted();
        const snapshot: StateSnapshot = {
            id: `snapshot-${this.nextId++}`,
            capturedAt: Date.now(),
            version: state.version,
            entities: state.entities,
            components: state.components,
            layers: state.layers,
            assets: state.assets,
        };
        this.snapshots.push(snapshot);
        if (this.snapshots.length > this.maxSnapshots) {
            this.snapshots.splice(0, this.snapshots.length - this.maxSnapshots);
        }
        this.logger.debug(`Captured ${snapshot.id}: ${snapshot.entities.length} entities at version ${snapshot.version}`);
        return snapshot;
    }

    /**
     * Replays a snapshot into the store as one transaction: a Create per
     * entity, a Set per component, then layers, assets and entity state.
     * Meant for an empty store; use `rollback` otherwise.
     */
    public restore(snapshot: StateSnapshot): Promise<TransactionResult | null> {
        this.logger.info(`Restoring ${snapshot.id}`);
        return this.bus.runCycleWith(() => this.submitAll(diffStates(EMPTY_STATE, snapshot)));
    }

    /**
     * Brings the store back to `snapshot` from whatever it holds when the
     * rollback's cycle starts.
     */
    public rollback(snapshot: StateSnapshot): Promise<TransactionResult | null> {
        return this.bus.runCycleWith((committed) => {
            const kinds = diffStates(committed, snapshot);
            this.logger.info(`Rolling back to ${snapshot.id}: ${kinds.length} patch(es)`);
            this.submitAll(kinds);
        });
    }

    /**
     * The patch kinds that turn snapshot `from` into snapshot `to`.
     */
    public diff(from: WorldState, to: WorldState): PatchKind[] {
        return diffStates(from, to);
    }

    private submitAll(kinds: readonly PatchKind[]): void {
        const timestamp = Date.now();
        for (const kind of kinds) {
            this.handle.submit(this.handle.patch(kind, { priority: RESTORE_PRIORITY, timestamp }));
        }
    }

    public get namespace(): number {
        return this.handle.id;
    }

    /**
     * @throws {SnapshotError} If no retained snapshot has this id
     */
    public get(id: string): StateSnapshot {
        const snapshot = this.snapshots.find((s) => s.id === id);
        if (!snapshot) throw new SnapshotError(`Unknown snapshot "${id}"`);
        return snapshot;
    }

    public latest(): StateSnapshot | undefined {
        return this.snapshots[this.snapshots.length - 1];
    }

    public list(): readonly StateSnapshot[] {
        return [...this.snapshots];
    }

    public remove(id: string): boolean {
        const before = this.snapshots.length;
        this.snapshots = this.snapshots.filter((s) => s.id !== id);
        return this.snapshots.length < before;
    }
}
