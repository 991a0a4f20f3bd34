import type {
    EntityRef,
    NamespaceId,
    NamespaceReport,
    Patch,
    PatchKind,
    QueuedPatch,
} from '../types';
import {
    resolveLimits,
    resolvePermissions,
    type NamespacePermissions,
    type ResourceLimits,
} from '../validation';
import { logger } from '../utils/Logger';
import { touchedEntities } from './Patches';

/**
 * Permission presets.
 */
export const Permissions = {
    /** Everything, including writes to other namespaces' entities. */
    full(): NamespacePermissions {
        return resolvePermissions({ crossNamespaceWrite: true });
    },
    /** The defaults: everything on its own entities. */
    standard(): NamespacePermissions {
        return resolvePermissions({});
    },
    readOnly(): NamespacePermissions {
        return resolvePermissions({
            crossNamespaceWrite: false,
            createEntities: false,
            destroyEntities: false,
            modifyComponents: false,
            modifyLayers: false,
            loadAssets: false,
            modifyHierarchy: false,
            controlCameras: false,
        });
    },
};

/**
 * Resource limit presets. Zero means unlimited.
 */
export const Limits = {
    unlimited(): ResourceLimits {
        return resolveLimits({});
    },
    /** Budget for untrusted plugins and scripts. */
    sandboxed(): ResourceLimits {
        return resolveLimits({
            maxPatchesPerCycle: 256,
            maxEntities: 1024,
            maxPayloadBytes: 64 * 1024,
        });
    },
};

export interface NamespaceUsage {
    /** Committed entities plus creates admitted and not yet resolved. */
    liveEntities: number;
    patchesThisCycle: number;
    payloadBytesThisCycle: number;
    pending: number;
}

function componentAllowed(permissions: NamespacePermissions, component: string): string | null {
    if (!permissions.modifyComponents) return 'may not modify components';
    if (permissions.blockedComponents.includes(component)) return `may not write blocked component "${component}"`;
    if (permissions.allowedComponents && !permissions.allowedComponents.includes(component)) {
        return `may not write component "${component}"`;
    }
    return null;
}

function opPermission(permissions: NamespacePermissions, kind: PatchKind): string | null {
    switch (kind.type) {
        case 'entity':
            switch (kind.op.op) {
                case 'create': {
                    if (!permissions.createEntities) return 'may not create entities';
                    for (const component of kind.op.components.keys()) {
                        const reason = componentAllowed(permissions, component);
                        if (reason) return reason;
                    }
                    return null;
                }
                case 'destroy':
                    return permissions.destroyEntities ? null : 'may not destroy entities';
                case 'setParent':
                    return permissions.modifyHierarchy ? null : 'may not modify the hierarchy';
                default:
                    return null;
            }
        case 'component':
            return componentAllowed(permissions, kind.component);
        case 'layer':
            return permissions.modifyLayers ? null : 'may not modify layers';
        case 'asset':
            return permissions.loadAssets ? null : 'may not load or modify assets';
        case 'hierarchy':
            return permissions.modifyHierarchy ? null : 'may not modify the hierarchy';
        case 'camera':
            return permissions.controlCameras ? null : 'may not control cameras';
    }
}

/**
 * Why `permissions` forbid `patch`, or null when it is allowed.
 */
export function permissionViolation(permissions: NamespacePermissions, patch: Patch): string | null {
    if (!permissions.crossNamespaceWrite) {
        const foreign = touchedEntities(patch.kind).find((ref) => ref.namespace !== patch.source);
        if (foreign) {
            return `may not write entity ${foreign.namespace}:${foreign.localId} owned by namespace ${foreign.namespace}`;
        }
    }
    return opPermission(permissions, patch.kind);
}

type ResultListener = (report: NamespaceReport) => void;

/**
 * Bus-side record of a registered namespace: identity, policy, usage
 * counters and the pending queue.
 */
export class Namespace {
    public permissions: NamespacePermissions;
    public readonly limits: ResourceLimits;
    public closed = false;

    private queue: QueuedPatch[] = [];
    private nextLocalId = 1;
    private committedEntities = 0;
    private patchesThisCycle = 0;
    private payloadBytesThisCycle = 0;
    /** Creates of own entities sitting in the queue. */
    private queuedCreates = 0;
    private listeners = new Set<ResultListener>();
    private _lastReport: NamespaceReport | null = null;

    constructor(
        public readonly id: NamespaceId,
        public readonly name: string,
        permissions: NamespacePermissions,
        limits: ResourceLimits
    ) {
        this.permissions = permissions;
        this.limits = limits;
    }

    public get pending(): number {
        return this.queue.length;
    }

    public get lastReport(): NamespaceReport | null {
        return this._lastReport;
    }

    public usage(): NamespaceUsage {
        return {
            liveEntities: this.committedEntities + this.queuedCreates,
            patchesThisCycle: this.patchesThisCycle,
            payloadBytesThisCycle: this.payloadBytesThisCycle,
            pending: this.queue.length,
        };
    }

    public allocateEntity(): EntityRef {
        return Object.freeze({ namespace: this.id, localId: this.nextLocalId++ });
    }

    /** Keeps `allocateEntity` clear of ids chosen by the caller. */
    public reserveLocalId(localId: number): void {
        if (localId >= this.nextLocalId) this.nextLocalId = localId + 1;
    }

    public enqueue(queued: QueuedPatch, payloadBytes: number): void {
        this.queue.push(queued);
        const kind = queued.patch.kind;
        if (kind.type === 'entity' && kind.op.op === 'create' && kind.entity.namespace === this.id) {
            this.queuedCreates++;
        }
        this.patchesThisCycle++;
        this.payloadBytesThisCycle += payloadBytes;
    }

    /**
     * Hands over the queue and resets per-cycle counters. With
     * `countCreates`, queued creates are counted as committed until the
     * cycle says otherwise; without it they stop counting at all.
     */
    public take(countCreates: boolean): QueuedPatch[] {
        if (countCreates) this.committedEntities += this.queuedCreates;
        this.queuedCreates = 0;
        const taken = this.queue;
        this.queue = [];
        this.patchesThisCycle = 0;
        this.payloadBytesThisCycle = 0;
        return taken;
    }

    public adjustEntities(delta: number): void {
        this.committedEntities = Math.max(0, this.committedEntities + delta);
    }

    public onResult(listener: ResultListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    public deliver(report: NamespaceReport): void {
        this._lastReport = report;
        for (const listener of Array.from(this.listeners)) {
            try {
                listener(report);
            } catch (err) {
                logger.error(`[Namespace ${this.id}] Error in result listener:`, err);
            }
        }
    }

    public clearListeners(): void {
        this.listeners.clear();
    }
}
