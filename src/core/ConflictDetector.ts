import type { Conflict, ConflictKind, PatchKind, QueuedPatch } from '../types';
import { entityKey } from './Patches';

export interface DetectionResult {
    readonly survivors: QueuedPatch[];
    readonly conflicts: Conflict[];
    /** Losing sequence number -> the conflict that dropped it. */
    readonly losers: ReadonlyMap<number, Conflict>;
}

export interface DetectOptions {
    /**
     * Re-checks a patch's permission at processing time. Returning false
     * drops the patch with a PermissionDenied conflict.
     */
    authorize?: (queued: QueuedPatch) => boolean;
}

function entityKeyFor(entity: string, op: Extract<PatchKind, { type: 'entity' }>['op']): string {
    switch (op.op) {
        case 'create':
        case 'destroy':
            return `entity:${entity}:lifecycle`;
        case 'enable':
        case 'disable':
            return `entity:${entity}:enabled`;
        case 'setParent':
            return `hierarchy:${entity}:parent`;
        case 'addTag':
        case 'removeTag':
            return `entity:${entity}:tag:${op.tag}`;
    }
}

function hierarchyKeyFor(entity: string, op: Extract<PatchKind, { type: 'hierarchy' }>['op']): string {
    switch (op.op) {
        case 'setParent':
        case 'removeParent':
            return `hierarchy:${entity}:parent`;
        case 'setSiblingIndex':
            return `hierarchy:${entity}:sibling`;
        case 'setVisible':
            return `hierarchy:${entity}:visible`;
    }
}

/**
 * The piece of state a patch writes. Two patches conflict when they share
 * a key and come from different namespaces.
 */
export function conflictKey(kind: PatchKind): string {
    switch (kind.type) {
        case 'component':
            return `component:${entityKey(kind.entity)}:${kind.component}`;
        case 'entity':
            return entityKeyFor(entityKey(kind.entity), kind.op);
        case 'hierarchy':
            return hierarchyKeyFor(entityKey(kind.entity), kind.op);
        case 'camera': {
            const op = kind.op.op === 'clearMain' ? 'setMain' : kind.op.op;
            return `camera:${entityKey(kind.entity)}:${op}`;
        }
        case 'layer':
            return `layer:${kind.layerId}`;
        case 'asset':
            return `asset:${kind.assetId}`;
    }
}

/**
 * Orders two patches by how strongly they claim a key: higher priority,
 * then earlier timestamp, then earlier submission.
 */
export function comparePrecedence(a: QueuedPatch, b: QueuedPatch): number {
    if (a.patch.priority !== b.patch.priority) return b.patch.priority - a.patch.priority;
    if (a.patch.timestamp !== b.patch.timestamp) return a.patch.timestamp - b.patch.timestamp;
    return a.sequence - b.sequence;
}

function lifecycleKind(group: readonly QueuedPatch[]): ConflictKind {
    const creators = new Set<number>();
    const destroyers = new Set<number>();
    for (const { patch } of group) {
        if (patch.kind.type !== 'entity') continue;
        if (patch.kind.op.op === 'create') creators.add(patch.source);
        if (patch.kind.op.op === 'destroy') destroyers.add(patch.source);
    }
    for (const creator of creators) {
        for (const destroyer of destroyers) {
            if (creator !== destroyer) return 'CreateDestroy';
        }
    }
    return 'WriteWrite';
}

/**
 * Finds writes from different namespaces to the same key and resolves them.
 *
 * The namespace owning the strongest patch on a key keeps every one of its
 * patches on that key; the other namespaces' patches are dropped. The
 * result never depends on map iteration order.
 */
export class ConflictDetector {
    public detect(patches: readonly QueuedPatch[], options: DetectOptions = {}): DetectionResult {
        const conflicts: Conflict[] = [];
        const losers = new Map<number, Conflict>();

        const authorized: QueuedPatch[] = [];
        const denied: number[] = [];
        for (const queued of patches) {
            if (options.authorize && !options.authorize(queued)) {
                denied.push(queued.sequence);
            } else {
                authorized.push(queued);
            }
        }
        for (const sequence of denied) {
            const conflict: Conflict = {
                kind: 'PermissionDenied',
                key: `permission:${sequence}`,
                patches: [sequence],
                winner: null,
                dropped: [sequence],
            };
            conflicts.push(conflict);
            losers.set(sequence, conflict);
        }

        const groups = new Map<string, QueuedPatch[]>();
        for (const queued of authorized) {
            const key = conflictKey(queued.patch.kind);
            const group = groups.get(key);
            if (group) {
                group.push(queued);
            } else {
                groups.set(key, [queued]);
            }
        }

        for (const [key, group] of groups) {
            const sources = new Set(group.map((queued) => queued.patch.source));
            if (sources.size < 2) continue;

            const winner = [...group].sort(comparePrecedence)[0];
            const dropped = group
                .filter((queued) => queued.patch.source !== winner.patch.source)
                .map((queued) => queued.sequence);
            const conflict: Conflict = {
                kind: key.endsWith(':lifecycle') ? lifecycleKind(group) : 'WriteWrite',
                key,
                patches: group.map((queued) => queued.sequence),
                winner: winner.sequence,
                dropped,
            };
            conflicts.push(conflict);
            for (const sequence of dropped) losers.set(sequence, conflict);
        }

        conflicts.sort((a, b) => a.patches[0] - b.patches[0]);
        const survivors = authorized.filter((queued) => !losers.has(queued.sequence));
        return { survivors, conflicts, losers };
    }
}
