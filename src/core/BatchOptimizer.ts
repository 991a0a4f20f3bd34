import type { BatchStats, ComponentOp, PatchBatch, QueuedPatch } from '../types';
import { mergeFields, type Value } from '../value';
import type { OptimizerOptions } from '../validation';
import { createPatch, entityKey, Patches, sameEntity, touchedEntities } from './Patches';

export interface DroppedPatch {
    readonly sequence: number;
    readonly outcome: 'superseded' | 'collapsed';
    /** The surviving sequence that absorbed a superseded patch. */
    readonly by?: number;
}

export interface OptimizedBatch {
    readonly patches: QueuedPatch[];
    readonly dropped: DroppedPatch[];
    readonly stats: BatchStats;
}

interface Slot {
    readonly index: number;
    readonly queued: QueuedPatch;
    alive: boolean;
}

const DEFAULT_OPTIONS: OptimizerOptions = {
    collapseCreateDestroy: true,
    supersedeSets: true,
    mergeUpdates: true,
};

/**
 * Local rewrites over an uncommitted batch.
 *
 * Patches are only combined with earlier patches from the same namespace
 * on the same key, so writes from different namespaces always reach the
 * conflict detector. A component key that more than one namespace writes
 * in the batch is left alone: merging would change which patch carries
 * the run's priority and timestamp, and with it the conflict's winner.
 * A rewritten patch takes the position (and sequence) of the later patch
 * it replaces; nothing else moves.
 */
export class BatchOptimizer {
    private readonly options: OptimizerOptions;

    constructor(options: Partial<OptimizerOptions> = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    public optimize(batch: PatchBatch): OptimizedBatch {
        const slots: Slot[] = [];
        const componentSlots = new Map<string, Slot>();
        const createSlots = new Map<string, Slot>();
        const dropped: DroppedPatch[] = [];
        const stats: BatchStats = {
            patchesIn: batch.length,
            patchesOut: 0,
            setsSuperseded: 0,
            updatesMerged: 0,
            collapses: 0,
            patchesCollapsed: 0,
        };

        const writers = new Map<string, Set<number>>();
        for (const { patch } of batch) {
            if (patch.kind.type !== 'component') continue;
            const key = `${entityKey(patch.kind.entity)}|${patch.kind.component}`;
            const sources = writers.get(key);
            if (sources) {
                sources.add(patch.source);
            } else {
                writers.set(key, new Set([patch.source]));
            }
        }

        const push = (queued: QueuedPatch): Slot => {
            const slot: Slot = { index: slots.length, queued, alive: true };
            slots.push(slot);
            return slot;
        };

        for (const queued of batch) {
            const { patch } = queued;
            const kind = patch.kind;

            if (kind.type === 'component') {
                const key = `${patch.source}|${entityKey(kind.entity)}|${kind.component}`;
                const contested = (writers.get(`${entityKey(kind.entity)}|${kind.component}`)?.size ?? 0) > 1;
                const previous = componentSlots.get(key);
                const live = previous && previous.alive && !contested ? previous : undefined;
                const op = kind.op;

                if (op.op === 'remove') {
                    push(queued);
                    componentSlots.delete(key);
                    continue;
                }

                if (op.op === 'set' && live && this.options.supersedeSets) {
                    live.alive = false;
                    dropped.push({ sequence: live.queued.sequence, outcome: 'superseded', by: queued.sequence });
                    stats.setsSuperseded++;
                    componentSlots.set(key, push(queued));
                    continue;
                }

                if (op.op === 'update' && live && this.options.mergeUpdates) {
                    const merged = this.mergeInto(live.queued, op.fields);
                    if (merged) {
                        live.alive = false;
                        dropped.push({ sequence: live.queued.sequence, outcome: 'superseded', by: queued.sequence });
                        stats.updatesMerged++;
                        const rewritten = createPatch(patch.source, Patches.component(kind.entity, kind.component, merged), {
                            priority: patch.priority,
                            timestamp: patch.timestamp,
                        });
                        componentSlots.set(key, push({ patch: rewritten, sequence: queued.sequence }));
                        continue;
                    }
                }

                componentSlots.set(key, push(queued));
                continue;
            }

            if (kind.type === 'entity' && this.options.collapseCreateDestroy) {
                const key = `${patch.source}|${entityKey(kind.entity)}`;
                if (kind.op.op === 'create') {
                    createSlots.set(key, push(queued));
                    continue;
                }
                const created = createSlots.get(key);
                if (kind.op.op === 'destroy' && created && created.alive) {
                    const entity = kind.entity;
                    let removed = 1;
                    created.alive = false;
                    dropped.push({ sequence: created.queued.sequence, outcome: 'collapsed' });
                    for (let i = created.index + 1; i < slots.length; i++) {
                        const slot = slots[i];
                        if (!slot.alive || slot.queued.patch.source !== patch.source) continue;
                        if (touchedEntities(slot.queued.patch.kind).some((ref) => sameEntity(ref, entity))) {
                            slot.alive = false;
                            dropped.push({ sequence: slot.queued.sequence, outcome: 'collapsed' });
                            removed++;
                        }
                    }
                    dropped.push({ sequence: queued.sequence, outcome: 'collapsed' });
                    createSlots.delete(key);
                    stats.collapses++;
                    stats.patchesCollapsed += removed + 1;
                    continue;
                }
            }

            push(queued);
        }

        const patches = slots.filter((slot) => slot.alive).map((slot) => slot.queued);
        stats.patchesOut = patches.length;
        dropped.sort((a, b) => a.sequence - b.sequence);
        return { patches, dropped, stats };
    }

    /**
     * The op an Update becomes when folded into the earlier patch on its key,
     * or null when the two cannot be combined.
     */
    private mergeInto(previous: QueuedPatch, fields: ReadonlyMap<string, Value>): ComponentOp | null {
        const kind = previous.patch.kind;
        if (kind.type !== 'component') return null;
        if (kind.op.op === 'update') {
            return { op: 'update', fields: new Map([...kind.op.fields, ...fields]) };
        }
        if (kind.op.op === 'set' && kind.op.data.type === 'object') {
            return { op: 'set', data: mergeFields(kind.op.data, fields) };
        }
        return null;
    }
}
