import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InMemoryStore } from '../src/adapters/InMemoryStore';
import { PatchBus } from '../src/core/PatchBus';
import { Permissions } from '../src/core/Namespace';
import { Patches } from '../src/core/Patches';
import { SnapshotManager } from '../src/core/SnapshotManager';
import { QuotaExceededError } from '../src/errors';
import { defineComponentSchema } from '../src/schema/SchemaBuilder';
import type { ApplyReport, AppliedTransaction, NamespaceReport, Patch } from '../src/types';
import type { PatchBusConfigInput } from '../src/validation';
import { Values, toJS } from '../src/value';

/**
 * Records what reaches the store, in the order it arrives.
 */
class RecordingStore extends InMemoryStore {
    public readonly transactions: Patch[][] = [];

    public apply(transaction: AppliedTransaction): ApplyReport {
        this.transactions.push([...transaction.patches]);
        return super.apply(transaction);
    }
}

function world(config: PatchBusConfigInput = {}) {
    const store = new RecordingStore();
    const bus = new PatchBus(store, config);
    bus.registerSchema('Health', defineComponentSchema('Health', { hp: 'int' }));
    bus.registerSchema('Transform', defineComponentSchema('Transform', { x: 'float', y: 'float' }));
    return { store, bus };
}

function tagOf(patch: Patch): string | undefined {
    const kind = patch.kind;
    return kind.type === 'entity' && (kind.op.op === 'addTag' || kind.op.op === 'removeTag') ? kind.op.tag : undefined;
}

describe('patch bus scenarios', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => { });
        vi.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('an entity created with its components in one cycle', () => {
        it('lands with both components', async () => {
            const { store, bus } = world();
            const a = bus.register({}, {}, 'A');
            const enemy = a.allocateEntity();
            a.submit(a.patch(Patches.createEntity(enemy, {}, 'Enemy')));
            a.submit(a.patch(Patches.setComponent(enemy, 'Health', Values.fromJS({ hp: 30 }))));
            a.submit(a.patch(Patches.setComponent(enemy, 'Transform', Values.fromJS({ x: 1.5, y: 2 }))));

            const result = await bus.runCycle();
            expect(result?.state).toBe('COMMITTED');
            expect(store.entityCount).toBe(1);
            expect(store.getEntity(enemy)?.archetype).toBe('Enemy');
            expect(store.componentNames(enemy)).toEqual(['Health', 'Transform']);
        });

        it('does not land at all when one set is invalid', async () => {
            const { store, bus } = world();
            const a = bus.register({}, {}, 'A');
            const enemy = a.allocateEntity();
            a.submit(a.patch(Patches.createEntity(enemy, {}, 'Enemy')));
            a.submit(a.patch(Patches.setComponent(enemy, 'Health', Values.fromJS({ hp: 30 }))));
            a.submit(a.patch(Patches.setComponent(enemy, 'Transform', Values.fromJS({ x: 1.5 }))));

            const result = await bus.runCycle();
            expect(result?.state).toBe('ABORTED');
            expect(result?.errors.map((e) => [e.kind, e.field])).toEqual([['MissingField', 'y']]);
            expect(store.entityCount).toBe(0);
            expect(store.transactions).toEqual([]);
        });
    });

    it('admits exactly the per-cycle patch quota', async () => {
        const { store, bus } = world();
        const b = bus.register({}, { maxPatchesPerCycle: 5 }, 'B');
        const entities = [1, 2, 3, 4, 5].map(() => b.allocateEntity());
        for (const e of entities) {
            b.submit(b.patch(Patches.createEntity(e, { Health: Values.fromJS({ hp: 1 }) })));
        }
        await bus.runCycle();

        for (const e of entities) {
            b.submit(b.patch(Patches.updateComponent(e, 'Health', { hp: Values.int(2) })));
        }
        expect(() => b.submit(b.patch(Patches.updateComponent(entities[0], 'Health', { hp: Values.int(3) }))))
            .toThrow(QuotaExceededError);
        expect(b.usage().pending).toBe(5);

        const result = await bus.runCycle();
        expect(result?.reports).toHaveLength(5);
        expect(store.transactions[1]).toHaveLength(5);
        expect(toJS(store.getComponent(entities[0], 'Health') ?? Values.null())).toEqual({ hp: 2 });
    });

    it('resolves a write-write conflict by priority and tells the loser', async () => {
        const { store, bus } = world();
        const c = bus.register({}, {}, 'C');
        const d = bus.register(Permissions.full(), {}, 'D');
        const target = c.allocateEntity();
        c.submit(c.patch(Patches.createEntity(target)));
        await bus.runCycle();

        const toD: NamespaceReport[] = [];
        d.onResult((report) => toD.push(report));
        c.submit(c.patch(Patches.setComponent(target, 'Transform', Values.fromJS({ x: 10.5, y: 0.5 })), { priority: 10 }));
        d.submit(d.patch(Patches.setComponent(target, 'Transform', Values.fromJS({ x: 1.5, y: 0.5 })), { priority: 1 }));

        const result = await bus.runCycle();
        expect(result?.state).toBe('COMMITTED');
        expect(result?.conflicts.map((conflict) => conflict.kind)).toEqual(['WriteWrite']);
        expect(toJS(store.getComponent(target, 'Transform') ?? Values.null())).toEqual({ x: 10.5, y: 0.5 });
        expect(toD).toHaveLength(1);
        expect(toD[0].reports.map((r) => r.outcome)).toEqual(['conflicted']);
        expect(toD[0].reports[0].conflict?.winner).toBe(result?.reports[0].sequence);
    });

    it('never stores an entity created and destroyed in the same cycle', async () => {
        const { store, bus } = world();
        const a = bus.register();
        const ghost = a.allocateEntity();
        a.submit(a.patch(Patches.createEntity(ghost)));
        a.submit(a.patch(Patches.setComponent(ghost, 'Health', Values.fromJS({ hp: 1 }))));
        a.submit(a.patch(Patches.destroyEntity(ghost)));

        const result = await bus.runCycle();
        expect(result?.reports.map((r) => r.outcome)).toEqual(['collapsed', 'collapsed', 'collapsed']);
        expect(store.hasEntity(ghost)).toBe(false);
        expect(store.transactions).toEqual([]);
    });

    it('applies higher priority first and keeps submission order among equals', async () => {
        const { store, bus } = world();
        const a = bus.register();
        const e = a.allocateEntity();
        a.submit(a.patch(Patches.createEntity(e)));
        await bus.runCycle();

        a.submit(a.patch(Patches.addTag(e, 'low')));
        a.submit(a.patch(Patches.addTag(e, 'high'), { priority: 5 }));
        a.submit(a.patch(Patches.addTag(e, 'also-low')));
        await bus.runCycle();

        expect(store.transactions[1].map(tagOf)).toEqual(['high', 'low', 'also-low']);
    });

    it('drops patches on an entity whose create lost a conflict', async () => {
        const { store, bus } = world();
        const creator = bus.register({}, {}, 'creator');
        const destroyer = bus.register(Permissions.full(), {}, 'destroyer');
        const writer = bus.register(Permissions.full(), {}, 'writer');
        const contested = creator.allocateEntity();
        creator.submit(creator.patch(Patches.createEntity(contested)));
        destroyer.submit(destroyer.patch(Patches.destroyEntity(contested), { priority: 5 }));
        writer.submit(writer.patch(Patches.setComponent(contested, 'Health', Values.fromJS({ hp: 1 }))));

        const result = await bus.runCycle();
        expect(result?.state).toBe('COMMITTED');
        expect(result?.reports.map((r) => r.outcome)).toEqual(['conflicted', 'orphaned', 'orphaned']);
        expect(result?.conflicts.map((conflict) => conflict.kind)).toEqual(['CreateDestroy']);
        expect(store.transactions).toEqual([]);
        expect(creator.usage().liveEntities).toBe(0);
    });

    it('drops only the invalid set when the bus is lenient', async () => {
        const { store, bus } = world({ rejectOnInvalid: false });
        const a = bus.register();
        const e = a.allocateEntity();
        a.submit(a.patch(Patches.createEntity(e)));
        a.submit(a.patch(Patches.setComponent(e, 'Health', Values.object({}))));

        const result = await bus.runCycle();
        expect(result?.state).toBe('COMMITTED');
        expect(result?.reports.map((r) => r.outcome)).toEqual(['applied', 'invalid']);
        expect(result?.reports[1].error?.field).toBe('hp');
        expect(store.transactions[0]).toHaveLength(1);
        expect(store.componentNames(e)).toEqual([]);
    });

    it('restores a captured world into an empty store', async () => {
        const { bus } = world();
        const a = bus.register({}, {}, 'A');
        for (let i = 0; i < 3; i++) {
            const e = a.allocateEntity();
            a.submit(a.patch(Patches.createEntity(e, { Health: Values.fromJS({ hp: 10 + i }) }, 'Enemy')));
            await bus.runCycle();
        }
        const snapshot = await new SnapshotManager(bus).capture();
        expect(snapshot.entities).toHaveLength(3);

        const target = world();
        const result = await new SnapshotManager(target.bus).restore(snapshot);
        expect(result?.state).toBe('COMMITTED');
        expect(target.store.entityCount).toBe(3);
        const restored = await target.bus.readCommitted();
        expect(restored.entities).toEqual(snapshot.entities);
        expect(restored.components).toEqual(snapshot.components);
    });
});
