import { describe, it, expect, beforeEach } from 'vitest';
import { Transaction, TransactionBuilder, TransactionState, type ValidationContext } from './Transaction';
import { BatchOptimizer } from './BatchOptimizer';
import { ConflictDetector } from './ConflictDetector';
import { PatchValidator } from './PatchValidator';
import { createPatch, entityRef, Patches } from './Patches';
import { defineComponentSchema } from '../schema/SchemaBuilder';
import { ApplyError, InvalidStateTransitionError } from '../errors';
import type { PatchKind, QueuedPatch } from '../types';
import { Values, toJS } from '../value';

function queued(sequence: number, source: number, kind: PatchKind, priority = 0): QueuedPatch {
    return { patch: createPatch(source, kind, { priority, timestamp: 1000 + sequence }), sequence };
}

const e = entityRef(1, 1);
const other = entityRef(1, 2);

describe('Transaction', () => {
    let context: ValidationContext;

    beforeEach(() => {
        const validator = new PatchValidator();
        validator.registerSchema('Health', defineComponentSchema('Health', {
            hp: 'int',
            regen: { type: 'float', default: Values.float(0.5) },
        }));
        context = {
            validator,
            detector: new ConflictDetector(),
            policy: { rejectOnConflict: false, rejectOnInvalid: true },
        };
    });

    it('moves BUILDING -> VALIDATING -> COMMITTED', () => {
        const tx = new Transaction(1, [queued(1, 1, Patches.createEntity(e))]);
        expect(tx.state).toBe(TransactionState.BUILDING);
        expect(tx.validate(context)).toBe(true);
        expect(tx.state).toBe(TransactionState.VALIDATING);
        tx.commit({ applied: 1 });
        expect(tx.state).toBe(TransactionState.COMMITTED);
        expect(tx.isTerminal).toBe(true);
    });

    it('refuses transitions out of a terminal state', () => {
        const tx = new Transaction(1, [queued(1, 1, Patches.createEntity(e))]);
        tx.validate(context);
        tx.commit({ applied: 1 });
        expect(() => tx.commit({ applied: 1 })).toThrow(InvalidStateTransitionError);
        expect(() => tx.abort('late')).toThrow('Invalid state transition: COMMITTED -> ABORTED (action: late)');
    });

    it('has no result before it completes', () => {
        const tx = new Transaction(1, []);
        expect(() => tx.result()).toThrow(InvalidStateTransitionError);
    });

    it('has no abort reason once committed', () => {
        const tx = new Transaction(1, [queued(1, 1, Patches.createEntity(e))]);
        tx.validate(context);
        tx.commit({ applied: 1 });
        expect(tx.result().abortReason).toBeUndefined();
    });

    it('applies higher priority first without overtaking an earlier patch on the same entity', () => {
        const create = queued(1, 1, Patches.createEntity(e));
        const tag = queued(2, 1, Patches.addTag(e, 'boss'), 5);
        const layer = queued(3, 1, Patches.createLayer('hud', 'overlay'));
        const destroy = queued(4, 1, Patches.destroyEntity(other), 3);
        const tx = new Transaction(1, [create, tag, layer, destroy]);
        expect(tx.validate(context)).toBe(true);
        expect(tx.queued.map((q) => q.sequence)).toEqual([4, 1, 2, 3]);
    });

    it('keeps a destroy ahead of a later create of the same entity', () => {
        const destroy = queued(1, 1, Patches.destroyEntity(e));
        const create = queued(2, 1, Patches.createEntity(e), 5);
        const tx = new Transaction(1, [destroy, create]);
        expect(tx.validate(context)).toBe(true);
        expect(tx.queued.map((q) => q.sequence)).toEqual([1, 2]);
    });

    it('keeps an unload ahead of a later load of the same asset', () => {
        const unload = queued(1, 1, Patches.unloadAsset('tex'));
        const load = queued(2, 1, Patches.loadAsset('tex', 'v2.png'), 5);
        const unrelated = queued(3, 1, Patches.loadAsset('font', 'mono.ttf'), 9);
        const tx = new Transaction(1, [unload, load, unrelated]);
        expect(tx.validate(context)).toBe(true);
        expect(tx.queued.map((q) => q.sequence)).toEqual([3, 1, 2]);
    });

    it('orders a reparent after the create of its new parent', () => {
        const create = queued(1, 1, Patches.createEntity(other));
        const reparent = queued(2, 1, Patches.setParent(e, other), 5);
        const tag = queued(3, 1, Patches.addTag(e, 'child'), 9);
        const tx = new Transaction(1, [create, reparent, tag]);
        expect(tx.validate(context)).toBe(true);
        expect(tx.queued.map((q) => q.sequence)).toEqual([1, 2, 3]);
    });

    it('fills schema defaults into surviving sets and creates', () => {
        const tx = new Transaction(1, [
            queued(1, 1, Patches.createEntity(e, { Health: Values.fromJS({ hp: 2 }) })),
            queued(2, 1, Patches.setComponent(other, 'Health', Values.fromJS({ hp: 3 }))),
        ]);
        tx.validate(context);
        const [create, set] = tx.patches;
        expect(create.kind.type === 'entity' && create.kind.op.op === 'create' && toJS(create.kind.op.components.get('Health') ?? Values.null()))
            .toEqual({ hp: 2, regen: 0.5 });
        expect(set.kind.type === 'component' && set.kind.op.op === 'set' && toJS(set.kind.op.data)).toEqual({ hp: 3, regen: 0.5 });
    });

    it('aborts on an invalid patch when rejectOnInvalid is set', () => {
        const good = queued(1, 1, Patches.createEntity(e));
        const bad = queued(2, 1, Patches.setComponent(e, 'Health', Values.fromJS({ regen: 1.5 })));
        const tx = new Transaction(7, [good, bad]);
        expect(tx.validate(context)).toBe(false);
        expect(tx.state).toBe(TransactionState.ABORTED);
        const result = tx.result();
        expect(result.state).toBe('ABORTED');
        expect(result.reports.map((r) => r.outcome)).toEqual(['aborted', 'invalid']);
        expect(result.errors.map((err) => [err.kind, err.field])).toEqual([['MissingField', 'hp']]);
        expect(result.reports[1].error?.kind).toBe('MissingField');
        expect(result.abortReason).toBe('1 invalid patch(es)');
    });

    it('drops only the invalid patch when rejectOnInvalid is off', () => {
        context.policy.rejectOnInvalid = false;
        const good = queued(1, 1, Patches.createLayer('hud', 'overlay'));
        const bad = queued(2, 1, Patches.setComponent(e, 'Unknown', Values.object({})));
        const tx = new Transaction(1, [good, bad]);
        expect(tx.validate(context)).toBe(true);
        tx.commit({ applied: 1 });
        expect(tx.result().reports.map((r) => r.outcome)).toEqual(['applied', 'invalid']);
    });

    it('reports conflict losers and commits the rest', () => {
        const shared = entityRef(5, 1);
        const c = queued(1, 3, Patches.setComponent(shared, 'Health', Values.fromJS({ hp: 10 })), 10);
        const d = queued(2, 4, Patches.setComponent(shared, 'Health', Values.fromJS({ hp: 1 })), 1);
        const tx = new Transaction(1, [c, d]);
        expect(tx.validate(context)).toBe(true);
        tx.commit({ applied: 1 });
        const result = tx.result();
        expect(result.reports.map((r) => r.outcome)).toEqual(['applied', 'conflicted']);
        expect(result.reports[1].conflict?.kind).toBe('WriteWrite');
        expect(result.conflicts).toHaveLength(1);
    });

    it('aborts on any conflict when rejectOnConflict is set', () => {
        context.policy.rejectOnConflict = true;
        const shared = entityRef(5, 1);
        const tx = new Transaction(1, [
            queued(1, 3, Patches.setComponent(shared, 'Health', Values.fromJS({ hp: 10 }))),
            queued(2, 4, Patches.setComponent(shared, 'Health', Values.fromJS({ hp: 1 }))),
        ]);
        expect(tx.validate(context)).toBe(false);
        expect(tx.result().reports.map((r) => r.outcome)).toEqual(['aborted', 'conflicted']);
        expect(tx.result().abortReason).toBe('1 conflict(s)');
    });

    it('orphans every patch on an entity whose create lost', () => {
        const shared = entityRef(5, 1);
        const create = queued(1, 5, Patches.createEntity(shared));
        const set = queued(2, 5, Patches.setComponent(shared, 'Health', Values.fromJS({ hp: 1 })));
        const destroy = queued(3, 6, Patches.destroyEntity(shared), 9);
        const tx = new Transaction(1, [create, set, destroy]);
        expect(tx.validate(context)).toBe(true);
        expect(tx.patches).toEqual([]);
        tx.commit({ applied: 0 });
        const result = tx.result();
        expect(result.reports.map((r) => r.outcome)).toEqual(['conflicted', 'orphaned', 'orphaned']);
        expect(result.conflicts[0].kind).toBe('CreateDestroy');
    });

    it('records a store failure', () => {
        const tx = new Transaction(1, [queued(1, 1, Patches.createEntity(e))]);
        tx.validate(context);
        const failure = new ApplyError('disk full');
        tx.abort(failure);
        const result = tx.result();
        expect(result.applyError).toBe(failure);
        expect(result.abortReason).toBe('disk full');
        expect(result.reports[0].outcome).toBe('aborted');
    });
});

describe('TransactionBuilder', () => {
    it('carries optimizer drops into the result', () => {
        const first = queued(1, 1, Patches.setComponent(e, 'Health', Values.fromJS({ hp: 1 })));
        const second = queued(2, 1, Patches.setComponent(e, 'Health', Values.fromJS({ hp: 2 })));
        const builder = new TransactionBuilder(3).addBatch([first, second]).optimize(new BatchOptimizer());
        expect(builder.size).toBe(2);
        const tx = builder.build();
        expect(tx.id).toBe(3);
        expect(tx.queued).toEqual([second]);

        const validator = new PatchValidator({ mode: 'permissive' });
        tx.validate({ validator, detector: new ConflictDetector(), policy: { rejectOnConflict: false, rejectOnInvalid: true } });
        tx.commit({ applied: 1 });
        const result = tx.result();
        expect(result.reports[0]).toMatchObject({ sequence: 1, outcome: 'superseded', supersededBy: 2 });
        expect(result.reports[1]).toMatchObject({ sequence: 2, outcome: 'applied' });
        expect(result.stats.setsSuperseded).toBe(1);
        expect(result.warnings.map((w) => w.kind)).toEqual(['UnknownComponent']);
    });

    it('refuses patches after optimizing', () => {
        const builder = new TransactionBuilder(1).optimize(new BatchOptimizer());
        expect(() => builder.add(queued(1, 1, Patches.createEntity(e)))).toThrow(InvalidStateTransitionError);
    });
});
