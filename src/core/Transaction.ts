import { ApplyError, InvalidStateTransitionError, ValidationError } from '../errors';
import { fillDefaults } from '../schema/SchemaBuilder';
import type {
    AppliedTransaction,
    ApplyReport,
    BatchStats,
    Conflict,
    Patch,
    PatchKind,
    PatchOutcome,
    PatchReport,
    QueuedPatch,
    TerminalState,
    TransactionId,
    TransactionResult,
} from '../types';
import type { BatchOptimizer, OptimizedBatch } from './BatchOptimizer';
import type { ConflictDetector } from './ConflictDetector';
import { createPatch, entityKey, isEntityCreate, resourceKeys, touchedEntities } from './Patches';
import type { PatchValidator } from './PatchValidator';

// ============================================================================
// State Machine Definition
// ============================================================================

/**
 * Transaction lifecycle.
 *
 *   BUILDING --> VALIDATING --> COMMITTED
 *       |             |
 *       +-------------+-------> ABORTED
 */
export enum TransactionState {
    /** Accumulating patches; nothing has been checked. */
    BUILDING = 'BUILDING',
    /** Validated and conflict-resolved, waiting for the store. */
    VALIDATING = 'VALIDATING',
    COMMITTED = 'COMMITTED',
    ABORTED = 'ABORTED',
}

const VALID_TRANSITIONS: Record<TransactionState, TransactionState[]> = {
    [TransactionState.BUILDING]: [TransactionState.VALIDATING, TransactionState.ABORTED],
    [TransactionState.VALIDATING]: [TransactionState.COMMITTED, TransactionState.ABORTED],
    [TransactionState.COMMITTED]: [], // Terminal state
    [TransactionState.ABORTED]: [], // Terminal state
};

export interface TransactionPolicy {
    rejectOnConflict: boolean;
    rejectOnInvalid: boolean;
}

export interface ValidationContext {
    validator: PatchValidator;
    detector: ConflictDetector;
    policy: TransactionPolicy;
    /** Processing-time permission re-check. */
    authorize?: (queued: QueuedPatch) => boolean;
}

interface DropRecord {
    outcome: PatchOutcome;
    supersededBy?: number;
    error?: ValidationError;
    conflict?: Conflict;
}

interface OrderNode {
    readonly queued: QueuedPatch;
    /** Earlier patches on a shared key that have not been placed yet. */
    blockers: number;
    readonly followers: OrderNode[];
}

function precedes(a: QueuedPatch, b: QueuedPatch): boolean {
    if (a.patch.priority !== b.patch.priority) return a.patch.priority > b.patch.priority;
    return a.sequence < b.sequence;
}

/**
 * Apply order: higher priority first, then submission order. A patch never
 * overtakes an earlier-submitted patch on the same entity, layer or asset,
 * so a destroy followed by a create of the same id still lands in that order.
 */
export function applyOrder(patches: readonly QueuedPatch[]): QueuedPatch[] {
    const nodes = [...patches]
        .sort((a, b) => a.sequence - b.sequence)
        .map((queued): OrderNode => ({ queued, blockers: 0, followers: [] }));

    const lastOnKey = new Map<string, OrderNode>();
    for (const node of nodes) {
        for (const key of new Set(resourceKeys(node.queued.patch.kind))) {
            const previous = lastOnKey.get(key);
            if (previous) {
                previous.followers.push(node);
                node.blockers++;
            }
            lastOnKey.set(key, node);
        }
    }

    const ready = nodes.filter((node) => node.blockers === 0);
    const ordered: QueuedPatch[] = [];
    while (ready.length > 0) {
        let best = 0;
        for (let i = 1; i < ready.length; i++) {
            if (precedes(ready[i].queued, ready[best].queued)) best = i;
        }
        const [node] = ready.splice(best, 1);
        ordered.push(node.queued);
        for (const follower of node.followers) {
            follower.blockers--;
            if (follower.blockers === 0) ready.push(follower);
        }
    }
    return ordered;
}

function emptyStats(count: number): BatchStats {
    return {
        patchesIn: count,
        patchesOut: count,
        setsSuperseded: 0,
        updatesMerged: 0,
        collapses: 0,
        patchesCollapsed: 0,
    };
}

/**
 * Accumulates a drained batch and its optimization into a transaction.
 *
 * @example
 * ```typescript
 * const tx = new TransactionBuilder(1)
 *   .addBatch(bus.drain())
 *   .optimize(new BatchOptimizer())
 *   .build();
 * ```
 */
export class TransactionBuilder {
    private submitted: QueuedPatch[] = [];
    private optimized: OptimizedBatch | null = null;

    constructor(private readonly id: TransactionId) { }

    public add(queued: QueuedPatch): this {
        if (this.optimized) {
            throw new InvalidStateTransitionError('OPTIMIZED', TransactionState.BUILDING, 'add');
        }
        this.submitted.push(queued);
        return this;
    }

    public addBatch(batch: readonly QueuedPatch[]): this {
        for (const queued of batch) this.add(queued);
        return this;
    }

    public optimize(optimizer: BatchOptimizer): this {
        this.optimized = optimizer.optimize(this.submitted);
        return this;
    }

    public get size(): number {
        return this.submitted.length;
    }

    public build(): Transaction {
        return new Transaction(this.id, this.submitted, this.optimized);
    }
}

/**
 * An ordered batch applied all-or-nothing.
 *
 * `validate()` runs schema validation, then conflict resolution, then the
 * orphan rule, and finally puts the survivors in apply order. `patches`
 * is what a backing store receives. Both terminal states are immutable.
 */
export class Transaction implements AppliedTransaction {
    private _state: TransactionState = TransactionState.BUILDING;
    private readonly submitted: readonly QueuedPatch[];
    private working: QueuedPatch[];
    private readonly drops = new Map<number, DropRecord>();
    private readonly conflicts: Conflict[] = [];
    private readonly errors: ValidationError[] = [];
    private readonly warnings: ValidationError[] = [];
    private readonly stats: BatchStats;
    private readonly startedAt = Date.now();
    private finishedAt: number | null = null;
    private applyError?: ApplyError;
    private abortReason?: string;
    private applyReport?: ApplyReport;

    constructor(
        public readonly id: TransactionId,
        submitted: readonly QueuedPatch[],
        optimized: OptimizedBatch | null = null
    ) {
        this.submitted = [...submitted];
        if (optimized) {
            this.working = [...optimized.patches];
            this.stats = { ...optimized.stats };
            for (const drop of optimized.dropped) {
                this.drops.set(drop.sequence, { outcome: drop.outcome, supersededBy: drop.by });
            }
        } else {
            this.working = [...submitted];
            this.stats = emptyStats(submitted.length);
        }
    }

    public get state(): TransactionState {
        return this._state;
    }

    public get isTerminal(): boolean {
        return this._state === TransactionState.COMMITTED || this._state === TransactionState.ABORTED;
    }

    /**
     * The surviving patches, in apply order once validated.
     */
    public get patches(): readonly Patch[] {
        return this.working.map((queued) => queued.patch);
    }

    public get queued(): readonly QueuedPatch[] {
        return this.working;
    }

    private transition(to: TransactionState, action: string): void {
        const from = this._state;
        if (!VALID_TRANSITIONS[from].includes(to)) {
            throw new InvalidStateTransitionError(from, to, action);
        }
        this._state = to;
    }

    private drop(queued: QueuedPatch, record: DropRecord): void {
        this.drops.set(queued.sequence, record);
    }

    /**
     * @returns true when the transaction is ready to apply, false when it aborted
     */
    public validate(context: ValidationContext): boolean {
        this.transition(TransactionState.VALIDATING, 'validate');
        const { validator, detector, policy } = context;

        // Schema correctness first: an invalid patch must not win a conflict.
        const valid: QueuedPatch[] = [];
        for (const queued of this.working) {
            const report = validator.validatePatch(queued.patch);
            this.warnings.push(...report.warnings);
            if (report.errors.length > 0) {
                this.errors.push(...report.errors);
                this.drop(queued, { outcome: 'invalid', error: report.errors[0] });
            } else {
                valid.push(queued);
            }
        }
        this.working = valid;
        if (this.errors.length > 0 && policy.rejectOnInvalid) {
            this.abort(`${this.errors.length} invalid patch(es)`);
            return false;
        }

        const detection = detector.detect(this.working, { authorize: context.authorize });
        this.conflicts.push(...detection.conflicts);
        for (const queued of this.working) {
            const conflict = detection.losers.get(queued.sequence);
            if (conflict) this.drop(queued, { outcome: 'conflicted', conflict });
        }
        this.working = detection.survivors;
        if (this.conflicts.length > 0 && policy.rejectOnConflict) {
            this.abort(`${this.conflicts.length} conflict(s)`);
            return false;
        }

        this.dropOrphans();

        this.working = applyOrder(this.working.map((queued) => this.withDefaults(queued, validator)));
        return true;
    }

    /**
     * An entity whose Create was in this batch but did not survive takes
     * every other patch addressed to it down too.
     */
    private dropOrphans(): void {
        const created = new Set<string>();
        for (const { patch } of this.submitted) {
            if (isEntityCreate(patch.kind)) created.add(entityKey(patch.kind.entity));
        }
        if (created.size === 0) return;

        for (const { patch } of this.working) {
            if (isEntityCreate(patch.kind)) created.delete(entityKey(patch.kind.entity));
        }
        if (created.size === 0) return;

        this.working = this.working.filter((queued) => {
            const orphaned = touchedEntities(queued.patch.kind).some((ref) => created.has(entityKey(ref)));
            if (orphaned) this.drop(queued, { outcome: 'orphaned' });
            return !orphaned;
        });
    }

    private withDefaults(queued: QueuedPatch, validator: PatchValidator): QueuedPatch {
        const { patch } = queued;
        const kind = patch.kind;
        let filled: PatchKind | null = null;

        if (kind.type === 'component' && kind.op.op === 'set') {
            const schema = validator.getSchema(kind.component);
            const data = schema ? fillDefaults(schema, kind.op.data) : kind.op.data;
            if (data !== kind.op.data) filled = { ...kind, op: { op: 'set', data } };
        } else if (isEntityCreate(kind) && kind.op.components.size > 0) {
            let changed = false;
            const components = new Map(kind.op.components);
            for (const [name, data] of components) {
                const schema = validator.getSchema(name);
                const withDefaults = schema ? fillDefaults(schema, data) : data;
                if (withDefaults !== data) {
                    components.set(name, withDefaults);
                    changed = true;
                }
            }
            if (changed) filled = { ...kind, op: { ...kind.op, components } };
        }

        if (!filled) return queued;
        return {
            sequence: queued.sequence,
            patch: createPatch(patch.source, filled, { priority: patch.priority, timestamp: patch.timestamp }),
        };
    }

    public commit(report: ApplyReport): void {
        this.transition(TransactionState.COMMITTED, 'commit');
        this.applyReport = report;
        this.finishedAt = Date.now();
    }

    public abort(reason: ApplyError | string): void {
        this.transition(TransactionState.ABORTED, typeof reason === 'string' ? reason : 'apply failed');
        if (reason instanceof ApplyError) {
            this.applyError = reason;
            this.abortReason = reason.message;
        } else {
            this.abortReason = reason;
        }
        this.finishedAt = Date.now();
    }

    /**
     * Per-patch outcomes for every submitted patch, in submission order.
     */
    public result(): TransactionResult {
        if (this._state !== TransactionState.COMMITTED && this._state !== TransactionState.ABORTED) {
            throw new InvalidStateTransitionError(this._state, this._state, 'result before completion');
        }
        const state: TerminalState = this._state === TransactionState.COMMITTED ? 'COMMITTED' : 'ABORTED';
        const reports = this.submitted.map((queued): PatchReport => {
            const base = { sequence: queued.sequence, source: queued.patch.source, patch: queued.patch };
            const record = this.drops.get(queued.sequence);
            if (record) return { ...base, ...record };
            return { ...base, outcome: state === 'COMMITTED' ? 'applied' : 'aborted' };
        });
        return {
            id: this.id,
            state,
            reports,
            conflicts: [...this.conflicts],
            errors: [...this.errors],
            warnings: [...this.warnings],
            applyError: this.applyError,
            abortReason: this.abortReason,
            applyReport: this.applyReport,
            stats: { ...this.stats },
            startedAt: this.startedAt,
            durationMs: (this.finishedAt ?? Date.now()) - this.startedAt,
        };
    }
}
