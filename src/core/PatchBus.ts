import { decodePatch, payloadSize } from '../codec';
import {
    ApplyError,
    BusClosedError,
    ConfigurationError,
    CycleInProgressError,
    ForgeryError,
    PatchBusError,
    PermissionDeniedError,
    QuotaExceededError,
} from '../errors';
import type { ComponentSchema } from '../schema/SchemaBuilder';
import type {
    ApplyReport,
    BackingStore,
    NamespaceId,
    Patch,
    PatchBatch,
    PatchReport,
    QueuedPatch,
    TransactionResult,
    WorldState,
} from '../types';
import { AsyncLock } from '../utils/AsyncLock';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';
import {
    resolveConfig,
    resolveLimits,
    resolvePermissions,
    type NamespacePermissionsInput,
    type PatchBusConfig,
    type PatchBusConfigInput,
    type ResourceLimitsInput,
} from '../validation';
import { validateValue } from '../value';
import { BatchOptimizer } from './BatchOptimizer';
import { ConflictDetector } from './ConflictDetector';
import { Namespace, permissionViolation, type NamespaceUsage } from './Namespace';
import { NamespaceHandle, type PatchSink } from './NamespaceHandle';
import { describeKind, patchPayloads } from './Patches';
import { PatchValidator } from './PatchValidator';
import { TransactionBuilder } from './Transaction';

export interface PatchBusEvents {
    admitted: [QueuedPatch];
    rejected: [NamespaceId, PatchBusError];
    transaction: [TransactionResult];
    committed: [TransactionResult];
    aborted: [TransactionResult];
    namespaceRegistered: [NamespaceId, string];
    namespaceReleased: [NamespaceId];
}

export interface BusStats {
    cycles: number;
    transactionsCommitted: number;
    transactionsAborted: number;
    patchesAdmitted: number;
    patchesRejected: number;
    patchesApplied: number;
    patchesDropped: number;
    pending: number;
    peakPending: number;
    namespaces: number;
}

/**
 * The hub between untrusted producers and the backing store.
 *
 * Producers submit through `NamespaceHandle`s; admission (closed, forgery,
 * payload size, permission, quota) is synchronous and all-or-nothing.
 * `runCycle()` is the single consumer: it drains every queue, optimizes,
 * validates, resolves conflicts and hands the survivors to `store.apply`
 * while holding the exclusivity token that `SnapshotManager.capture` also
 * takes.
 *
 * @example
 * ```typescript
 * const bus = new PatchBus(new InMemoryStore());
 * bus.registerSchema('Health', defineComponentSchema('Health', { hp: 'int' }));
 * const game = bus.register();
 * const e = game.allocateEntity();
 * game.submit(game.patch(Patches.createEntity(e)));
 * game.submit(game.patch(Patches.setComponent(e, 'Health', Values.object({ hp: Values.int(10) }))));
 * const result = await bus.runCycle();
 * ```
 */
export class PatchBus extends EventEmitter<PatchBusEvents> implements PatchSink {
    public readonly config: PatchBusConfig;
    public readonly validator: PatchValidator;
    private readonly optimizer: BatchOptimizer;
    private readonly detector = new ConflictDetector();
    private readonly lock = new AsyncLock();
    private readonly logger: Logger;

    private namespaces = new Map<NamespaceId, Namespace>();
    private nextNamespaceId = 1;
    private nextSequence = 1;
    private nextTransactionId = 1;
    private closed = false;
    private results: TransactionResult[] = [];
    private counters = {
        cycles: 0,
        transactionsCommitted: 0,
        transactionsAborted: 0,
        patchesAdmitted: 0,
        patchesRejected: 0,
        patchesApplied: 0,
        patchesDropped: 0,
        peakPending: 0,
    };

    constructor(private readonly store: BackingStore, config: PatchBusConfigInput = {}) {
        super();
        this.config = resolveConfig(config);
        this.logger = new Logger('patchbus:PatchBus', this.config.debug);
        this.validator = new PatchValidator({
            mode: this.config.validation,
            valueLimits: this.config.valueLimits,
        });
        this.optimizer = new BatchOptimizer(this.config.optimizer);
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    /** True while a cycle or a capture holds the exclusivity token. */
    public get isBusy(): boolean {
        return this.lock.isHeld;
    }

    public registerSchema(name: string, schema: ComponentSchema): void {
        this.validator.registerSchema(name, schema);
    }

    // ========================================================================
    // Namespaces
    // ========================================================================

    /**
     * Creates a namespace with a fresh id and zeroed usage counters.
     *
     * @throws {BusClosedError} If the bus is closed
     * @throws {ConfigurationError} If the permissions, limits or name are invalid
     */
    public register(
        permissions: NamespacePermissionsInput = {},
        limits: ResourceLimitsInput = {},
        name?: string
    ): NamespaceHandle {
        if (this.closed) throw new BusClosedError();
        const id = this.nextNamespaceId++;
        const label = name ?? `namespace-${id}`;
        if (this.findNamespace(label) !== undefined) {
            throw new ConfigurationError(`Namespace name "${label}" is already registered`);
        }
        const namespace = new Namespace(id, label, resolvePermissions(permissions), resolveLimits(limits));
        this.namespaces.set(id, namespace);
        this.logger.debug(`Registered namespace ${id} (${label})`);
        this.emit('namespaceRegistered', id, label);
        return new NamespaceHandle(this, namespace);
    }

    /**
     * Closes a namespace. Patches it already queued still take part in the
     * next cycle; afterwards the store is asked to release its entities.
     */
    public unregister(id: NamespaceId): boolean {
        const namespace = this.namespaces.get(id);
        if (!namespace || namespace.closed) return false;
        namespace.closed = true;
        this.logger.info(`Namespace ${id} (${namespace.name}) unregistered with ${namespace.pending} pending patch(es)`);
        return true;
    }

    public findNamespace(name: string): NamespaceId | undefined {
        for (const namespace of this.namespaces.values()) {
            if (namespace.name === name) return namespace.id;
        }
        return undefined;
    }

    public namespaceIds(): NamespaceId[] {
        return Array.from(this.namespaces.keys());
    }

    public usage(id: NamespaceId): NamespaceUsage | undefined {
        return this.namespaces.get(id)?.usage();
    }

    /**
     * Replaces a namespace's permissions. Queued patches the new set forbids
     * are dropped at processing time with a PermissionDenied conflict.
     */
    public setPermissions(id: NamespaceId, permissions: NamespacePermissionsInput): void {
        const namespace = this.namespaces.get(id);
        if (!namespace) throw new ConfigurationError(`Unknown namespace ${id}`);
        namespace.permissions = resolvePermissions(permissions);
    }

    // ========================================================================
    // Admission
    // ========================================================================

    public admit(namespace: Namespace, patch: Patch): void {
        try {
            this.check(namespace, patch);
        } catch (error) {
            if (error instanceof PatchBusError) {
                this.counters.patchesRejected++;
                this.logger.debug(`Rejected ${describeKind(patch.kind)} from namespace ${namespace.id}: ${error.message}`);
                this.emit('rejected', namespace.id, error);
            }
            throw error;
        }
    }

    public admitEncoded(namespace: Namespace, bytes: Uint8Array): void {
        let patch: Patch;
        try {
            patch = decodePatch(bytes, this.config.valueLimits);
        } catch (error) {
            if (error instanceof PatchBusError) {
                this.counters.patchesRejected++;
                this.emit('rejected', namespace.id, error);
            }
            throw error;
        }
        this.admit(namespace, patch);
    }

    private check(namespace: Namespace, patch: Patch): void {
        if (this.closed) throw new BusClosedError();
        if (namespace.closed) throw new BusClosedError(`Namespace ${namespace.id} is unregistered`);
        if (patch.source !== namespace.id) throw new ForgeryError(namespace.id, patch.source);

        const payloads = patchPayloads(patch.kind);
        for (const payload of payloads) {
            const error = validateValue(payload, this.config.valueLimits);
            if (error) throw error;
        }

        const reason = permissionViolation(namespace.permissions, patch);
        if (reason) throw new PermissionDeniedError(`Namespace ${namespace.id} ${reason}`, namespace.id);

        const usage = namespace.usage();
        const limits = namespace.limits;
        if (limits.maxPatchesPerCycle > 0 && usage.patchesThisCycle + 1 > limits.maxPatchesPerCycle) {
            throw new QuotaExceededError(namespace.id, 'patchesPerCycle', limits.maxPatchesPerCycle);
        }
        const bytes = payloadSize(payloads);
        if (limits.maxPayloadBytes > 0 && usage.payloadBytesThisCycle + bytes > limits.maxPayloadBytes) {
            throw new QuotaExceededError(namespace.id, 'payloadBytes', limits.maxPayloadBytes);
        }
        const kind = patch.kind;
        const ownCreate = kind.type === 'entity' && kind.op.op === 'create' && kind.entity.namespace === namespace.id;
        if (ownCreate && limits.maxEntities > 0 && usage.liveEntities + 1 > limits.maxEntities) {
            throw new QuotaExceededError(namespace.id, 'entities', limits.maxEntities);
        }
        if (ownCreate) namespace.reserveLocalId(kind.entity.localId);

        const queued: QueuedPatch = { patch, sequence: this.nextSequence++ };
        namespace.enqueue(queued, bytes);
        this.counters.patchesAdmitted++;
        this.counters.peakPending = Math.max(this.counters.peakPending, this.pendingCount());
        this.emit('admitted', queued);
    }

    private pendingCount(): number {
        let pending = 0;
        for (const namespace of this.namespaces.values()) pending += namespace.pending;
        return pending;
    }

    // ========================================================================
    // Consumer
    // ========================================================================

    /**
     * Pulls every pending patch, in arrival order, and resets per-cycle
     * quota counters. For callers that process batches themselves;
     * `runCycle()` is the usual consumer.
     *
     * Drained creates stop counting against entity quotas. Hand the
     * outcome back through `reconcile()` once the batch is applied.
     *
     * @throws {CycleInProgressError} If a cycle or a capture is running
     */
    public drain(): PatchBatch {
        if (this.lock.isHeld) throw new CycleInProgressError('drain');
        return this.drainQueues(false);
    }

    /**
     * Counts the outcome of a batch taken with `drain()` against entity
     * quotas: applied creates take a slot from their owner, applied
     * destroys free one.
     */
    public reconcile(reports: readonly PatchReport[]): void {
        this.reconcileEntityCounts(reports, false);
    }

    private drainQueues(countCreates: boolean): QueuedPatch[] {
        const batch: QueuedPatch[] = [];
        for (const namespace of this.namespaces.values()) {
            batch.push(...namespace.take(countCreates));
        }
        return batch.sort((a, b) => a.sequence - b.sequence);
    }

    /**
     * Runs one apply cycle: drain, optimize, validate, resolve conflicts,
     * apply, and report. Resolves with null when nothing was pending.
     */
    public runCycle(): Promise<TransactionResult | null> {
        return this.cycle();
    }

    /**
     * Runs `enqueue`, then a cycle, under one hold of the exclusivity
     * token: whatever `enqueue` submits is part of the returned transaction,
     * and no other cycle runs between the two. `enqueue` receives committed
     * state as of the start of the cycle.
     */
    public runCycleWith(enqueue: (committed: WorldState) => void): Promise<TransactionResult | null> {
        return this.cycle(enqueue);
    }

    private async cycle(enqueue?: (committed: WorldState) => void): Promise<TransactionResult | null> {
        const release = await this.lock.acquire();
        try {
            if (enqueue) enqueue(await this.store.read());
            this.counters.cycles++;
            const batch = this.drainQueues(true);
            const result = batch.length > 0 ? await this.process(batch) : null;
            await this.releaseClosedNamespaces();
            return result;
        } finally {
            release();
        }
    }

    /**
     * Reads committed state between cycles.
     */
    public readCommitted(): Promise<WorldState> {
        return this.lock.run(() => this.store.read());
    }

    private async process(batch: QueuedPatch[]): Promise<TransactionResult> {
        const tx = new TransactionBuilder(this.nextTransactionId++)
            .addBatch(batch)
            .optimize(this.optimizer)
            .build();

        const ready = tx.validate({
            validator: this.validator,
            detector: this.detector,
            policy: {
                rejectOnConflict: this.config.rejectOnConflict,
                rejectOnInvalid: this.config.rejectOnInvalid,
            },
            authorize: (queued) => this.isStillAuthorized(queued),
        });

        if (ready) {
            try {
                const report: ApplyReport = tx.patches.length > 0 ? await this.store.apply(tx) : { applied: 0 };
                tx.commit(report);
            } catch (error) {
                if (error instanceof ApplyError) {
                    this.logger.warn(`Transaction ${tx.id} refused by store: ${error.message}`);
                    tx.abort(error);
                } else {
                    this.logger.error(`Transaction ${tx.id} failed in store:`, error);
                    const message = error instanceof Error ? error.message : String(error);
                    tx.abort(new ApplyError(`Backing store failed: ${message}`, error));
                }
            }
        }

        const result = tx.result();
        if (result.state === 'ABORTED' && !result.applyError) {
            this.logger.warn(`Transaction ${result.id} aborted: ${result.abortReason ?? 'unknown reason'}`);
        }
        this.logger.debug(`Transaction ${result.id} ${result.state}`, result.stats);

        this.record(result);
        this.reconcileEntityCounts(result.reports, true);
        this.deliver(result);
        this.emit('transaction', result);
        this.emit(result.state === 'COMMITTED' ? 'committed' : 'aborted', result);
        return result;
    }

    private isStillAuthorized(queued: QueuedPatch): boolean {
        const namespace = this.namespaces.get(queued.patch.source);
        if (!namespace) return true;
        return permissionViolation(namespace.permissions, queued.patch) === null;
    }

    private record(result: TransactionResult): void {
        if (result.state === 'COMMITTED') {
            this.counters.transactionsCommitted++;
        } else {
            this.counters.transactionsAborted++;
        }
        for (const report of result.reports) {
            if (report.outcome === 'applied') {
                this.counters.patchesApplied++;
            } else {
                this.counters.patchesDropped++;
            }
        }
        if (this.config.historyLimit === 0) return;
        this.results.push(result);
        if (this.results.length > this.config.historyLimit) {
            this.results.splice(0, this.results.length - this.config.historyLimit);
        }
    }

    /**
     * Settles entity counts after a batch. With `createsCounted`, own
     * creates were counted as live when drained: undo that for the ones that
     * did not land. Applied destroys always free a slot.
     */
    private reconcileEntityCounts(reports: readonly PatchReport[], createsCounted: boolean): void {
        for (const report of reports) {
            const kind = report.patch.kind;
            if (kind.type !== 'entity') continue;
            const owner = this.namespaces.get(kind.entity.namespace);
            if (!owner) continue;
            const applied = report.outcome === 'applied';
            if (kind.op.op === 'create') {
                const counted = createsCounted && owner.id === report.source;
                if (applied && !counted) owner.adjustEntities(1);
                if (!applied && counted) owner.adjustEntities(-1);
            } else if (kind.op.op === 'destroy' && applied) {
                owner.adjustEntities(-1);
            }
        }
    }

    private deliver(result: TransactionResult): void {
        const bySource = new Map<NamespaceId, PatchReport[]>();
        for (const report of result.reports) {
            const list = bySource.get(report.source);
            if (list) {
                list.push(report);
            } else {
                bySource.set(report.source, [report]);
            }
        }
        for (const [source, reports] of bySource) {
            this.namespaces.get(source)?.deliver({ transactionId: result.id, state: result.state, reports });
        }
    }

    private async releaseClosedNamespaces(): Promise<void> {
        for (const namespace of Array.from(this.namespaces.values())) {
            if (!namespace.closed || namespace.pending > 0) continue;
            if (this.store.releaseNamespace) {
                await this.store.releaseNamespace(namespace.id);
            }
            this.namespaces.delete(namespace.id);
            namespace.clearListeners();
            this.logger.debug(`Released namespace ${namespace.id} (${namespace.name})`);
            this.emit('namespaceReleased', namespace.id);
        }
    }

    // ========================================================================
    // Introspection
    // ========================================================================

    /**
     * Recent transaction results, oldest first, bounded by `historyLimit`.
     */
    public history(): readonly TransactionResult[] {
        return [...this.results];
    }

    public stats(): BusStats {
        return {
            ...this.counters,
            pending: this.pendingCount(),
            namespaces: this.namespaces.size,
        };
    }

    /**
     * Refuses further registrations and submissions. Queued patches can
     * still be processed by `runCycle()`.
     */
    public close(): void {
        if (this.closed) return;
        this.closed = true;
        this.logger.info('Patch bus closed');
    }
}
