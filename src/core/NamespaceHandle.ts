import type { EntityRef, NamespaceId, NamespaceReport, Patch, PatchKind } from '../types';
import type { NamespacePermissions, ResourceLimits } from '../validation';
import type { Namespace, NamespaceUsage } from './Namespace';
import { createPatch, entityRef, type PatchOptions } from './Patches';

/**
 * The admission side of the bus, as a handle sees it.
 */
export interface PatchSink {
    admit(namespace: Namespace, patch: Patch): void;
    admitEncoded(namespace: Namespace, bytes: Uint8Array): void;
}

/**
 * A producer's capability to submit patches as one namespace.
 *
 * @example
 * ```typescript
 * const handle = bus.register(Permissions.standard(), Limits.sandboxed(), 'enemy-spawner');
 * const enemy = handle.allocateEntity();
 * handle.submit(handle.patch(Patches.createEntity(enemy, {}, 'Enemy')));
 * handle.onResult((report) => console.log(report.reports.map((r) => r.outcome)));
 * ```
 */
export class NamespaceHandle {
    constructor(
        private readonly sink: PatchSink,
        private readonly namespace: Namespace
    ) { }

    public get id(): NamespaceId {
        return this.namespace.id;
    }

    public get name(): string {
        return this.namespace.name;
    }

    public get permissions(): Readonly<NamespacePermissions> {
        return this.namespace.permissions;
    }

    public get limits(): Readonly<ResourceLimits> {
        return this.namespace.limits;
    }

    public get isClosed(): boolean {
        return this.namespace.closed;
    }

    /**
     * Admits a patch or throws.
     *
     * @throws {BusClosedError} If the bus is closed or this namespace was unregistered
     * @throws {ForgeryError} If `patch.source` is not this namespace
     * @throws {PermissionDeniedError} If this namespace may not make the change
     * @throws {QuotaExceededError} If admitting the patch would exceed a limit
     * @throws {ValidationError} PayloadTooLarge for oversized payloads
     */
    public submit(patch: Patch): void {
        this.sink.admit(this.namespace, patch);
    }

    /**
     * Decodes a wire patch and admits it under the same contract as `submit`.
     *
     * @throws {MessageError} If the bytes do not decode to a patch
     */
    public submitEncoded(bytes: Uint8Array): void {
        this.sink.admitEncoded(this.namespace, bytes);
    }

    /**
     * Builds a patch whose source is this namespace.
     */
    public patch(kind: PatchKind, options: PatchOptions = {}): Patch {
        return createPatch(this.namespace.id, kind, options);
    }

    public allocateEntity(): EntityRef {
        return this.namespace.allocateEntity();
    }

    public entity(localId: number): EntityRef {
        return entityRef(this.namespace.id, localId);
    }

    public usage(): NamespaceUsage {
        return this.namespace.usage();
    }

    /**
     * Subscribe to the outcome of this namespace's patches after each cycle.
     * @returns Unsubscribe function
     */
    public onResult(listener: (report: NamespaceReport) => void): () => void {
        return this.namespace.onResult(listener);
    }

    public get lastReport(): NamespaceReport | null {
        return this.namespace.lastReport;
    }
}
