import type { Value, Vec3 } from './value';
import type { ValidationError, ApplyError } from './errors';

// ============================================================================
// Identity
// ============================================================================

export type NamespaceId = number;
export type TransactionId = number;
export type LayerId = string;
export type AssetId = string;

/**
 * Namespace-qualified entity identity. Two refs are equal iff both fields match.
 */
export interface EntityRef {
    readonly namespace: NamespaceId;
    readonly localId: number;
}

// ============================================================================
// Operations
// ============================================================================

export type EntityOp =
    | { readonly op: 'create'; readonly archetype?: string; readonly components: ReadonlyMap<string, Value> }
    | { readonly op: 'destroy' }
    | { readonly op: 'enable' }
    | { readonly op: 'disable' }
    | { readonly op: 'setParent'; readonly parent: EntityRef | null }
    | { readonly op: 'addTag'; readonly tag: string }
    | { readonly op: 'removeTag'; readonly tag: string };

export type ComponentOp =
    | { readonly op: 'set'; readonly data: Value }
    | { readonly op: 'update'; readonly fields: ReadonlyMap<string, Value> }
    | { readonly op: 'remove' };

export type LayerOp =
    | { readonly op: 'create'; readonly layerType: string; readonly priority: number }
    | { readonly op: 'update'; readonly priority?: number; readonly visible?: boolean; readonly blendMode?: string }
    | { readonly op: 'destroy' };

export type AssetOp =
    | { readonly op: 'load'; readonly path: string; readonly assetType?: string }
    | { readonly op: 'unload' }
    | { readonly op: 'update'; readonly data: Value };

export type HierarchyOp =
    | { readonly op: 'setParent'; readonly parent: EntityRef }
    | { readonly op: 'removeParent' }
    | { readonly op: 'setSiblingIndex'; readonly index: number }
    | { readonly op: 'setVisible'; readonly visible: boolean };

export type RGBA = readonly [number, number, number, number];

export type CameraOp =
    | { readonly op: 'setMain' }
    | { readonly op: 'clearMain' }
    | { readonly op: 'setActive'; readonly active: boolean }
    | { readonly op: 'setClipPlanes'; readonly near: number; readonly far: number }
    | { readonly op: 'setClearColor'; readonly color: RGBA }
    | { readonly op: 'setPriority'; readonly priority: number };

export type PatchKind =
    | { readonly type: 'entity'; readonly entity: EntityRef; readonly op: EntityOp }
    | { readonly type: 'component'; readonly entity: EntityRef; readonly component: string; readonly op: ComponentOp }
    | { readonly type: 'layer'; readonly layerId: LayerId; readonly op: LayerOp }
    | { readonly type: 'asset'; readonly assetId: AssetId; readonly op: AssetOp }
    | { readonly type: 'hierarchy'; readonly entity: EntityRef; readonly op: HierarchyOp }
    | { readonly type: 'camera'; readonly entity: EntityRef; readonly op: CameraOp };

export type PatchKindType = PatchKind['type'];

/**
 * A single declarative operation. Immutable once constructed.
 */
export interface Patch {
    readonly source: NamespaceId;
    readonly kind: PatchKind;
    /** i32; higher wins conflicts and applies first. */
    readonly priority: number;
    readonly timestamp: number;
}

/**
 * A patch admitted to the bus, stamped with its global arrival order.
 */
export interface QueuedPatch {
    readonly patch: Patch;
    readonly sequence: number;
}

export type PatchBatch = readonly QueuedPatch[];

// ============================================================================
// Transaction reporting
// ============================================================================

export type ConflictKind = 'WriteWrite' | 'CreateDestroy' | 'PermissionDenied';

/**
 * Transaction-scoped; never persisted.
 */
export interface Conflict {
    readonly kind: ConflictKind;
    /** What was contended, e.g. `component:1:4:Transform`. */
    readonly key: string;
    /** Sequence numbers of every involved patch, in arrival order. */
    readonly patches: readonly number[];
    /** Sequence of the deciding patch, or null when nothing won. */
    readonly winner: number | null;
    readonly dropped: readonly number[];
}

export type PatchOutcome =
    | 'applied'
    | 'superseded'
    | 'collapsed'
    | 'conflicted'
    | 'invalid'
    | 'orphaned'
    | 'aborted';

export interface PatchReport {
    readonly sequence: number;
    readonly source: NamespaceId;
    readonly patch: Patch;
    readonly outcome: PatchOutcome;
    /** For superseded patches, the sequence that absorbed this one. */
    readonly supersededBy?: number;
    readonly error?: ValidationError;
    readonly conflict?: Conflict;
}

export interface BatchStats {
    patchesIn: number;
    patchesOut: number;
    setsSuperseded: number;
    updatesMerged: number;
    /** Create/Destroy pairs reduced to nothing. */
    collapses: number;
    /** Patches removed by those collapses, the pairs included. */
    patchesCollapsed: number;
}

export interface ApplyReport {
    readonly applied: number;
    readonly version?: number;
}

export type TerminalState = 'COMMITTED' | 'ABORTED';

export interface TransactionResult {
    readonly id: TransactionId;
    readonly state: TerminalState;
    readonly reports: readonly PatchReport[];
    readonly conflicts: readonly Conflict[];
    readonly errors: readonly ValidationError[];
    readonly warnings: readonly ValidationError[];
    readonly applyError?: ApplyError;
    /** Why an aborted transaction aborted. */
    readonly abortReason?: string;
    readonly applyReport?: ApplyReport;
    readonly stats: BatchStats;
    readonly startedAt: number;
    readonly durationMs: number;
}

/**
 * The slice of a transaction result that concerns one namespace.
 */
export interface NamespaceReport {
    readonly transactionId: TransactionId;
    readonly state: TerminalState;
    readonly reports: readonly PatchReport[];
}

// ============================================================================
// World state
// ============================================================================

export interface EntitySnapshot {
    readonly ref: EntityRef;
    readonly archetype?: string;
    readonly enabled: boolean;
    readonly visible: boolean;
    readonly parent: EntityRef | null;
    readonly siblingIndex?: number;
    readonly tags: readonly string[];
}

export interface ComponentSnapshot {
    readonly entity: EntityRef;
    readonly component: string;
    readonly data: Value;
}

export interface LayerSnapshot {
    readonly id: LayerId;
    readonly layerType: string;
    readonly priority: number;
    readonly visible: boolean;
    readonly blendMode?: string;
}

export interface AssetSnapshot {
    readonly id: AssetId;
    readonly path: string;
    readonly assetType?: string;
    readonly data?: Value;
}

export interface CameraState {
    main: boolean;
    active: boolean;
    near?: number;
    far?: number;
    clearColor?: RGBA;
    priority: number;
}

/**
 * Committed state as a backing store reports it.
 */
export interface WorldState {
    readonly version: number;
    readonly entities: readonly EntitySnapshot[];
    readonly components: readonly ComponentSnapshot[];
    readonly layers: readonly LayerSnapshot[];
    readonly assets: readonly AssetSnapshot[];
}

export interface StateSnapshot extends WorldState {
    readonly id: string;
    readonly capturedAt: number;
}

// ============================================================================
// Backing store contract
// ============================================================================

/**
 * The ordered, conflict-free batch handed to a backing store.
 */
export interface AppliedTransaction {
    readonly id: TransactionId;
    readonly patches: readonly Patch[];
}

/**
 * The authoritative store behind a bus.
 *
 * `apply` must be all-or-nothing: either every patch takes effect, or it
 * throws (preferably an `ApplyError`) and leaves state untouched. It must
 * not keep references into the transaction after it returns.
 */
export interface BackingStore {
    apply(transaction: AppliedTransaction): Promise<ApplyReport> | ApplyReport;
    read(): Promise<WorldState> | WorldState;
    /** Cascading destroy of everything a namespace owns. */
    releaseNamespace?(namespace: NamespaceId): Promise<void> | void;
}

export type { Value, Vec3 };
