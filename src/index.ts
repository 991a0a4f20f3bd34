/**
 * patchbus - transactional patch bus for shared world state
 *
 * Untrusted producers submit declarative patches through namespace handles;
 * each cycle the bus optimizes, validates and de-conflicts them and applies
 * the survivors to a backing store as one atomic transaction.
 *
 * @example
 * ```typescript
 * import { PatchBus, InMemoryStore, Patches, Values, Limits } from 'patchbus';
 *
 * const bus = new PatchBus(new InMemoryStore());
 * const spawner = bus.register({}, Limits.sandboxed(), 'spawner');
 * const enemy = spawner.allocateEntity();
 * spawner.submit(spawner.patch(Patches.createEntity(enemy, {}, 'Enemy')));
 * spawner.submit(spawner.patch(Patches.setComponent(enemy, 'Health', Values.fromJS({ hp: 30 }))));
 * await bus.runCycle();
 * ```
 *
 * @packageDocumentation
 */

export { PatchBus } from './core/PatchBus';
export type { BusStats, PatchBusEvents } from './core/PatchBus';
export { NamespaceHandle } from './core/NamespaceHandle';
export { Permissions, Limits, permissionViolation } from './core/Namespace';
export type { NamespaceUsage } from './core/Namespace';
export {
    Patches,
    createPatch,
    entityRef,
    entityKey,
    sameEntity,
    targetEntity,
    touchedEntities,
    patchPayloads,
    resourceKeys,
    describeKind,
    MAX_PRIORITY,
    MIN_PRIORITY,
} from './core/Patches';
export type { PatchOptions } from './core/Patches';
export { PatchValidator } from './core/PatchValidator';
export type { ComponentValidator, ValidationReport } from './core/PatchValidator';
export { BatchOptimizer } from './core/BatchOptimizer';
export type { OptimizedBatch, DroppedPatch } from './core/BatchOptimizer';
export { ConflictDetector, conflictKey, comparePrecedence } from './core/ConflictDetector';
export { Transaction, TransactionBuilder, TransactionState, applyOrder } from './core/Transaction';
export { SnapshotManager, diffStates, RESTORE_PRIORITY } from './core/SnapshotManager';
export type { SnapshotManagerOptions } from './core/SnapshotManager';
export { InMemoryStore } from './adapters/InMemoryStore';

// Values
export {
    Values,
    toJS,
    isValue,
    valueEquals,
    cloneValue,
    validateValue,
    valueTypeName,
    DEFAULT_VALUE_LIMITS,
} from './value';
export type { Value, ValueType, ObjectValue, ValueLimits, Vec3 } from './value';

// Schemas
export { defineComponentSchema, fillDefaults, defaultObject } from './schema/SchemaBuilder';
export type { ComponentSchema, FieldSchema, FieldType, SchemaDefinition } from './schema/SchemaBuilder';

// Wire format
export { encodeValue, decodeValue, encodePatch, decodePatch, payloadSize } from './codec';

// Configuration
export { resolveConfig, resolvePermissions, resolveLimits } from './validation';
export type {
    PatchBusConfig,
    PatchBusConfigInput,
    NamespacePermissions,
    NamespacePermissionsInput,
    ResourceLimits,
    ResourceLimitsInput,
    OptimizerOptions,
    ValidationMode,
} from './validation';

// Errors
export {
    PatchBusError,
    BusClosedError,
    ForgeryError,
    PermissionDeniedError,
    QuotaExceededError,
    ValidationError,
    ApplyError,
    ConfigurationError,
    MessageError,
    InvalidStateTransitionError,
    CycleInProgressError,
    SnapshotError,
} from './errors';
export type { QuotaKind, ValidationErrorKind } from './errors';

// Types
export type * from './types';

export { Logger, LogLevel, logger } from './utils/Logger';
