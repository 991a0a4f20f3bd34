/**
 * Error types for patchbus.
 *
 * Admission errors are thrown synchronously from `submit`. Validation
 * errors are returned by validators and reported per patch after a
 * cycle. Conflicts are plain records (see `Conflict` in types.ts).
 */

/**
 * Base class for all patchbus errors.
 */
export class PatchBusError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'PatchBusError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, PatchBusError);
        }
    }
}

/**
 * Thrown when the bus is closed, or the submitting namespace was unregistered.
 */
export class BusClosedError extends PatchBusError {
    constructor(message: string = 'Patch bus is closed') {
        super(message, 'BUS_CLOSED');
        this.name = 'BusClosedError';
    }
}

/**
 * Thrown when a handle submits a patch whose `source` is another namespace.
 */
export class ForgeryError extends PatchBusError {
    constructor(
        public readonly handleNamespace: number,
        public readonly claimedSource: number
    ) {
        super(
            `Namespace ${handleNamespace} cannot submit on behalf of namespace ${claimedSource}`,
            'FORGERY'
        );
        this.name = 'ForgeryError';
    }
}

/**
 * Thrown when a namespace lacks the permission a patch needs.
 */
export class PermissionDeniedError extends PatchBusError {
    constructor(message: string, public readonly namespace: number) {
        super(message, 'PERMISSION_DENIED');
        this.name = 'PermissionDeniedError';
    }
}

export type QuotaKind = 'patchesPerCycle' | 'payloadBytes' | 'entities';

/**
 * Thrown when admitting a patch would exceed a namespace's resource limits.
 * The patch is not queued.
 */
export class QuotaExceededError extends PatchBusError {
    constructor(
        public readonly namespace: number,
        public readonly quota: QuotaKind,
        public readonly limit: number
    ) {
        super(`Namespace ${namespace} exceeded its ${quota} quota of ${limit}`, 'QUOTA_EXCEEDED');
        this.name = 'QuotaExceededError';
    }
}

export type ValidationErrorKind =
    | 'MissingField'
    | 'TypeMismatch'
    | 'UnknownComponent'
    | 'UnknownField'
    | 'ConstraintViolated'
    | 'PayloadTooLarge';

/**
 * A payload that does not match its component schema, or that is too large.
 */
export class ValidationError extends PatchBusError {
    constructor(
        public readonly kind: ValidationErrorKind,
        message: string,
        public readonly component?: string,
        public readonly field?: string
    ) {
        super(message, 'VALIDATION_ERROR');
        this.name = 'ValidationError';
    }
}

/**
 * Thrown by a backing store that refuses a transaction. The store must
 * leave its state untouched when it throws.
 */
export class ApplyError extends PatchBusError {
    constructor(message: string, public readonly cause?: unknown) {
        super(message, 'APPLY_ERROR');
        this.name = 'ApplyError';
    }
}

/**
 * Thrown when configuration is invalid.
 */
export class ConfigurationError extends PatchBusError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when an encoded patch fails to decode or validate.
 */
export class MessageError extends PatchBusError {
    constructor(message: string) {
        super(message, 'MESSAGE_ERROR');
        this.name = 'MessageError';
    }
}

/**
 * Thrown on an illegal transaction or bus state change.
 */
export class InvalidStateTransitionError extends PatchBusError {
    constructor(from: string, to: string, action: string) {
        super(`Invalid state transition: ${from} -> ${to} (action: ${action})`, 'INVALID_STATE_TRANSITION');
        this.name = 'InvalidStateTransitionError';
    }
}

/**
 * Thrown when `drain()` is called while a cycle or a capture holds the token.
 */
export class CycleInProgressError extends PatchBusError {
    constructor(action: string) {
        super(`Cannot ${action} while an apply cycle or capture is in progress`, 'CYCLE_IN_PROGRESS');
        this.name = 'CycleInProgressError';
    }
}

export class SnapshotError extends PatchBusError {
    constructor(message: string) {
        super(message, 'SNAPSHOT_ERROR');
        this.name = 'SnapshotError';
    }
}
