import { z } from 'zod';
import { ConfigurationError } from './errors';

/**
 * Zod schemas for everything a caller configures.
 * Configuration is parsed once at the gate; the rest of the bus trusts it.
 */

export const PermissionsSchema = z.object({
    /** May write to entities owned by other namespaces. */
    crossNamespaceWrite: z.boolean().default(false),
    createEntities: z.boolean().default(true),
    destroyEntities: z.boolean().default(true),
    modifyComponents: z.boolean().default(true),
    modifyLayers: z.boolean().default(true),
    loadAssets: z.boolean().default(true),
    modifyHierarchy: z.boolean().default(true),
    controlCameras: z.boolean().default(true),
    /** When set, only these components may be written. */
    allowedComponents: z.array(z.string().min(1)).optional(),
    blockedComponents: z.array(z.string().min(1)).default([]),
}).strict();

const quota = z.number().int().nonnegative().default(0);

/**
 * Zero means unlimited.
 */
export const LimitsSchema = z.object({
    maxPatchesPerCycle: quota,
    maxEntities: quota,
    maxPayloadBytes: quota,
}).strict();

export const ValueLimitsSchema = z.object({
    maxDepth: z.number().int().positive().default(64),
    maxCollectionSize: z.number().int().positive().default(65536),
}).strict();

export const OptimizerOptionsSchema = z.object({
    collapseCreateDestroy: z.boolean().default(true),
    supersedeSets: z.boolean().default(true),
    mergeUpdates: z.boolean().default(true),
}).strict();

export const PatchBusConfigSchema = z.object({
    /** Abort the whole transaction on any conflict instead of dropping the losers. */
    rejectOnConflict: z.boolean().default(false),
    /** Abort the whole transaction on any invalid patch instead of dropping it. */
    rejectOnInvalid: z.boolean().default(true),
    validation: z.enum(['strict', 'permissive']).default('strict'),
    valueLimits: ValueLimitsSchema.default({}),
    optimizer: OptimizerOptionsSchema.default({}),
    maxSnapshots: z.number().int().positive().default(16),
    historyLimit: z.number().int().nonnegative().default(64),
    debug: z.boolean().default(false),
}).strict();

export type NamespacePermissions = z.output<typeof PermissionsSchema>;
export type NamespacePermissionsInput = z.input<typeof PermissionsSchema>;
export type ResourceLimits = z.output<typeof LimitsSchema>;
export type ResourceLimitsInput = z.input<typeof LimitsSchema>;
export type OptimizerOptions = z.output<typeof OptimizerOptionsSchema>;
export type ValidationMode = z.output<typeof PatchBusConfigSchema>['validation'];
export type PatchBusConfig = z.output<typeof PatchBusConfigSchema>;
export type PatchBusConfigInput = z.input<typeof PatchBusConfigSchema>;

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join(', ');
}

/**
 * @throws {ConfigurationError} If the input is not a valid bus configuration
 */
export function resolveConfig(input: unknown = {}): PatchBusConfig {
    const result = PatchBusConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigurationError(`Invalid bus configuration: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * @throws {ConfigurationError} If the input is not a valid permission set
 */
export function resolvePermissions(input: unknown = {}): NamespacePermissions {
    const result = PermissionsSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigurationError(`Invalid namespace permissions: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * @throws {ConfigurationError} If the input is not a valid set of limits
 */
export function resolveLimits(input: unknown = {}): ResourceLimits {
    const result = LimitsSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigurationError(`Invalid resource limits: ${formatIssues(result.error)}`);
    }
    return result.data;
}
