import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { Patches } from '../core/Patches';
import { ConfigurationError } from '../errors';
import { defineComponentSchema, type ComponentSchema, type FieldDefinition } from '../schema/SchemaBuilder';
import type { EntityRef, NamespaceId, PatchKind } from '../types';
import { LimitsSchema, PermissionsSchema } from '../validation';
import { Values, type Value } from '../value';

/**
 * Scenario files drive `patchbus replay`: component schemas, the namespaces
 * that produce patches, and the patches each cycle submits.
 *
 * ```yaml
 * schemas:
 *   Health:
 *     fields: { hp: { type: int, min: 0 }, max: int }
 * namespaces:
 *   - name: game
 *     limits: { maxPatchesPerCycle: 64 }
 * cycles:
 *   - patches:
 *       - { namespace: game, op: createEntity, entity: 1, archetype: Enemy }
 *       - { namespace: game, op: setComponent, entity: 1, component: Health, data: { hp: 10, max: 10 } }
 * ```
 *
 * An `entity` is a local id in the submitting namespace, or `"name:id"` for
 * another namespace's entity.
 */

const FieldTypeSchema = z.enum(['null', 'bool', 'int', 'float', 'string', 'vec3', 'array', 'object', 'any']);

const FieldDefinitionSchema = z.union([
    FieldTypeSchema,
    z.object({
        type: FieldTypeSchema,
        required: z.boolean().optional(),
        default: z.unknown().optional(),
        nullable: z.boolean().optional(),
        min: z.number().optional(),
        max: z.number().optional(),
        minLength: z.number().int().nonnegative().optional(),
        maxLength: z.number().int().nonnegative().optional(),
        enum: z.array(z.string()).optional(),
        items: FieldTypeSchema.optional(),
    }).strict(),
]);

const ComponentSchemaSchema = z.object({
    fields: z.record(FieldDefinitionSchema),
    allowUnknownFields: z.boolean().optional(),
}).strict();

const NamespaceSchema = z.object({
    name: z.string().min(1),
    permissions: PermissionsSchema.optional(),
    limits: LimitsSchema.optional(),
}).strict();

const EntitySchema = z.union([
    z.number().int().positive(),
    z.string().regex(/^[^:]+:\d+$/, 'expected "namespace:localId"'),
]);

const common = {
    namespace: z.string(),
    priority: z.number().int().optional(),
    timestamp: z.number().int().nonnegative().optional(),
};

const PatchStepSchema = z.discriminatedUnion('op', [
    z.object({
        ...common,
        op: z.literal('createEntity'),
        entity: EntitySchema,
        archetype: z.string().optional(),
        components: z.record(z.unknown()).optional(),
    }).strict(),
    z.object({ ...common, op: z.literal('destroyEntity'), entity: EntitySchema }).strict(),
    z.object({ ...common, op: z.literal('enableEntity'), entity: EntitySchema }).strict(),
    z.object({ ...common, op: z.literal('disableEntity'), entity: EntitySchema }).strict(),
    z.object({ ...common, op: z.literal('addTag'), entity: EntitySchema, tag: z.string() }).strict(),
    z.object({ ...common, op: z.literal('removeTag'), entity: EntitySchema, tag: z.string() }).strict(),
    z.object({ ...common, op: z.literal('setParent'), entity: EntitySchema, parent: EntitySchema.nullable() }).strict(),
    z.object({
        ...common,
        op: z.literal('setComponent'),
        entity: EntitySchema,
        component: z.string(),
        data: z.unknown(),
    }).strict(),
    z.object({
        ...common,
        op: z.literal('updateComponent'),
        entity: EntitySchema,
        component: z.string(),
        fields: z.record(z.unknown()),
    }).strict(),
    z.object({ ...common, op: z.literal('removeComponent'), entity: EntitySchema, component: z.string() }).strict(),
    z.object({
        ...common,
        op: z.literal('createLayer'),
        layer: z.string(),
        layerType: z.string(),
        layerPriority: z.number().int().optional(),
    }).strict(),
    z.object({ ...common, op: z.literal('destroyLayer'), layer: z.string() }).strict(),
    z.object({
        ...common,
        op: z.literal('loadAsset'),
        asset: z.string(),
        path: z.string(),
        assetType: z.string().optional(),
    }).strict(),
    z.object({ ...common, op: z.literal('unloadAsset'), asset: z.string() }).strict(),
    z.object({ ...common, op: z.literal('setMainCamera'), entity: EntitySchema }).strict(),
]);

export const ScenarioSchema = z.object({
    config: z.record(z.unknown()).optional(),
    schemas: z.record(ComponentSchemaSchema).default({}),
    namespaces: z.array(NamespaceSchema).min(1),
    cycles: z.array(z.object({
        patches: z.array(PatchStepSchema),
        /** Namespaces to unregister after this cycle's patches are submitted. */
        unregister: z.array(z.string()).optional(),
    }).strict()),
}).strict();

export type Scenario = z.output<typeof ScenarioSchema>;
export type PatchStep = z.output<typeof PatchStepSchema>;
type EntityId = z.output<typeof EntitySchema>;

/**
 * Parses and validates a scenario from YAML or JSON text.
 *
 * @throws {ConfigurationError} If the text does not parse or does not match the scenario format
 */
export function parseScenario(text: string, source = 'scenario'): Scenario {
    let raw: unknown;
    try {
        raw = YAML.parse(text);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`${source}: ${message}`);
    }
    const parsed = ScenarioSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigurationError(`${source}: ${issues}`);
    }
    const names = new Set<string>();
    for (const ns of parsed.data.namespaces) {
        if (names.has(ns.name)) throw new ConfigurationError(`${source}: duplicate namespace "${ns.name}"`);
        names.add(ns.name);
    }
    return parsed.data;
}

export function loadScenario(file: string): Scenario {
    const text = fs.readFileSync(file, 'utf8');
    return parseScenario(text, path.basename(file));
}

function toFieldDefinition(def: z.output<typeof FieldDefinitionSchema>): FieldDefinition {
    if (typeof def === 'string') return def;
    const { default: fallback, ...rest } = def;
    return fallback === undefined ? rest : { ...rest, default: Values.fromJS(fallback) };
}

export function buildSchemas(scenario: Scenario): Map<string, ComponentSchema> {
    const schemas = new Map<string, ComponentSchema>();
    for (const [name, def] of Object.entries(scenario.schemas)) {
        const fields: Record<string, FieldDefinition> = {};
        for (const [field, fieldDef] of Object.entries(def.fields)) {
            fields[field] = toFieldDefinition(fieldDef);
        }
        schemas.set(name, defineComponentSchema(name, fields, { allowUnknownFields: def.allowUnknownFields }));
    }
    return schemas;
}

function toObjectFields(record: Record<string, unknown>): Map<string, Value> {
    const fields = new Map<string, Value>();
    for (const [key, item] of Object.entries(record)) fields.set(key, Values.fromJS(item));
    return fields;
}

/**
 * Turns one scenario step into a patch kind, resolving entity ids through
 * `resolveNamespace`.
 *
 * @throws {ConfigurationError} If an entity names an unknown namespace
 */
export function stepToKind(
    step: PatchStep,
    source: NamespaceId,
    resolveNamespace: (name: string) => NamespaceId | undefined
): PatchKind {
    const ref = (id: EntityId): EntityRef => {
        if (typeof id === 'number') return { namespace: source, localId: id };
        const split = id.lastIndexOf(':');
        const name = id.slice(0, split);
        const namespace = resolveNamespace(name);
        if (namespace === undefined) throw new ConfigurationError(`Unknown namespace "${name}" in entity "${id}"`);
        return { namespace, localId: Number(id.slice(split + 1)) };
    };

    switch (step.op) {
        case 'createEntity':
            return Patches.createEntity(ref(step.entity), toObjectFields(step.components ?? {}), step.archetype);
        case 'destroyEntity':
            return Patches.destroyEntity(ref(step.entity));
        case 'enableEntity':
            return Patches.enableEntity(ref(step.entity));
        case 'disableEntity':
            return Patches.disableEntity(ref(step.entity));
        case 'addTag':
            return Patches.addTag(ref(step.entity), step.tag);
        case 'removeTag':
            return Patches.removeTag(ref(step.entity), step.tag);
        case 'setParent':
            return Patches.setEntityParent(ref(step.entity), step.parent === null ? null : ref(step.parent));
        case 'setComponent':
            return Patches.setComponent(ref(step.entity), step.component, Values.fromJS(step.data));
        case 'updateComponent':
            return Patches.updateComponent(ref(step.entity), step.component, toObjectFields(step.fields));
        case 'removeComponent':
            return Patches.removeComponent(ref(step.entity), step.component);
        case 'createLayer':
            return Patches.createLayer(step.layer, step.layerType, step.layerPriority);
        case 'destroyLayer':
            return Patches.destroyLayer(step.layer);
        case 'loadAsset':
            return Patches.loadAsset(step.asset, step.path, step.assetType);
        case 'unloadAsset':
            return Patches.unloadAsset(step.asset);
        case 'setMainCamera':
            return Patches.setMainCamera(ref(step.entity));
    }
}
