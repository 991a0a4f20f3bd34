import { Values, type ObjectValue, type Value, type ValueType } from '../value';

/**
 * Field types a component schema can declare. `any` accepts every Value.
 */
export type FieldType = ValueType | 'any';

/**
 * A field definition in a component schema.
 */
export interface FieldSchema {
    readonly type: FieldType;
    readonly required: boolean;
    readonly default?: Value;
    /** Also accept Null. */
    readonly nullable?: boolean;
    /** Inclusive numeric bounds for int and float fields. */
    readonly min?: number;
    readonly max?: number;
    /** String length bounds. */
    readonly minLength?: number;
    readonly maxLength?: number;
    /** Allowed values for string fields. */
    readonly enum?: readonly string[];
    /** Element type for array fields. */
    readonly items?: FieldType;
}

export interface ComponentSchema {
    readonly name: string;
    readonly fields: ReadonlyMap<string, FieldSchema>;
    /** Accept fields the schema does not list. */
    readonly allowUnknownFields: boolean;
}

/**
 * Shorthand accepted by `defineComponentSchema`: a bare type is a required
 * field, an object is a full definition whose `required` defaults to
 * "has no default".
 */
export type FieldDefinition =
    | FieldType
    | (Omit<FieldSchema, 'required'> & { readonly required?: boolean });

export interface SchemaDefinition {
    [field: string]: FieldDefinition;
}

export interface DefineOptions {
    allowUnknownFields?: boolean;
}

/**
 * Defines a component schema.
 *
 * @example
 * ```ts
 * const Health = defineComponentSchema('Health', {
 *   current: { type: 'int', min: 0 },
 *   max: 'int',
 *   regen: { type: 'float', default: Values.float(0) },
 *   faction: { type: 'string', enum: ['player', 'enemy'], required: false },
 * });
 * validator.registerSchema('Health', Health);
 * ```
 */
export function defineComponentSchema(
    name: string,
    definition: SchemaDefinition,
    options: DefineOptions = {}
): ComponentSchema {
    const fields = new Map<string, FieldSchema>();
    for (const [field, def] of Object.entries(definition)) {
        if (typeof def === 'string') {
            fields.set(field, { type: def, required: true });
        } else {
            fields.set(field, { ...def, required: def.required ?? def.default === undefined });
        }
    }
    return {
        name,
        fields,
        allowUnknownFields: options.allowUnknownFields ?? false,
    };
}

/**
 * Returns `data` with every absent field that declares a default filled in.
 * Non-object data is returned unchanged.
 */
export function fillDefaults(schema: ComponentSchema, data: Value): Value {
    if (data.type !== 'object') return data;
    let filled: Map<string, Value> | null = null;
    for (const [field, fieldSchema] of schema.fields) {
        if (fieldSchema.default === undefined || data.fields.has(field)) continue;
        if (!filled) filled = new Map(data.fields);
        filled.set(field, fieldSchema.default);
    }
    return filled ? Values.object(filled) : data;
}

/**
 * The default object for a schema: every field with a default, nothing else.
 */
export function defaultObject(schema: ComponentSchema): ObjectValue {
    const fields = new Map<string, Value>();
    for (const [field, fieldSchema] of schema.fields) {
        if (fieldSchema.default !== undefined) fields.set(field, fieldSchema.default);
    }
    return Values.object(fields);
}
