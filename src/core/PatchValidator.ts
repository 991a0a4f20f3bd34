import { ValidationError } from '../errors';
import type { ComponentSchema, FieldSchema, FieldType } from '../schema/SchemaBuilder';
import type { Patch } from '../types';
import { DEFAULT_VALUE_LIMITS, validateValue, valueTypeName, type Value, type ValueLimits } from '../value';
import type { ValidationMode } from '../validation';
import { patchPayloads } from './Patches';

/**
 * The narrow contract the bus needs from a schema checker.
 */
export interface ComponentValidator {
    validate(component: string, value: Value): ValidationError | null;
}

export interface ValidationReport {
    errors: ValidationError[];
    /** Problems that permissive mode records without rejecting. */
    warnings: ValidationError[];
}

export interface PatchValidatorOptions {
    mode?: ValidationMode;
    valueLimits?: ValueLimits;
}

const TYPE_NAMES: Record<FieldType, string> = {
    null: 'Null',
    bool: 'Bool',
    int: 'Int',
    float: 'Float',
    string: 'String',
    vec3: 'Vec3',
    array: 'Array',
    object: 'Object',
    any: 'Any',
};

function matchesType(type: FieldType, value: Value): boolean {
    if (type === 'any') return true;
    if (type === 'float' && value.type === 'int') return true;
    return value.type === type;
}

/**
 * Where a numeric value falls against a bound: negative below, zero equal,
 * positive above, null for non-numeric values. Ints compare exactly.
 */
function compareToBound(value: Value, bound: number): number | null {
    if (value.type === 'float') return value.value - bound;
    if (value.type !== 'int') return null;
    if (!Number.isFinite(bound)) return bound > 0 ? -1 : 1;
    if (Number.isInteger(bound)) {
        const b = BigInt(bound);
        return value.value < b ? -1 : value.value > b ? 1 : 0;
    }
    // A fractional bound sits strictly between two integers.
    return value.value <= BigInt(Math.floor(bound)) ? -1 : 1;
}

/**
 * Validates patch payloads against registered component schemas.
 *
 * Validation is pure: it never mutates a patch and never throws for bad
 * input. Re-registering a schema affects only later validations.
 */
export class PatchValidator implements ComponentValidator {
    private schemas = new Map<string, ComponentSchema>();
    private readonly mode: ValidationMode;
    private readonly valueLimits: ValueLimits;

    constructor(options: PatchValidatorOptions = {}) {
        this.mode = options.mode ?? 'strict';
        this.valueLimits = options.valueLimits ?? DEFAULT_VALUE_LIMITS;
    }

    public get validationMode(): ValidationMode {
        return this.mode;
    }

    public registerSchema(name: string, schema: ComponentSchema): void {
        this.schemas.set(name, schema);
    }

    public unregisterSchema(name: string): boolean {
        return this.schemas.delete(name);
    }

    public getSchema(name: string): ComponentSchema | undefined {
        return this.schemas.get(name);
    }

    public hasSchema(name: string): boolean {
        return this.schemas.has(name);
    }

    public schemaNames(): string[] {
        return Array.from(this.schemas.keys());
    }

    /**
     * Checks a full component value. Returns the first problem found.
     */
    public validate(component: string, value: Value): ValidationError | null {
        const errors = this.validateSet(component, value);
        return errors.length > 0 ? errors[0] : null;
    }

    /**
     * Checks `Set{data}`: data is an object, every required field is present,
     * every present field has the declared type and meets its constraints.
     */
    public validateSet(component: string, data: Value): ValidationError[] {
        const schema = this.schemas.get(component);
        if (!schema) return [this.unknownComponent(component)];

        if (data.type !== 'object') {
            return [new ValidationError(
                'TypeMismatch',
                `Component "${component}" expects Object data, got ${valueTypeName(data)}`,
                component
            )];
        }

        const errors: ValidationError[] = [];
        for (const [field, fieldSchema] of schema.fields) {
            const value = data.fields.get(field);
            if (value === undefined) {
                if (fieldSchema.required) {
                    errors.push(new ValidationError(
                        'MissingField',
                        `Component "${component}" is missing required field "${field}"`,
                        component,
                        field
                    ));
                }
                continue;
            }
            const error = this.checkField(component, field, fieldSchema, value);
            if (error) errors.push(error);
        }
        if (!schema.allowUnknownFields) {
            for (const field of data.fields.keys()) {
                if (!schema.fields.has(field)) errors.push(this.unknownField(component, field));
            }
        }
        return errors;
    }

    /**
     * Checks `Update{fields}`. Only the listed fields are checked; an update
     * is partial, so nothing is required.
     */
    public validateUpdate(component: string, fields: ReadonlyMap<string, Value>): ValidationError[] {
        const schema = this.schemas.get(component);
        if (!schema) return [this.unknownComponent(component)];

        const errors: ValidationError[] = [];
        for (const [field, value] of fields) {
            const fieldSchema = schema.fields.get(field);
            if (!fieldSchema) {
                if (!schema.allowUnknownFields) errors.push(this.unknownField(component, field));
                continue;
            }
            const error = this.checkField(component, field, fieldSchema, value);
            if (error) errors.push(error);
        }
        return errors;
    }

    /**
     * Validates every payload of a patch. In permissive mode an unregistered
     * component is reported as a warning instead of an error.
     */
    public validatePatch(patch: Patch): ValidationReport {
        const found: ValidationError[] = [];

        for (const payload of patchPayloads(patch.kind)) {
            const sizeError = validateValue(payload, this.valueLimits);
            if (sizeError) found.push(sizeError);
        }

        const kind = patch.kind;
        if (kind.type === 'component') {
            if (kind.op.op === 'set') {
                found.push(...this.validateSet(kind.component, kind.op.data));
            } else if (kind.op.op === 'update') {
                found.push(...this.validateUpdate(kind.component, kind.op.fields));
            } else if (!this.schemas.has(kind.component)) {
                found.push(this.unknownComponent(kind.component));
            }
        } else if (kind.type === 'entity' && kind.op.op === 'create') {
            for (const [component, data] of kind.op.components) {
                found.push(...this.validateSet(component, data));
            }
        }

        const report: ValidationReport = { errors: [], warnings: [] };
        for (const error of found) {
            if (this.mode === 'permissive' && error.kind === 'UnknownComponent') {
                report.warnings.push(error);
            } else {
                report.errors.push(error);
            }
        }
        return report;
    }

    private checkField(component: string, field: string, schema: FieldSchema, value: Value): ValidationError | null {
        if (value.type === 'null' && (schema.nullable || schema.type === 'null' || schema.type === 'any')) {
            return null;
        }
        if (!matchesType(schema.type, value)) {
            return new ValidationError(
                'TypeMismatch',
                `Field "${field}" of "${component}" expects ${TYPE_NAMES[schema.type]}, got ${valueTypeName(value)}`,
                component,
                field
            );
        }

        if (value.type === 'int' || value.type === 'float') {
            const shown = String(value.value);
            const vsMin = schema.min !== undefined ? compareToBound(value, schema.min) : null;
            if (vsMin !== null && vsMin < 0) {
                return this.violation(component, field, `${shown} is below the minimum of ${schema.min}`);
            }
            const vsMax = schema.max !== undefined ? compareToBound(value, schema.max) : null;
            if (vsMax !== null && vsMax > 0) {
                return this.violation(component, field, `${shown} is above the maximum of ${schema.max}`);
            }
        }

        if (value.type === 'string') {
            const length = value.value.length;
            if (schema.minLength !== undefined && length < schema.minLength) {
                return this.violation(component, field, `length ${length} is below the minimum of ${schema.minLength}`);
            }
            if (schema.maxLength !== undefined && length > schema.maxLength) {
                return this.violation(component, field, `length ${length} is above the maximum of ${schema.maxLength}`);
            }
            if (schema.enum && !schema.enum.includes(value.value)) {
                return this.violation(component, field, `"${value.value}" is not one of ${schema.enum.join(', ')}`);
            }
        }

        if (value.type === 'array' && schema.items !== undefined) {
            const itemType = schema.items;
            const index = value.items.findIndex((item) => !matchesType(itemType, item));
            if (index >= 0) {
                return new ValidationError(
                    'TypeMismatch',
                    `Field "${field}[${index}]" of "${component}" expects ${TYPE_NAMES[itemType]}, got ${valueTypeName(value.items[index])}`,
                    component,
                    field
                );
            }
        }
        return null;
    }

    private violation(component: string, field: string, detail: string): ValidationError {
        return new ValidationError('ConstraintViolated', `Field "${field}" of "${component}": ${detail}`, component, field);
    }

    private unknownComponent(component: string): ValidationError {
        return new ValidationError('UnknownComponent', `No schema registered for component "${component}"`, component);
    }

    private unknownField(component: string, field: string): ValidationError {
        return new ValidationError('UnknownField', `Component "${component}" has no field "${field}"`, component, field);
    }
}
