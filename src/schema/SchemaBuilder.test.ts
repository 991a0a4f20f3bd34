import { describe, it, expect } from 'vitest';
import { defaultObject, defineComponentSchema, fillDefaults } from './SchemaBuilder';
import { Values, toJS } from '../value';

describe('SchemaBuilder', () => {
    describe('defineComponentSchema', () => {
        it('treats a bare type as a required field', () => {
            const schema = defineComponentSchema('Health', { hp: 'int' });
            expect(schema.fields.get('hp')).toEqual({ type: 'int', required: true });
            expect(schema.allowUnknownFields).toBe(false);
        });

        it('makes fields with a default optional unless told otherwise', () => {
            const schema = defineComponentSchema('Health', {
                regen: { type: 'float', default: Values.float(0) },
                faction: { type: 'string', required: false },
                shield: { type: 'int', default: Values.int(0), required: true },
                max: { type: 'int' },
            }, { allowUnknownFields: true });
            expect(schema.fields.get('regen')?.required).toBe(false);
            expect(schema.fields.get('faction')?.required).toBe(false);
            expect(schema.fields.get('shield')?.required).toBe(true);
            expect(schema.fields.get('max')?.required).toBe(true);
            expect(schema.allowUnknownFields).toBe(true);
        });
    });

    describe('fillDefaults', () => {
        const schema = defineComponentSchema('Health', {
            hp: 'int',
            regen: { type: 'float', default: Values.float(0.5) },
        });

        it('adds absent fields that declare a default', () => {
            const filled = fillDefaults(schema, Values.object({ hp: Values.int(3) }));
            expect(toJS(filled)).toEqual({ hp: 3, regen: 0.5 });
        });

        it('returns the same object when nothing is missing', () => {
            const data = Values.object({ hp: Values.int(3), regen: Values.float(1) });
            expect(fillDefaults(schema, data)).toBe(data);
        });

        it('leaves non-object data alone', () => {
            const data = Values.int(3);
            expect(fillDefaults(schema, data)).toBe(data);
        });
    });

    it('defaultObject holds only the defaulted fields', () => {
        const schema = defineComponentSchema('Light', {
            color: 'vec3',
            intensity: { type: 'float', default: Values.float(1) },
        });
        expect(toJS(defaultObject(schema))).toEqual({ intensity: 1 });
    });
});
