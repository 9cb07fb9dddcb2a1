import { describe, it, expect, expectTypeOf } from 'vitest';
import { z } from 'zod';
import { t } from '../../src/schema/builders';
import {
    type Infer,
    PointerType,
    TaggedField,
    unwrapPointers
} from '../../src/schema/descriptors';
import { JsonValue } from '../../src/env/json';

class Counter {
    count = 0;

    unmarshalEnv(value: string): void {
        this.count = Number(value);
    }
}

describe('type names', () => {
    it('names primitives after their kind', () => {
        expect(t.uint16().typeName).toBe('uint16');
        expect(t.bool().typeName).toBe('bool');
    });

    it('names composite types from their parts', () => {
        expect(t.bytes().typeName).toBe('[]uint8');
        expect(t.runes().typeName).toBe('[]int32');
        expect(t.map(t.float64()).typeName).toBe('map[string]float64');
        expect(t.pointer(t.pointer(t.string())).typeName).toBe('**string');
    });

    it('uses given names for records, opaque types and unmarshalers', () => {
        expect(t.record({}).typeName).toBe('record');
        expect(t.record({}, { name: 'Settings' }).typeName).toBe('Settings');
        expect(t.opaque('chan').typeName).toBe('chan');
        expect(t.unmarshaler(() => new Counter()).typeName).toBe('unmarshaler');
        expect(t.unmarshaler(() => new Counter(), 'Counter').typeName).toBe('Counter');
        expect(t.json(z.string()).typeName).toBe('json');
    });
});

describe('zero values', () => {
    it('builds nested zero records', () => {
        const Settings = t.record({
            url: t.string(),
            debug: t.bool(),
            port: t.uint16(),
            big: t.int64(),
            ratio: t.float64(),
            bytes: t.bytes(),
            labels: t.map(t.string()),
            deleteUser: t.pointer(t.bool()),
            callback: t.opaque<() => void>('func'),
            auth: t.record({ signingKey: t.string(), ttlSeconds: t.uint().env('JWT_TTL') }),
        });

        expect(Settings.zero()).toEqual({
            url: '',
            debug: false,
            port: 0,
            big: 0n,
            ratio: 0,
            bytes: [],
            labels: {},
            deleteUser: undefined,
            callback: undefined,
            auth: { signingKey: '', ttlSeconds: 0 },
        });
    });

    it('creates a fresh unmarshaler instance per zero value', () => {
        const type = t.unmarshaler(() => new Counter());
        const first = type.zero();
        const second = type.zero();

        expect(first).toBeInstanceOf(Counter);
        expect(first).not.toBe(second);
    });

    it('leaves pointers to unmarshalers unset', () => {
        expect(t.pointer(t.unmarshaler(() => new Counter())).zero()).toBeUndefined();
    });

    it('returns a new zero record each time', () => {
        const Settings = t.record({ auth: t.record({ key: t.string() }) });
        expect(Settings.zero().auth).not.toBe(Settings.zero().auth);
    });
});

describe('RecordType.fields', () => {
    it('lists fields in declaration order with their tags', () => {
        const Settings = t.record({
            url: t.string(),
            name: t.string().env(',required'),
            _internal: t.string(),
        });

        expect(Settings.fields().map(field => [field.identifier, field.tag, field.exported])).toEqual([
            ['url', '', true],
            ['name', ',required', true],
            ['_internal', '', false],
        ]);
    });

    it('unwraps tagged fields to their type', () => {
        const port = t.uint16();
        const Settings = t.record({ port: port.env('HTTP_PORT') });

        expect(Settings.fields()[0].type).toBe(port);
    });
});

describe('env', () => {
    it('pairs the type with its tag', () => {
        const type = t.string();
        const field = type.env('AUTH');

        expect(field).toBeInstanceOf(TaggedField);
        expect(field.type).toBe(type);
        expect(field.tag).toBe('AUTH');
    });
});

describe('unwrapPointers', () => {
    it('removes every pointer level', () => {
        const inner = t.int();
        expect(unwrapPointers(t.pointer(t.pointer(inner)))).toBe(inner);
        expect(unwrapPointers(inner)).toBe(inner);
        expect(t.pointer(inner)).toBeInstanceOf(PointerType);
    });
});

describe('Infer', () => {
    it('derives the static type of a record', () => {
        const Settings = t.record({
            url: t.string(),
            port: t.uint16().env(',default=8080'),
            big: t.uint64(),
            deleteUser: t.pointer(t.bool()),
            ids: t.json(z.array(z.string())),
            auth: t.record({ ttlSeconds: t.uint() }),
        });
        type Settings = Infer<typeof Settings>;

        expectTypeOf<Settings['url']>().toEqualTypeOf<string>();
        expectTypeOf<Settings['port']>().toEqualTypeOf<number>();
        expectTypeOf<Settings['big']>().toEqualTypeOf<bigint>();
        expectTypeOf<Settings['deleteUser']>().toEqualTypeOf<boolean | undefined>();
        expectTypeOf<Settings['ids']>().toEqualTypeOf<JsonValue<string[]>>();
        expectTypeOf<Settings['auth']['ttlSeconds']>().toEqualTypeOf<number>();
    });
});
