import { clonePayload, deserialize, PayloadTooLargeError, serialize, SerializationError } from '../src/utils/serialization';

describe('serialization', () => {
    test('round-trips primitives', () => {
        expect(deserialize(serialize(123))).toBe(123);
        expect(deserialize(serialize('hello'))).toBe('hello');
        expect(deserialize(serialize(false))).toBe(false);
        expect(deserialize(serialize(null))).toBe(null);
    });

    test('keeps Date, Map, Set and Error intact', () => {
        const date = new Date('2024-03-01T10:00:00.000Z');
        const input = {
            date,
            map: new Map([['a', 1], ['b', 2]]),
            set: new Set([1, 2, 3]),
            error: new Error('test error'),
        };
        const output = deserialize<typeof input>(serialize(input));

        expect(output?.date).toBeInstanceOf(Date);
        expect(output?.date.toISOString()).toBe('2024-03-01T10:00:00.000Z');
        expect(output?.map.get('b')).toBe(2);
        expect(output?.set.has(3)).toBe(true);
        expect(output?.error).toBeInstanceOf(Error);
        expect(output?.error.message).toBe('test error');
    });

    test('refuses payloads above the 1MB default limit', () => {
        const large = 'a'.repeat(1024 * 1024 + 1);
        expect(() => serialize(large)).toThrow(PayloadTooLargeError);
        expect(() => serialize(large)).toThrow(SerializationError);
        expect(() => serialize(large)).toThrow(/Payload size exceeds maximum limit/);
    });

    test('honours a custom limit', () => {
        expect(() => serialize('abcdef', 4)).toThrow(SerializationError);
        expect(serialize('abcdef', 1024)).toBe('{"json":"abcdef"}');
    });

    test('maps undefined to the empty string and back', () => {
        expect(serialize(undefined)).toBe('');
        expect(deserialize('')).toBeUndefined();
        expect(deserialize(null)).toBeUndefined();
    });

    test('rejects text that is not superjson', () => {
        expect(() => deserialize('{not json')).toThrow(SerializationError);
    });

    test('clonePayload returns a detached copy', () => {
        const original = { nested: { count: 1 } };
        const copy = clonePayload(original);
        expect(copy).toEqual(original);
        expect(copy).not.toBe(original);
        if (copy) copy.nested.count = 2;
        expect(original.nested.count).toBe(1);
    });
});
