import superjson from 'superjson';

export const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export class PayloadTooLargeError extends SerializationError {
    constructor(message: string) {
        super(message);
        this.name = 'PayloadTooLargeError';
    }
}

/**
 * Encodes a payload for storage. Dates, Maps, Sets, BigInts and Errors survive
 * the trip; anything above the size cap is refused before it reaches the log.
 */
export function serialize(value: unknown, maxBytes: number = MAX_PAYLOAD_SIZE): string {
    if (value === undefined) return '';

    try {
        const stringified = superjson.stringify(value);
        const size = Buffer.byteLength(stringified);

        if (size > maxBytes) {
            throw new PayloadTooLargeError(
                `Payload size exceeds maximum limit of ${(maxBytes / 1024 / 1024).toFixed(2)}MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`
            );
        }

        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

// Detached copy through the storage encoding, so in-memory stores hand out
// exactly what a database round trip would.
export function clonePayload<T>(value: T): T | undefined {
    return deserialize<T>(serialize(value));
}
