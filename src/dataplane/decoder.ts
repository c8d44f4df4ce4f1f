import { DecodeError } from './errors';

export const API_VERSIONS = ['v2', 'v3'] as const;
export type ApiVersion = (typeof API_VERSIONS)[number];

/**
 * v3 answers with bare arrays/objects; v2 wraps every payload in `{"data": ...}`.
 * The shape is chosen once from the configured version, never guessed per response.
 */
export type ResponseShape = 'bare' | 'wrapped';

const SHAPES: Record<ApiVersion, ResponseShape> = {
    v2: 'wrapped',
    v3: 'bare',
};

export function shapeForVersion(version: ApiVersion): ResponseShape {
    return SHAPES[version];
}

export type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

function unwrap(payload: unknown): unknown {
    if (!isObject(payload) || !('data' in payload)) {
        throw new DecodeError(`expected a {"data": ...} envelope, got ${describe(payload)}`);
    }
    return payload.data;
}

export function decodeCollection(shape: ResponseShape, payload: unknown): JsonObject[] {
    const inner = shape === 'wrapped' ? unwrap(payload) : payload;
    // v2 answers {"data": null} for some empty scopes
    if (shape === 'wrapped' && inner === null) return [];
    if (!Array.isArray(inner)) {
        throw new DecodeError(`expected a ${shape} collection, got ${describe(inner)}`);
    }
    return inner.map((item, index) => {
        if (!isObject(item)) {
            throw new DecodeError(`collection item ${index} is ${describe(item)}, expected object`);
        }
        return item;
    });
}

export function decodeEntity(shape: ResponseShape, payload: unknown): JsonObject {
    const inner = shape === 'wrapped' ? unwrap(payload) : payload;
    if (!isObject(inner)) {
        throw new DecodeError(`expected a ${shape} object, got ${describe(inner)}`);
    }
    return inner;
}
