import { InvalidInputError } from '../../domain/errors';

/**
 * Typed readers for JSON request fields. `null` and absent fields both read
 * as undefined; a present value of the wrong type is an InvalidInputError.
 */

export function optionalString(data: Record<string, unknown>, key: string): string | undefined {
    const value = data[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new InvalidInputError(`Invalid value for ${key}: expected a string`);
    }
    return value;
}

export function optionalNumber(data: Record<string, unknown>, key: string): number | undefined {
    const value = data[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new InvalidInputError(`Invalid value for ${key}: expected a number`);
    }
    return value;
}

export function optionalBoolean(data: Record<string, unknown>, key: string): boolean | undefined {
    const value = data[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'boolean') {
        throw new InvalidInputError(`Invalid value for ${key}: expected true or false`);
    }
    return value;
}
