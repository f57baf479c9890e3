import axios from 'axios';
import { GenerationError, UpstreamError } from '../../domain/errors';

/**
 * Pulls a human-readable message out of a vendor error body.
 * Handles `{ error: { message } }`, `{ error: "..." }`, `{ message }` and `{ detail }`.
 */
export function extractVendorMessage(body: unknown): string | undefined {
    if (typeof body === 'string') {
        return body.trim() || undefined;
    }
    if (typeof body !== 'object' || body === null) {
        return undefined;
    }
    if ('error' in body) {
        const error = body.error;
        if (typeof error === 'string' && error) {
            return error;
        }
        if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
            return error.message;
        }
    }
    if ('message' in body && typeof body.message === 'string' && body.message) {
        return body.message;
    }
    if ('detail' in body && typeof body.detail === 'string' && body.detail) {
        return body.detail;
    }
    return undefined;
}

/**
 * JSON for the `details` field of an error result; falls back to String().
 */
export function stringifyDetails(value: unknown): string | undefined {
    if (value === undefined) {
        return undefined;
    }
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}

/**
 * Wraps an error raised while talking to `service`. Errors that are already
 * GenerationErrors pass through untouched.
 */
export function toUpstreamError(service: string, action: string, error: unknown): Error {
    if (error instanceof GenerationError) {
        return error;
    }
    if (axios.isAxiosError(error)) {
        const status: number | undefined = error.response?.status;
        const body: unknown = error.response?.data;
        const message = extractVendorMessage(body) ?? error.message;
        const statusPart = status !== undefined ? ` (${status})` : '';
        return new UpstreamError(service, `${service} ${action} failed${statusPart}: ${message}`, status, stringifyDetails(body));
    }
    if (error instanceof Error) {
        return error;
    }
    return new Error(String(error));
}
