import { InvalidInputError } from '../../domain/errors';

/**
 * Where a wrapper gets its parameters from.
 */
export interface InputSource {
    /** True when stdin is an interactive terminal */
    stdinIsTTY: boolean;
    readStdin: () => Promise<string>;
    /** Positional arguments, without the node binary and script path */
    argv: string[];
}

export type RawInput =
    | { kind: 'json'; data: Record<string, unknown> }
    | { kind: 'args'; args: string[] }
    | { kind: 'usage' };

/**
 * Piped stdin wins; otherwise positional arguments; otherwise usage.
 * Empty piped stdin (cron, CI) falls through to the arguments.
 *
 * @throws InvalidInputError when stdin is not a JSON object
 */
export async function readInput(source: InputSource): Promise<RawInput> {
    if (!source.stdinIsTTY) {
        const text = await source.readStdin();
        if (text.trim()) {
            return { kind: 'json', data: parseJsonObject(text) };
        }
    }

    if (source.argv.length > 0) {
        return { kind: 'args', args: source.argv };
    }

    return { kind: 'usage' };
}

export function parseJsonObject(text: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidInputError(`Invalid JSON input: ${reason}`);
    }

    if (!isRecord(parsed)) {
        throw new InvalidInputError('Invalid JSON input: expected an object');
    }
    return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString('utf8');
}
