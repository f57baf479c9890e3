import { ErrorResult, GenerationResult, toErrorResult } from '../../domain/entities/GenerationResult';
import { InputSource, readInput, readStream } from './inputReader';

/**
 * One wrapper: how to decode its input and what to run.
 */
export interface CliCommand<TRequest, TResult extends GenerationResult> {
    usage: string;
    fromJson(data: Record<string, unknown>): TRequest;
    fromArgs(args: string[]): TRequest;
    execute(request: TRequest): Promise<TResult>;
}

export interface CliIO extends InputSource {
    writeStdout: (text: string) => void;
}

/**
 * Reads the request, runs it, and prints exactly one JSON line to stdout.
 * Decoding errors become error results; usage is printed as plain text.
 *
 * @returns the printed result, or null when usage was shown
 */
export async function runCli<TRequest, TResult extends GenerationResult>(
    command: CliCommand<TRequest, TResult>,
    io: CliIO
): Promise<TResult | ErrorResult | null> {
    let result: TResult | ErrorResult;

    try {
        const input = await readInput(io);
        if (input.kind === 'usage') {
            io.writeStdout(`${command.usage}\n`);
            return null;
        }

        const request = input.kind === 'json' ? command.fromJson(input.data) : command.fromArgs(input.args);
        result = await command.execute(request);
    } catch (error) {
        result = toErrorResult(error);
    }

    io.writeStdout(`${JSON.stringify(result)}\n`);
    return result;
}

/**
 * IO bound to the current process.
 */
export function processIO(): CliIO {
    return {
        stdinIsTTY: Boolean(process.stdin.isTTY),
        readStdin: () => readStream(process.stdin),
        argv: process.argv.slice(2),
        writeStdout: (text) => {
            process.stdout.write(text);
        }
    };
}
