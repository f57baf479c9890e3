import { Readable } from 'stream';
import { SpeechRequest } from '../../../src/domain/entities/GenerationRequest';
import { SpeechResult } from '../../../src/domain/entities/GenerationResult';
import { parseJsonObject, readInput, readStream } from '../../../src/presentation/cli/inputReader';
import { parseSpeechArgs, parseSpeechJson } from '../../../src/presentation/cli/requestParsers';
import { CliCommand, CliIO, runCli } from '../../../src/presentation/cli/runCli';
import { TTS_USAGE } from '../../../src/presentation/cli/usage';

function makeIO(options: { stdinIsTTY: boolean; stdin?: string; argv?: string[] }): CliIO & { output: string[] } {
    const output: string[] = [];
    return {
        output,
        stdinIsTTY: options.stdinIsTTY,
        readStdin: jest.fn(async () => options.stdin ?? ''),
        argv: options.argv ?? [],
        writeStdout: (text: string) => {
            output.push(text);
        }
    };
}

describe('inputReader', () => {
    it('should parse piped stdin as JSON', async () => {
        const io = makeIO({ stdinIsTTY: false, stdin: '{"text":"hello"}', argv: ['ignored'] });

        await expect(readInput(io)).resolves.toEqual({ kind: 'json', data: { text: 'hello' } });
    });

    it('should fall back to arguments when piped stdin is empty', async () => {
        const io = makeIO({ stdinIsTTY: false, stdin: '\n', argv: ['hello'] });

        await expect(readInput(io)).resolves.toEqual({ kind: 'args', args: ['hello'] });
    });

    it('should not read an interactive stdin', async () => {
        const io = makeIO({ stdinIsTTY: true, argv: ['hello', 'out.mp3'] });

        await expect(readInput(io)).resolves.toEqual({ kind: 'args', args: ['hello', 'out.mp3'] });
        expect(io.readStdin).not.toHaveBeenCalled();
    });

    it('should ask for usage when there is no input at all', async () => {
        await expect(readInput(makeIO({ stdinIsTTY: true }))).resolves.toEqual({ kind: 'usage' });
    });

    it('should name the parse failure for malformed JSON', () => {
        expect(() => parseJsonObject('{"text": ')).toThrow(/^Invalid JSON input: /);
        expect(() => parseJsonObject('["hello"]')).toThrow('Invalid JSON input: expected an object');
        expect(() => parseJsonObject('null')).toThrow('Invalid JSON input: expected an object');
    });

    it('should collect a stream into a string', async () => {
        await expect(readStream(Readable.from(['{"text"', ':"hi"}']))).resolves.toBe('{"text":"hi"}');
    });
});

describe('runCli', () => {
    let execute: jest.Mock<Promise<SpeechResult>, [SpeechRequest]>;
    let command: CliCommand<SpeechRequest, SpeechResult>;

    beforeEach(() => {
        execute = jest.fn<Promise<SpeechResult>, [SpeechRequest]>().mockResolvedValue({
            status: 'success',
            audio_path: 'out.mp3',
            provider: 'google',
            voice: 'en-US-Neural2-F',
            speed: 1.0
        });
        command = { usage: TTS_USAGE, fromJson: parseSpeechJson, fromArgs: parseSpeechArgs, execute };
    });

    it('should print exactly one JSON line for a JSON request', async () => {
        const io = makeIO({ stdinIsTTY: false, stdin: '{"text":"hello","output_path":"out.mp3"}' });

        await runCli(command, io);

        expect(execute).toHaveBeenCalledWith({ text: 'hello', outputPath: 'out.mp3' });
        expect(io.output).toEqual([
            '{"status":"success","audio_path":"out.mp3","provider":"google","voice":"en-US-Neural2-F","speed":1}\n'
        ]);
    });

    it('should run positional requests', async () => {
        const io = makeIO({ stdinIsTTY: true, argv: ['hello'] });

        const result = await runCli(command, io);

        expect(execute).toHaveBeenCalledWith({ text: 'hello', outputPath: undefined });
        expect(result).toEqual(expect.objectContaining({ status: 'success' }));
    });

    it('should print an error result for malformed JSON instead of crashing', async () => {
        const io = makeIO({ stdinIsTTY: false, stdin: '{not json' });

        const result = await runCli(command, io);

        expect(execute).not.toHaveBeenCalled();
        expect(io.output).toHaveLength(1);
        const printed: unknown = JSON.parse(io.output[0]);
        expect(printed).toEqual(result);
        expect(result).toEqual({ status: 'error', message: expect.stringMatching(/^Invalid JSON input: /) });
    });

    it('should print an error result for wrongly typed fields', async () => {
        const io = makeIO({ stdinIsTTY: false, stdin: '{"text":5}' });

        await runCli(command, io);

        expect(io.output).toEqual(['{"status":"error","message":"Invalid value for text: expected a string"}\n']);
    });

    it('should print the service error result unchanged', async () => {
        execute.mockResolvedValueOnce({ status: 'error', message: 'No text provided' });
        const io = makeIO({ stdinIsTTY: false, stdin: '{}' });

        await runCli(command, io);

        expect(execute).toHaveBeenCalledWith({ text: '' });
        expect(io.output).toEqual(['{"status":"error","message":"No text provided"}\n']);
    });

    it('should print usage and no JSON when there is no input', async () => {
        const io = makeIO({ stdinIsTTY: true });

        const result = await runCli(command, io);

        expect(result).toBeNull();
        expect(io.output).toEqual([`${TTS_USAGE}\n`]);
        expect(execute).not.toHaveBeenCalled();
    });
});
