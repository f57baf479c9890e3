#!/usr/bin/env node
import { createSpeechGenerationService } from '../application/ServiceFactory';
import { toErrorResult } from '../domain/entities/GenerationResult';
import { parseSpeechArgs, parseSpeechJson } from '../presentation/cli/requestParsers';
import { processIO, runCli } from '../presentation/cli/runCli';
import { TTS_USAGE } from '../presentation/cli/usage';

async function main(): Promise<void> {
    const service = createSpeechGenerationService();

    await runCli({
        usage: TTS_USAGE,
        fromJson: parseSpeechJson,
        fromArgs: parseSpeechArgs,
        execute: (request) => service.generateAudio(request)
    }, processIO());
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.stdout.write(`${JSON.stringify(toErrorResult(error))}\n`);
});
