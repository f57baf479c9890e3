#!/usr/bin/env node
import { createVideoGenerationService } from '../application/ServiceFactory';
import { toErrorResult } from '../domain/entities/GenerationResult';
import { parseVideoArgs, parseVideoJson } from '../presentation/cli/requestParsers';
import { processIO, runCli } from '../presentation/cli/runCli';
import { VIDEO_USAGE } from '../presentation/cli/usage';

async function main(): Promise<void> {
    const service = createVideoGenerationService();

    await runCli({
        usage: VIDEO_USAGE,
        fromJson: parseVideoJson,
        fromArgs: parseVideoArgs,
        execute: (request) => service.generate(request)
    }, processIO());
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.stdout.write(`${JSON.stringify(toErrorResult(error))}\n`);
});
