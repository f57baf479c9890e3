#!/usr/bin/env node
import { createAvatarVideoService } from '../application/ServiceFactory';
import { toErrorResult } from '../domain/entities/GenerationResult';
import { parseAvatarArgs, parseAvatarJson } from '../presentation/cli/requestParsers';
import { processIO, runCli } from '../presentation/cli/runCli';
import { AVATAR_USAGE } from '../presentation/cli/usage';

async function main(): Promise<void> {
    const service = createAvatarVideoService();

    await runCli({
        usage: AVATAR_USAGE,
        fromJson: parseAvatarJson,
        fromArgs: parseAvatarArgs,
        execute: (request) => service.generate(request)
    }, processIO());
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.stdout.write(`${JSON.stringify(toErrorResult(error))}\n`);
});
