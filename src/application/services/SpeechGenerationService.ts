import fs from 'fs';
import path from 'path';
import { Config } from '../../config';
import { SpeechRequest } from '../../domain/entities/GenerationRequest';
import { SpeechResult, success, toErrorResult } from '../../domain/entities/GenerationResult';
import { InvalidInputError, MissingFieldError } from '../../domain/errors';
import { ITTSClient } from '../../domain/ports/ITTSClient';

/** Speaking rates accepted by Google Cloud TTS */
const MIN_SPEED = 0.25;
const MAX_SPEED = 4.0;

/**
 * SpeechGenerationService turns a SpeechRequest into an MP3 file on disk.
 * Never throws: every failure is returned as an error result.
 */
export class SpeechGenerationService {
    constructor(
        private readonly tts: ITTSClient,
        private readonly config: Config
    ) { }

    async generateAudio(request: SpeechRequest): Promise<SpeechResult> {
        try {
            if (!request.text || !request.text.trim()) {
                throw new MissingFieldError('text');
            }

            const speed = request.speed ?? this.config.tts.speed;
            if (!Number.isFinite(speed) || speed < MIN_SPEED || speed > MAX_SPEED) {
                throw new InvalidInputError(`Invalid value for speed: expected a number between ${MIN_SPEED} and ${MAX_SPEED}`);
            }

            const outputPath = request.outputPath || this.config.output.audioPath;
            const result = await this.tts.synthesize(request.text, { voice: request.voice, speed });

            await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
            await fs.promises.writeFile(outputPath, result.audioContent);
            console.error(`[TTS] ✅ Audio saved to ${outputPath}`);

            return success({
                audio_path: outputPath,
                provider: 'google' as const,
                voice: result.voice,
                speed
            });
        } catch (error) {
            console.error('[TTS] ❌ Audio generation failed:', error instanceof Error ? error.message : error);
            return toErrorResult(error);
        }
    }

    /**
     * News narration preset: default professional voice at normal speed.
     */
    async generateNewsAudio(summary: string, outputPath: string): Promise<SpeechResult> {
        return this.generateAudio({
            text: summary,
            outputPath,
            voice: this.config.tts.voice,
            speed: 1.0
        });
    }
}
