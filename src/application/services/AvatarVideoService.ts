import fs from 'fs';
import path from 'path';
import { Config, PollingConfig } from '../../config';
import {
    AudioAvatarRequest,
    AvatarRequest,
    SpeechAvatarRequest,
    TextAvatarRequest
} from '../../domain/entities/GenerationRequest';
import { AvatarResult, processing, success, toErrorResult } from '../../domain/entities/GenerationResult';
import { InvalidInputError, MissingFieldError, MissingResultError } from '../../domain/errors';
import { AvatarVideoStatus, IAvatarVideoClient } from '../../domain/ports/IAvatarVideoClient';
import { IMediaDownloader } from '../../domain/ports/IMediaDownloader';
import { BackgroundResolver } from '../../infrastructure/avatar/BackgroundResolver';
import { audioContentType } from '../../infrastructure/media/contentTypes';
import { PollOutcome, pollUntilTerminal } from '../../infrastructure/polling/PollUtils';
import { SpeechGenerationService } from './SpeechGenerationService';

/**
 * AvatarVideoService drives HeyGen talking-avatar jobs:
 * submit, poll to a terminal status, download.
 *
 * Entry points:
 * - generateAvatarVideoFromText: HeyGen voices the text (preferred)
 * - generateAvatarVideo: lip-sync to an uploaded audio file
 * - generateAvatarVideoFromSpeech: Google TTS first, then the audio path
 */
export class AvatarVideoService {
    constructor(
        private readonly createClient: () => IAvatarVideoClient,
        private readonly downloader: IMediaDownloader,
        private readonly config: Config,
        private readonly speech?: SpeechGenerationService
    ) { }

    async generate(request: AvatarRequest): Promise<AvatarResult> {
        switch (request.source) {
            case 'text':
                return this.generateAvatarVideoFromText(request);
            case 'audio':
                return this.generateAvatarVideo(request);
            case 'speech':
                return this.generateAvatarVideoFromSpeech(request);
        }
    }

    async generateAvatarVideo(request: AudioAvatarRequest): Promise<AvatarResult> {
        try {
            if (!request.audioPath) {
                throw new MissingFieldError('audio_path');
            }
            if (!fs.existsSync(request.audioPath)) {
                throw new InvalidInputError(`Audio file not found: ${request.audioPath}`);
            }

            const client = this.createClient();
            const background = new BackgroundResolver(client, this.config.avatar).resolveColor(request.background);

            const asset = await client.uploadAsset(request.audioPath, audioContentType(request.audioPath));
            const videoId = await client.submitVideo({
                avatarId: request.avatarId || this.config.avatar.avatarId,
                voice: { type: 'audio', audioUrl: asset.url },
                background,
                width: request.width ?? this.config.avatar.width,
                height: request.height ?? this.config.avatar.height
            });

            return await this.waitAndDownload(client, videoId, this.config.heygen.audioPolling, this.outputPath(request));
        } catch (error) {
            return this.fail(error);
        }
    }

    async generateAvatarVideoFromText(request: TextAvatarRequest): Promise<AvatarResult> {
        try {
            if (!request.text || !request.text.trim()) {
                throw new MissingFieldError('text');
            }

            const client = this.createClient();
            const background = await new BackgroundResolver(client, this.config.avatar).resolve({
                background: request.background,
                backgroundImage: request.backgroundImage
            });

            const videoId = await client.submitVideo({
                avatarId: request.avatarId || this.config.avatar.avatarId,
                voice: {
                    type: 'text',
                    inputText: request.text,
                    voiceId: request.voiceId || this.config.avatar.voiceId,
                    speed: request.speed ?? this.config.avatar.speed
                },
                background,
                width: request.width ?? this.config.avatar.width,
                height: request.height ?? this.config.avatar.height,
                callbackUrl: request.callbackUrl
            });

            if (request.callbackUrl) {
                console.error(`[Avatar] Callback mode: HeyGen will notify ${request.callbackUrl} for video ${videoId}`);
                return processing(videoId, request.callbackUrl);
            }

            return await this.waitAndDownload(client, videoId, this.config.heygen.textPolling, this.outputPath(request));
        } catch (error) {
            return this.fail(error);
        }
    }

    async generateAvatarVideoFromSpeech(request: SpeechAvatarRequest): Promise<AvatarResult> {
        if (!this.speech) {
            return this.fail(new InvalidInputError('Speech synthesis is not configured for avatar generation'));
        }
        if (!request.text || !request.text.trim()) {
            return this.fail(new MissingFieldError('text'));
        }

        const outputPath = this.outputPath(request);
        const audioPath = narrationPathFor(outputPath);
        const audio = await this.speech.generateAudio({
            text: request.text,
            outputPath: audioPath,
            voice: request.ttsVoice,
            speed: request.speed
        });
        if (audio.status !== 'success') {
            return audio;
        }

        return this.generateAvatarVideo({
            source: 'audio',
            audioPath: audio.audio_path,
            outputPath,
            avatarId: request.avatarId,
            background: request.background,
            width: request.width,
            height: request.height
        });
    }

    private async waitAndDownload(
        client: IAvatarVideoClient,
        videoId: string,
        polling: PollingConfig,
        outputPath: string
    ): Promise<AvatarResult> {
        console.error(`[Avatar] Waiting for video ${videoId} (every ${polling.intervalMs / 1000}s, up to ${polling.maxAttempts} checks)...`);

        const status = await pollUntilTerminal<AvatarVideoStatus, AvatarVideoStatus>({
            jobId: videoId,
            intervalMs: polling.intervalMs,
            maxAttempts: polling.maxAttempts,
            fetchStatus: () => client.getVideoStatus(videoId),
            classify: classifyAvatarStatus,
            checkUrl: client.checkUrl(videoId),
            label: 'HeyGen'
        });

        if (!status.videoUrl) {
            throw new MissingResultError('Video completed but no video_url was returned', JSON.stringify(status));
        }

        await this.downloader.download(status.videoUrl, outputPath, this.config.heygen.downloadTimeoutMs);
        console.error(`[Avatar] ✅ Video saved to ${outputPath}`);

        const artifact = {
            video_path: outputPath,
            video_url: status.videoUrl,
            video_id: videoId
        };
        return status.durationSeconds !== undefined
            ? success({ ...artifact, duration: status.durationSeconds })
            : success(artifact);
    }

    private outputPath(request: { outputPath?: string }): string {
        return request.outputPath || this.config.output.videoPath;
    }

    private fail(error: unknown): AvatarResult {
        console.error('[Avatar] ❌ Avatar video generation failed:', error instanceof Error ? error.message : error);
        return toErrorResult(error);
    }
}

export function classifyAvatarStatus(status: AvatarVideoStatus): PollOutcome<AvatarVideoStatus> {
    switch (status.status) {
        case 'completed':
            return { state: 'completed', value: status };
        case 'failed':
            return { state: 'failed', reason: status.errorMessage || 'Unknown error' };
        default:
            return { state: 'pending', status: status.status };
    }
}

/**
 * `out/news.mp4` -> `out/news.voice.mp3`
 */
export function narrationPathFor(videoPath: string): string {
    const parsed = path.parse(videoPath);
    return path.join(parsed.dir, `${parsed.name}.voice.mp3`);
}
