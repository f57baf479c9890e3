import fs from 'fs';
import { Config } from '../../config';
import { ImageToVideoRequest, TextToVideoRequest, VideoRequest } from '../../domain/entities/GenerationRequest';
import { ErrorResult, VideoResult, success, toErrorResult } from '../../domain/entities/GenerationResult';
import { InvalidInputError, MissingFieldError } from '../../domain/errors';
import { IMediaDownloader } from '../../domain/ports/IMediaDownloader';
import { IVideoGenerationClient } from '../../domain/ports/IVideoGenerationClient';

/** Longest news summary passed into a prompt; FAL rejects long prompts */
const NEWS_SUMMARY_MAX_LENGTH = 200;

/**
 * VideoGenerationService runs FAL text-to-video and image-to-video jobs and
 * downloads the result. The client is created lazily so that a missing
 * credential becomes an error result rather than a constructor throw.
 */
export class VideoGenerationService {
    constructor(
        private readonly createClient: () => IVideoGenerationClient,
        private readonly downloader: IMediaDownloader,
        private readonly config: Config
    ) { }

    async generate(request: VideoRequest): Promise<VideoResult> {
        switch (request.mode) {
            case 'text_to_video':
                return this.textToVideo(request);
            case 'image_to_video':
                return this.imageToVideo(request);
        }
    }

    async textToVideo(request: TextToVideoRequest): Promise<VideoResult> {
        const outputPath = request.outputPath || this.config.output.videoPath;
        const duration = request.durationSeconds ?? this.config.fal.durationSeconds;
        const fps = request.fps ?? this.config.fal.fps;

        try {
            if (!request.prompt || !request.prompt.trim()) {
                throw new MissingFieldError('prompt');
            }
            assertPositiveInteger('duration', duration);
            assertPositiveInteger('fps', fps);

            const client = this.createClient();
            console.error(`[Video] Generating video from prompt: ${request.prompt.substring(0, 50)}...`);
            const videoUrl = await client.generateVideo(request.model || this.config.fal.model, {
                prompt: request.prompt,
                numFrames: duration * fps,
                inferenceSteps: this.config.fal.inferenceSteps,
                guidanceScale: this.config.fal.guidanceScale
            });

            await this.downloader.download(videoUrl, outputPath, this.config.fal.downloadTimeoutMs);

            return success({ video_path: outputPath, video_url: videoUrl, duration, fps });
        } catch (error) {
            console.error('[Video] ❌ Text-to-video failed:', error instanceof Error ? error.message : error);
            const result: ErrorResult = toErrorResult(error);
            if (request.prompt) {
                result.prompt = request.prompt;
            }
            return result;
        }
    }

    async imageToVideo(request: ImageToVideoRequest): Promise<VideoResult> {
        const outputPath = request.outputPath || this.config.output.videoPath;
        const prompt = request.prompt || this.config.fal.imagePrompt;

        try {
            if (!request.imagePath) {
                throw new MissingFieldError('image_path');
            }
            if (!fs.existsSync(request.imagePath)) {
                throw new InvalidInputError(`Image file not found: ${request.imagePath}`);
            }
            if (request.durationSeconds !== undefined) {
                assertPositiveInteger('duration', request.durationSeconds);
            }

            const client = this.createClient();
            console.error(`[Video] Generating video from image: ${request.imagePath}`);
            const imageUrl = await client.uploadImage(request.imagePath);
            const videoUrl = await client.generateVideo(request.model || this.config.fal.model, {
                prompt,
                imageUrl,
                inferenceSteps: this.config.fal.inferenceSteps,
                guidanceScale: this.config.fal.guidanceScale
            });

            await this.downloader.download(videoUrl, outputPath, this.config.fal.downloadTimeoutMs);

            return success({ video_path: outputPath, video_url: videoUrl });
        } catch (error) {
            console.error('[Video] ❌ Image-to-video failed:', error instanceof Error ? error.message : error);
            return toErrorResult(error);
        }
    }

    /**
     * Renders a news summary as an anchor-read clip.
     */
    async generateNewsVideo(summary: string, outputPath: string): Promise<VideoResult> {
        return this.textToVideo({
            mode: 'text_to_video',
            prompt: buildNewsPrompt(summary),
            outputPath
        });
    }
}

export function buildNewsPrompt(summary: string): string {
    return 'Generate a video from the following news summary that is read by a female news anchor ' +
        `with brunette hair and dark tan skin: ${truncate(summary, NEWS_SUMMARY_MAX_LENGTH)}`;
}

export function truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) {
        return text;
    }
    return `${text.substring(0, maxLength - 3)}...`;
}

function assertPositiveInteger(field: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new InvalidInputError(`Invalid value for ${field}: expected a positive integer`);
    }
}
