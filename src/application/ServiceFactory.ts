/**
 * Service Factory
 *
 * Wires each generation service to its real vendor client.
 *
 * @example
 * ```typescript
 * const avatar = createAvatarVideoService();
 * const result = await avatar.generateAvatarVideoFromText({
 *     source: 'text',
 *     text: 'Good evening, here is the news.',
 *     outputPath: 'news.mp4'
 * });
 * ```
 */

import { Config, getConfig } from '../config';
import { HeyGenAvatarClient } from '../infrastructure/avatar/HeyGenAvatarClient';
import { MediaDownloader } from '../infrastructure/storage/MediaDownloader';
import { GoogleTTSClient } from '../infrastructure/tts/GoogleTTSClient';
import { FalVideoClient } from '../infrastructure/video/FalVideoClient';
import { AvatarVideoService } from './services/AvatarVideoService';
import { SpeechGenerationService } from './services/SpeechGenerationService';
import { VideoGenerationService } from './services/VideoGenerationService';

export function createSpeechGenerationService(config: Config = getConfig()): SpeechGenerationService {
    return new SpeechGenerationService(new GoogleTTSClient(config.tts), config);
}

export function createVideoGenerationService(config: Config = getConfig()): VideoGenerationService {
    return new VideoGenerationService(
        () => new FalVideoClient(config.fal.apiKey),
        new MediaDownloader(),
        config
    );
}

export function createAvatarVideoService(config: Config = getConfig()): AvatarVideoService {
    return new AvatarVideoService(
        () => new HeyGenAvatarClient(config.heygen.apiKey, {
            baseUrl: config.heygen.baseUrl,
            uploadUrl: config.heygen.uploadUrl,
            appUrl: config.heygen.appUrl,
            timeoutMs: config.heygen.requestTimeoutMs
        }),
        new MediaDownloader(),
        config,
        createSpeechGenerationService(config)
    );
}
