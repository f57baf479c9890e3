export { Config, PollingConfig, AvatarDefaults, loadConfig, getConfig, resetConfig } from './config';

export * from './domain/errors';
export * from './domain/entities/GenerationRequest';
export * from './domain/entities/GenerationResult';

export {
    createSpeechGenerationService,
    createVideoGenerationService,
    createAvatarVideoService
} from './application/ServiceFactory';
export { SpeechGenerationService } from './application/services/SpeechGenerationService';
export { VideoGenerationService, buildNewsPrompt } from './application/services/VideoGenerationService';
export { AvatarVideoService } from './application/services/AvatarVideoService';

export { pollUntilTerminal, PollOptions, PollOutcome } from './infrastructure/polling/PollUtils';
export { HeyGenAvatarClient } from './infrastructure/avatar/HeyGenAvatarClient';
export { FalVideoClient } from './infrastructure/video/FalVideoClient';
export { GoogleTTSClient } from './infrastructure/tts/GoogleTTSClient';
