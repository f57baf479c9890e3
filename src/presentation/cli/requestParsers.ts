import {
    AvatarRequest,
    SpeechRequest,
    VideoRequest
} from '../../domain/entities/GenerationRequest';
import { InvalidInputError, MissingFieldError } from '../../domain/errors';
import { optionalBoolean, optionalNumber, optionalString } from './fields';

// ── TTS ──

/**
 * `{"text", "output_path", "voice", "speed"}`
 */
export function parseSpeechJson(data: Record<string, unknown>): SpeechRequest {
    return {
        text: optionalString(data, 'text') ?? '',
        outputPath: optionalString(data, 'output_path'),
        voice: optionalString(data, 'voice'),
        speed: optionalNumber(data, 'speed')
    };
}

/**
 * `<text> [output.mp3]`
 */
export function parseSpeechArgs(args: string[]): SpeechRequest {
    return {
        text: args[0] ?? '',
        outputPath: args[1]
    };
}

// ── Video ──

/**
 * `{"mode": "text_to_video" | "image_to_video", "prompt", "image_path", "output_path", "model", "duration", "fps"}`
 */
export function parseVideoJson(data: Record<string, unknown>): VideoRequest {
    const mode = optionalString(data, 'mode') ?? 'text_to_video';
    const prompt = optionalString(data, 'prompt');
    const outputPath = optionalString(data, 'output_path');
    const model = optionalString(data, 'model');
    const durationSeconds = optionalNumber(data, 'duration');

    if (mode === 'text_to_video') {
        return {
            mode,
            prompt: prompt ?? '',
            outputPath,
            model,
            durationSeconds,
            fps: optionalNumber(data, 'fps')
        };
    }
    if (mode === 'image_to_video') {
        return {
            mode,
            imagePath: optionalString(data, 'image_path') ?? '',
            prompt,
            outputPath,
            model,
            durationSeconds
        };
    }
    throw new InvalidInputError(`Unknown mode: ${mode}`);
}

/**
 * `text <prompt> [output.mp4]` or `image <image_path> [prompt] [output.mp4]`
 */
export function parseVideoArgs(args: string[]): VideoRequest {
    const [mode, ...rest] = args;
    if (mode !== 'text' && mode !== 'image') {
        throw new InvalidInputError(`Unknown mode: ${mode}. Use 'text' or 'image'`);
    }
    if (rest.length === 0) {
        throw new MissingFieldError(mode === 'image' ? 'image_path' : 'prompt');
    }

    if (mode === 'text') {
        return { mode: 'text_to_video', prompt: rest[0], outputPath: rest[1] };
    }
    return { mode: 'image_to_video', imagePath: rest[0], prompt: rest[1], outputPath: rest[2] };
}

// ── Avatar ──

/**
 * Text wins over audio_path. `"tts": true` routes text through Google TTS
 * and the audio upload path instead of HeyGen's own voices.
 */
export function parseAvatarJson(data: Record<string, unknown>): AvatarRequest {
    const text = optionalString(data, 'text');
    const audioPath = optionalString(data, 'audio_path');
    const backgroundImage = optionalString(data, 'background_image');
    const common = {
        outputPath: optionalString(data, 'output_path'),
        avatarId: optionalString(data, 'avatar_id'),
        background: optionalString(data, 'background'),
        width: optionalNumber(data, 'width'),
        height: optionalNumber(data, 'height')
    };

    if (text && text.trim()) {
        if (optionalBoolean(data, 'tts')) {
            rejectBackgroundImage(backgroundImage);
            return {
                source: 'speech',
                text,
                ttsVoice: optionalString(data, 'tts_voice'),
                speed: optionalNumber(data, 'speed'),
                ...common
            };
        }
        return {
            source: 'text',
            text,
            voiceId: optionalString(data, 'voice_id'),
            speed: optionalNumber(data, 'speed'),
            backgroundImage,
            callbackUrl: optionalString(data, 'callback_url') ?? optionalString(data, 'webhook_url'),
            ...common
        };
    }

    if (audioPath) {
        rejectBackgroundImage(backgroundImage);
        return { source: 'audio', audioPath, ...common };
    }

    throw new MissingFieldError('text or audio_path');
}

/**
 * Image backgrounds are uploaded on the HeyGen-voice route only; the audio
 * and TTS routes take a color.
 */
function rejectBackgroundImage(backgroundImage: string | undefined): void {
    if (backgroundImage) {
        throw new InvalidInputError('background_image is only supported for text requests without tts');
    }
}

/**
 * `text <text> [output.mp4]`, `audio <audio_path> [output.mp4]` or `speech <text> [output.mp4]`
 */
export function parseAvatarArgs(args: string[]): AvatarRequest {
    const [mode, value, outputPath] = args;

    switch (mode) {
        case 'text':
            return { source: 'text', text: value ?? '', outputPath };
        case 'speech':
            return { source: 'speech', text: value ?? '', outputPath };
        case 'audio':
            return { source: 'audio', audioPath: value ?? '', outputPath };
        default:
            throw new InvalidInputError(`Unknown mode: ${mode}. Use 'text', 'audio' or 'speech'`);
    }
}
