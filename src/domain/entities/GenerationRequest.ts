/**
 * Request records built once per invocation by the input adapter.
 * Optional fields fall back to the defaults in the loaded Config.
 */

export interface SpeechRequest {
    readonly text: string;
    readonly outputPath?: string;
    /** Google Cloud voice name, e.g. "en-US-Neural2-J" */
    readonly voice?: string;
    readonly speed?: number;
}

export interface TextToVideoRequest {
    readonly mode: 'text_to_video';
    readonly prompt: string;
    readonly outputPath?: string;
    readonly model?: string;
    readonly durationSeconds?: number;
    readonly fps?: number;
}

export interface ImageToVideoRequest {
    readonly mode: 'image_to_video';
    readonly imagePath: string;
    readonly prompt?: string;
    readonly outputPath?: string;
    readonly model?: string;
    readonly durationSeconds?: number;
}

export type VideoRequest = TextToVideoRequest | ImageToVideoRequest;

interface AvatarRequestBase {
    readonly outputPath?: string;
    readonly avatarId?: string;
    /** "newsroom", a hex color, or an image URL */
    readonly background?: string;
    readonly width?: number;
    readonly height?: number;
}

/**
 * HeyGen speaks the text itself with one of its own voices.
 */
export interface TextAvatarRequest extends AvatarRequestBase {
    readonly source: 'text';
    readonly text: string;
    readonly voiceId?: string;
    readonly speed?: number;
    /** Local path or http(s) URL of a background image; wins over `background` */
    readonly backgroundImage?: string;
    /** When set, HeyGen notifies this URL and the wrapper does not poll */
    readonly callbackUrl?: string;
}

/**
 * Lip-syncs the avatar to a pre-recorded audio file.
 */
export interface AudioAvatarRequest extends AvatarRequestBase {
    readonly source: 'audio';
    readonly audioPath: string;
}

/**
 * Synthesizes the text with Google Cloud TTS first, then lip-syncs to it.
 */
export interface SpeechAvatarRequest extends AvatarRequestBase {
    readonly source: 'speech';
    readonly text: string;
    readonly ttsVoice?: string;
    readonly speed?: number;
}

export type AvatarRequest = TextAvatarRequest | AudioAvatarRequest | SpeechAvatarRequest;
