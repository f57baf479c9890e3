import { ITTSClient, TTSOptions, TTSResult } from '../../domain/ports/ITTSClient';
import { DependencyError, MissingFieldError, MissingResultError } from '../../domain/errors';

/**
 * The slice of the Cloud TTS request this client sends.
 */
export interface SynthesizeSpeechRequest {
    input: { text: string };
    voice: { languageCode: string; name: string };
    audioConfig: { audioEncoding: 'MP3'; speakingRate: number };
}

export interface SynthesizeSpeechResponse {
    audioContent?: Uint8Array | string | null;
}

/**
 * Minimal surface of TextToSpeechClient, so the SDK can be loaded lazily
 * and replaced in tests.
 */
export interface SpeechBackend {
    synthesizeSpeech(request: SynthesizeSpeechRequest): Promise<SynthesizeSpeechResponse>;
}

export interface GoogleTTSDefaults {
    voice: string;
    languageCode: string;
}

/**
 * Loads @google-cloud/text-to-speech on first use. Credentials come from
 * GOOGLE_APPLICATION_CREDENTIALS or the gcloud environment.
 */
export async function loadGoogleSpeechBackend(): Promise<SpeechBackend> {
    let textToSpeech: typeof import('@google-cloud/text-to-speech');
    try {
        textToSpeech = await import('@google-cloud/text-to-speech');
    } catch (error) {
        if (isModuleNotFound(error)) {
            throw new DependencyError('Google Cloud TTS library not installed. Run: npm install @google-cloud/text-to-speech');
        }
        throw error;
    }

    const client = new textToSpeech.TextToSpeechClient();
    return {
        async synthesizeSpeech(request) {
            const [response] = await client.synthesizeSpeech(request);
            return response;
        }
    };
}

export function isModuleNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'MODULE_NOT_FOUND';
}

/**
 * Google Cloud Text-to-Speech client. One synchronous request per call,
 * MP3 bytes come back in the response body.
 */
export class GoogleTTSClient implements ITTSClient {
    private backend: SpeechBackend | null = null;

    constructor(
        private readonly defaults: GoogleTTSDefaults,
        private readonly loadBackend: () => Promise<SpeechBackend> = loadGoogleSpeechBackend
    ) { }

    async synthesize(text: string, options?: TTSOptions): Promise<TTSResult> {
        if (!text || !text.trim()) {
            throw new MissingFieldError('text');
        }

        const voice = options?.voice || this.defaults.voice;
        const speed = options?.speed ?? 1.0;
        const backend = await this.getBackend();

        console.error(`[GoogleTTS] Generating audio (voice: ${voice}, speed: ${speed})...`);
        const response = await backend.synthesizeSpeech({
            input: { text },
            voice: { languageCode: this.defaults.languageCode, name: voice },
            audioConfig: { audioEncoding: 'MP3', speakingRate: speed }
        });

        const content = response.audioContent;
        if (!content || content.length === 0) {
            throw new MissingResultError('No audio content received from Google Cloud TTS');
        }

        // The REST fallback returns base64 text instead of bytes
        const audioContent = typeof content === 'string' ? Buffer.from(content, 'base64') : Buffer.from(content);
        return { audioContent, voice };
    }

    private async getBackend(): Promise<SpeechBackend> {
        if (!this.backend) {
            this.backend = await this.loadBackend();
        }
        return this.backend;
    }
}
