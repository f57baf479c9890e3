/**
 * TTSResult represents the output from a TTS synthesis call.
 */
export interface TTSResult {
    /** Encoded audio exactly as returned by the provider */
    audioContent: Buffer;
    /** Voice that was actually used */
    voice: string;
}

/**
 * TTSOptions for customizing synthesis.
 */
export interface TTSOptions {
    /** Provider voice name; the client default is used when absent */
    voice?: string;
    /** Speaking rate multiplier (1.0 = normal) */
    speed?: number;
}

/**
 * ITTSClient - Port for Text-to-Speech services.
 * Implementations: GoogleTTSClient
 */
export interface ITTSClient {
    /**
     * Synthesizes text to MP3 audio.
     */
    synthesize(text: string, options?: TTSOptions): Promise<TTSResult>;
}
