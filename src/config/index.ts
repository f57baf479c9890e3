import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Polling budget for a remote job: one status request every `intervalMs`,
 * at most `maxAttempts` times.
 */
export interface PollingConfig {
    intervalMs: number;
    maxAttempts: number;
}

/**
 * Defaults for HeyGen avatar videos. Every wrapper reads these from here
 * instead of keeping its own copy.
 */
export interface AvatarDefaults {
    avatarId: string;
    voiceId: string;
    /** Named background used when a request gives none */
    background: string;
    /** Solid color behind the avatar for the newsroom background */
    backgroundColor: string;
    width: number;
    height: number;
    speed: number;
}

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // HeyGen
    heygen: {
        apiKey: string;
        baseUrl: string;
        uploadUrl: string;
        appUrl: string;
        requestTimeoutMs: number;
        downloadTimeoutMs: number;
        audioPolling: PollingConfig;
        textPolling: PollingConfig;
    };
    avatar: AvatarDefaults;

    // FAL AI
    fal: {
        apiKey: string;
        model: string;
        durationSeconds: number;
        fps: number;
        inferenceSteps: number;
        guidanceScale: number;
        imagePrompt: string;
        downloadTimeoutMs: number;
    };

    // Google Cloud TTS
    tts: {
        voice: string;
        languageCode: string;
        speed: number;
    };

    // Output locations used when a request gives none
    output: {
        audioPath: string;
        videoPath: string;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes left by some .env editors
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Loads configuration from environment variables.
 * Credentials default to empty strings; each service checks the one it needs.
 */
export function loadConfig(): Config {
    const pollIntervalMs = getEnvVarNumber('HEYGEN_POLL_INTERVAL_MS', 5000);

    return {
        heygen: {
            apiKey: getEnvVar('HEYGEN_API_KEY', ''),
            baseUrl: getEnvVar('HEYGEN_BASE_URL', 'https://api.heygen.com'),
            uploadUrl: getEnvVar('HEYGEN_UPLOAD_URL', 'https://upload.heygen.com/v1/asset'),
            appUrl: getEnvVar('HEYGEN_APP_URL', 'https://app.heygen.com/videos'),
            requestTimeoutMs: getEnvVarNumber('HEYGEN_REQUEST_TIMEOUT_MS', 30000),
            downloadTimeoutMs: getEnvVarNumber('HEYGEN_DOWNLOAD_TIMEOUT_MS', 120000),
            // 15 minutes for uploaded audio, 20 minutes for text (HeyGen also has to synthesize speech)
            audioPolling: {
                intervalMs: pollIntervalMs,
                maxAttempts: getEnvVarNumber('HEYGEN_MAX_POLL_ATTEMPTS', 180),
            },
            textPolling: {
                intervalMs: pollIntervalMs,
                maxAttempts: getEnvVarNumber('HEYGEN_TEXT_MAX_POLL_ATTEMPTS', 240),
            },
        },
        avatar: {
            avatarId: getEnvVar('HEYGEN_AVATAR_ID', 'Annie_expressive10_public'),
            voiceId: getEnvVar('HEYGEN_VOICE_ID', '1bd001e7e50f421d891986aad5158bc8'),
            background: 'newsroom',
            backgroundColor: getEnvVar('HEYGEN_BACKGROUND_COLOR', '#1a2332'),
            // Portrait 9:16 for Reels / Shorts / TikTok
            width: getEnvVarNumber('VIDEO_WIDTH', 720),
            height: getEnvVarNumber('VIDEO_HEIGHT', 1280),
            speed: 1.0,
        },

        fal: {
            apiKey: getEnvVar('FAL_KEY', ''),
            model: getEnvVar('FAL_MODEL', 'fal-ai/ltx-video'),
            durationSeconds: 5,
            fps: 24,
            inferenceSteps: 30,
            guidanceScale: 3.0,
            imagePrompt: 'animate this image',
            downloadTimeoutMs: 60000,
        },

        tts: {
            voice: getEnvVar('GOOGLE_TTS_VOICE', 'en-US-Neural2-F'),
            languageCode: getEnvVar('GOOGLE_TTS_LANGUAGE', 'en-US'),
            speed: 1.0,
        },

        output: {
            audioPath: 'output.mp3',
            videoPath: 'output.mp4',
        },
    };
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
