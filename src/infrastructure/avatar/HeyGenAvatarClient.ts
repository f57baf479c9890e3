/**
 * HeyGen Avatar Client
 *
 * Implements IAvatarVideoClient using the HeyGen API:
 * asset upload (v1), video generation (v2) and video status (v1).
 */

import axios from 'axios';
import fs from 'fs';
import path from 'path';
import {
    IAvatarVideoClient,
    AvatarVideoJob,
    AvatarVideoStatus,
    AvatarBackground,
    AvatarVoice,
    UploadedAsset
} from '../../domain/ports/IAvatarVideoClient';
import { MissingCredentialError, MissingResultError } from '../../domain/errors';
import { extractVendorMessage, stringifyDetails, toUpstreamError } from '../http/upstreamErrors';

/** Every HeyGen response is wrapped in this envelope. */
interface HeyGenEnvelope<T> {
    code?: number;
    data?: T | null;
    error?: unknown;
    message?: string;
}

interface HeyGenAssetData {
    id?: string;
    url?: string;
}

interface HeyGenGenerateData {
    video_id?: string;
}

interface HeyGenStatusData {
    status?: string;
    video_url?: string | null;
    duration?: number | null;
    error?: unknown;
}

type HeyGenVoicePayload =
    | { type: 'audio'; audio_url: string }
    | { type: 'text'; input_text: string; voice_id: string; speed: number };

type HeyGenBackgroundPayload =
    | { type: 'color'; value: string }
    | { type: 'image'; url: string }
    | { type: 'image'; image_asset_id: string };

export interface HeyGenVideoPayload {
    video_inputs: Array<{
        character: { type: 'avatar'; avatar_id: string; avatar_style: 'normal' };
        voice: HeyGenVoicePayload;
        background: HeyGenBackgroundPayload;
    }>;
    dimension: { width: number; height: number };
    callback_url?: string;
}

export interface HeyGenClientOptions {
    baseUrl?: string;
    uploadUrl?: string;
    appUrl?: string;
    /** Per-request timeout for API calls (uploads included) */
    timeoutMs?: number;
}

export class HeyGenAvatarClient implements IAvatarVideoClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly uploadUrl: string;
    private readonly appUrl: string;
    private readonly timeoutMs: number;

    constructor(apiKey: string, options: HeyGenClientOptions = {}) {
        if (!apiKey) {
            throw new MissingCredentialError('HEYGEN_API_KEY');
        }
        this.apiKey = apiKey;
        this.baseUrl = trimSlash(options.baseUrl ?? 'https://api.heygen.com');
        this.uploadUrl = options.uploadUrl ?? 'https://upload.heygen.com/v1/asset';
        this.appUrl = trimSlash(options.appUrl ?? 'https://app.heygen.com/videos');
        this.timeoutMs = options.timeoutMs ?? 30000;
    }

    private get headers() {
        return {
            'X-Api-Key': this.apiKey,
            'Content-Type': 'application/json'
        };
    }

    async uploadAsset(filePath: string, contentType: string): Promise<UploadedAsset> {
        const data = await fs.promises.readFile(filePath);
        console.error(`[HeyGen] Uploading ${path.basename(filePath)} as ${contentType} (${(data.length / 1024).toFixed(1)} KB)...`);

        try {
            const response = await axios.post<HeyGenEnvelope<HeyGenAssetData>>(this.uploadUrl, data, {
                headers: {
                    'X-Api-Key': this.apiKey,
                    'Content-Type': contentType
                },
                timeout: this.timeoutMs,
                maxBodyLength: Infinity
            });

            const asset = response.data.data;
            if (!asset?.id || !asset.url) {
                throw new MissingResultError('HeyGen asset upload did not return an asset URL', stringifyDetails(response.data));
            }

            console.error(`[HeyGen] Asset uploaded: ${asset.id}`);
            return { id: asset.id, url: asset.url };
        } catch (error) {
            throw toUpstreamError('HeyGen', 'asset upload', error);
        }
    }

    async submitVideo(job: AvatarVideoJob): Promise<string> {
        console.error(`[HeyGen] Starting video generation for avatar: ${job.avatarId}`);

        try {
            const response = await axios.post<HeyGenEnvelope<HeyGenGenerateData>>(
                `${this.baseUrl}/v2/video/generate`,
                buildVideoPayload(job),
                { headers: this.headers, timeout: this.timeoutMs }
            );

            const videoId = response.data.data?.video_id;
            if (!videoId) {
                const reason = extractVendorMessage(response.data) ?? 'no video_id in response';
                throw new MissingResultError(`HeyGen did not accept the video job: ${reason}`, stringifyDetails(response.data));
            }

            console.error(`[HeyGen] Job submitted successfully. Video ID: ${videoId}`);
            return videoId;
        } catch (error) {
            throw toUpstreamError('HeyGen', 'video submission', error);
        }
    }

    async getVideoStatus(videoId: string): Promise<AvatarVideoStatus> {
        try {
            const response = await axios.get<HeyGenEnvelope<HeyGenStatusData>>(`${this.baseUrl}/v1/video_status.get`, {
                headers: this.headers,
                params: { video_id: videoId },
                timeout: this.timeoutMs
            });

            const data = response.data.data ?? {};
            return {
                status: data.status ?? 'unknown',
                videoUrl: data.video_url ?? undefined,
                durationSeconds: data.duration ?? undefined,
                errorMessage: extractVendorMessage({ error: data.error })
            };
        } catch (error) {
            throw toUpstreamError('HeyGen', 'status check', error);
        }
    }

    checkUrl(videoId: string): string {
        return `${this.appUrl}/${videoId}`;
    }
}

/**
 * Maps a job onto HeyGen's v2 generate body (one scene).
 */
export function buildVideoPayload(job: AvatarVideoJob): HeyGenVideoPayload {
    const payload: HeyGenVideoPayload = {
        video_inputs: [
            {
                character: {
                    type: 'avatar',
                    avatar_id: job.avatarId,
                    avatar_style: 'normal'
                },
                voice: toVoicePayload(job.voice),
                background: toBackgroundPayload(job.background)
            }
        ],
        dimension: { width: job.width, height: job.height }
    };

    if (job.callbackUrl) {
        payload.callback_url = job.callbackUrl;
    }

    return payload;
}

function toVoicePayload(voice: AvatarVoice): HeyGenVoicePayload {
    if (voice.type === 'audio') {
        return { type: 'audio', audio_url: voice.audioUrl };
    }
    return {
        type: 'text',
        input_text: voice.inputText,
        voice_id: voice.voiceId,
        speed: voice.speed
    };
}

function toBackgroundPayload(background: AvatarBackground): HeyGenBackgroundPayload {
    if (background.type === 'color') {
        return { type: 'color', value: background.value };
    }
    if ('url' in background) {
        return { type: 'image', url: background.url };
    }
    return { type: 'image', image_asset_id: background.imageAssetId };
}

function trimSlash(url: string): string {
    return url.endsWith('/') ? url.slice(0, -1) : url;
}
