import { GenerationError, JobFailedError, PollTimeoutError } from '../errors';

/**
 * Result objects printed as a single JSON line. Keys are snake_case because
 * the JSON is the wire format read by the calling orchestrator.
 */

export interface AudioArtifact {
    audio_path: string;
    provider: 'google';
    voice: string;
    speed: number;
}

export interface VideoArtifact {
    video_path: string;
    video_url: string;
    duration?: number;
    fps?: number;
}

export interface AvatarArtifact {
    video_path: string;
    video_url: string;
    video_id: string;
    duration?: number;
}

export type SuccessResult<TArtifact> = { status: 'success' } & TArtifact;

export interface ErrorResult {
    status: 'error';
    message: string;
    details?: string;
    video_id?: string;
    check_url?: string;
    prompt?: string;
}

export interface ProcessingResult {
    status: 'processing';
    video_id: string;
    callback_url: string;
    message: string;
}

export type SpeechResult = SuccessResult<AudioArtifact> | ErrorResult;
export type VideoResult = SuccessResult<VideoArtifact> | ErrorResult;
export type AvatarResult = SuccessResult<AvatarArtifact> | ErrorResult | ProcessingResult;
export type GenerationResult = SpeechResult | VideoResult | AvatarResult;

export function success<TArtifact>(artifact: TArtifact): SuccessResult<TArtifact> {
    return Object.assign({ status: 'success' as const }, artifact);
}

export function processing(videoId: string, callbackUrl: string): ProcessingResult {
    return {
        status: 'processing',
        video_id: videoId,
        callback_url: callbackUrl,
        message: `Video generation started. HeyGen will call ${callbackUrl} when it finishes.`,
    };
}

/**
 * Converts anything thrown by a generation step into the error result shape.
 */
export function toErrorResult(error: unknown): ErrorResult {
    if (error instanceof GenerationError) {
        const result: ErrorResult = { status: 'error', message: error.message };
        if (error.details !== undefined) {
            result.details = error.details;
        }
        if (error instanceof PollTimeoutError) {
            result.video_id = error.jobId;
            if (error.checkUrl) {
                result.check_url = error.checkUrl;
            }
        } else if (error instanceof JobFailedError) {
            result.video_id = error.jobId;
        }
        return result;
    }

    if (error instanceof Error) {
        return { status: 'error', message: error.message };
    }

    return { status: 'error', message: String(error) };
}
