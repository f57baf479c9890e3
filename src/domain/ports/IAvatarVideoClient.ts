/**
 * Avatar Video Port
 *
 * Contract for talking-avatar video services (HeyGen).
 */

export type AvatarVoice =
    | { type: 'audio'; audioUrl: string }
    | { type: 'text'; inputText: string; voiceId: string; speed: number };

export type AvatarBackground =
    | { type: 'color'; value: string }
    | { type: 'image'; url: string }
    | { type: 'image'; imageAssetId: string };

export interface AvatarVideoJob {
    avatarId: string;
    voice: AvatarVoice;
    background: AvatarBackground;
    width: number;
    height: number;
    /** Webhook the service calls when rendering ends */
    callbackUrl?: string;
}

export interface UploadedAsset {
    id: string;
    url: string;
}

export interface AvatarVideoStatus {
    /** Raw status string: "completed" and "failed" are terminal */
    status: string;
    videoUrl?: string;
    durationSeconds?: number;
    errorMessage?: string;
}

export interface IAvatarVideoClient {
    /**
     * Uploads a local file as a binary asset.
     */
    uploadAsset(filePath: string, contentType: string): Promise<UploadedAsset>;

    /**
     * Submits a render job.
     * @returns the job's video id
     */
    submitVideo(job: AvatarVideoJob): Promise<string>;

    getVideoStatus(videoId: string): Promise<AvatarVideoStatus>;

    /**
     * Dashboard URL where a job can be checked by hand.
     */
    checkUrl(videoId: string): string;
}
