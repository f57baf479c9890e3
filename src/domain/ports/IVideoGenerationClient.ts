/**
 * Arguments for one prompt- or image-driven video generation job.
 */
export interface VideoJobInput {
    prompt: string;
    inferenceSteps: number;
    guidanceScale: number;
    /** Text-to-video only: total frames (duration x fps) */
    numFrames?: number;
    /** Image-to-video only: hosted URL of the source image */
    imageUrl?: string;
}

/**
 * IVideoGenerationClient - Port for hosted video generation models.
 * Implementations: FalVideoClient
 */
export interface IVideoGenerationClient {
    /**
     * Uploads a local image so a model can reference it by URL.
     */
    uploadImage(imagePath: string): Promise<string>;

    /**
     * Submits a job and resolves once the model has produced a video.
     * @returns URL of the generated video
     */
    generateVideo(model: string, input: VideoJobInput): Promise<string>;
}
