import fs from 'fs';
import path from 'path';
import { createFalClient } from '@fal-ai/client';
import { IVideoGenerationClient, VideoJobInput } from '../../domain/ports/IVideoGenerationClient';
import { GenerationError, MissingCredentialError, MissingResultError, UpstreamError } from '../../domain/errors';
import { extractVendorMessage, stringifyDetails } from '../http/upstreamErrors';
import { sniffImageContentType } from '../media/contentTypes';
import { decodeFalVideoOutput } from './FalVideoOutput';

export interface FalQueueUpdate {
    status: string;
    queuePosition?: number;
}

/**
 * The part of the FAL SDK this client uses: queue subscription and file storage.
 */
export interface FalQueue {
    subscribe(
        endpointId: string,
        options: {
            input: Record<string, unknown>;
            logs?: boolean;
            onQueueUpdate?: (update: FalQueueUpdate) => void;
        }
    ): Promise<{ data: unknown; requestId: string }>;
    upload(file: Blob): Promise<string>;
}

/**
 * Binds a FalQueue to the real @fal-ai/client SDK.
 */
export function createFalQueue(apiKey: string): FalQueue {
    const fal = createFalClient({ credentials: apiKey });

    return {
        async subscribe(endpointId, options) {
            const result = await fal.subscribe(endpointId, {
                input: options.input,
                logs: options.logs,
                onQueueUpdate: (update) => {
                    options.onQueueUpdate?.({
                        status: update.status,
                        queuePosition: 'queue_position' in update ? update.queue_position : undefined
                    });
                }
            });
            return { data: result.data, requestId: result.requestId };
        },
        upload(file) {
            return fal.storage.upload(file);
        }
    };
}

/**
 * FAL AI video generation client (text-to-video and image-to-video).
 * `subscribe` submits to the FAL queue and resolves once the job is done.
 */
export class FalVideoClient implements IVideoGenerationClient {
    private readonly fal: FalQueue;

    constructor(apiKey: string, fal?: FalQueue) {
        if (!apiKey) {
            throw new MissingCredentialError('FAL_KEY');
        }
        this.fal = fal ?? createFalQueue(apiKey);
    }

    async uploadImage(imagePath: string): Promise<string> {
        const contentType = await sniffImageContentType(imagePath);
        const data = await fs.promises.readFile(imagePath);
        console.error(`[FAL] Uploading ${path.basename(imagePath)} (${contentType})...`);

        try {
            const url = await this.fal.upload(new Blob([data], { type: contentType }));
            console.error(`[FAL] Image uploaded: ${url}`);
            return url;
        } catch (error) {
            throw toFalError('image upload', error);
        }
    }

    async generateVideo(model: string, input: VideoJobInput): Promise<string> {
        const args: Record<string, unknown> = {
            prompt: input.prompt,
            num_inference_steps: input.inferenceSteps,
            guidance_scale: input.guidanceScale
        };
        if (input.numFrames !== undefined) {
            args.num_frames = input.numFrames;
        }
        if (input.imageUrl !== undefined) {
            args.image_url = input.imageUrl;
        }

        console.error(`[FAL] Submitting job to ${model}: ${input.prompt.substring(0, 50)}...`);

        let output: unknown;
        try {
            let lastStatus = '';
            const result = await this.fal.subscribe(model, {
                input: args,
                logs: true,
                onQueueUpdate: (update) => {
                    if (update.status === lastStatus) return;
                    lastStatus = update.status;
                    const position = update.queuePosition !== undefined ? ` (queue position ${update.queuePosition})` : '';
                    console.error(`[FAL] Job status: ${update.status}${position}`);
                }
            });
            console.error(`[FAL] Job ${result.requestId} finished`);
            output = result.data;
        } catch (error) {
            throw toFalError('video generation', error);
        }

        const decoded = decodeFalVideoOutput(output);
        if (!decoded) {
            throw new MissingResultError('No video URL in response', stringifyDetails(output));
        }
        return decoded.url;
    }
}

/**
 * FAL SDK errors carry `status` and `body`; map them onto UpstreamError.
 */
function toFalError(action: string, error: unknown): Error {
    if (error instanceof GenerationError) {
        return error;
    }
    if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
        const body: unknown = 'body' in error ? error.body : undefined;
        const message = extractVendorMessage(body) ?? error.message;
        return new UpstreamError('FAL', `FAL ${action} failed (${error.status}): ${message}`, error.status, stringifyDetails(body));
    }
    return error instanceof Error ? error : new Error(String(error));
}
