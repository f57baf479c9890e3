/**
 * Result shapes a FAL video model can return. Decoded in this order:
 *  1. `{ video: { url } }` - file object, used by ltx-video and most models
 *  2. `{ video_url }`      - flat URL, used by some older endpoints
 */
export type FalVideoOutput =
    | { shape: 'file'; url: string }
    | { shape: 'flat'; url: string };

export function decodeFalVideoOutput(output: unknown): FalVideoOutput | null {
    if (typeof output !== 'object' || output === null) {
        return null;
    }

    if ('video' in output) {
        const video = output.video;
        if (typeof video === 'object' && video !== null && 'url' in video && typeof video.url === 'string' && video.url) {
            return { shape: 'file', url: video.url };
        }
    }

    if ('video_url' in output && typeof output.video_url === 'string' && output.video_url) {
        return { shape: 'flat', url: output.video_url };
    }

    return null;
}
