import fs from 'fs';
import path from 'path';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const JPEG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff]);

const IMAGE_TYPES_BY_EXTENSION: Record<string, string> = {
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.webp': 'image/webp'
};

const AUDIO_TYPES_BY_EXTENSION: Record<string, string> = {
    '.mp3': 'audio/mpeg',
    '.wav': 'audio/wav',
    '.m4a': 'audio/mp4'
};

/**
 * Picks an image MIME type. File content wins over the extension:
 * PNG and JPEG signatures are checked first, then the extension,
 * and anything unrecognised is sent as JPEG.
 */
export function detectImageContentType(filePath: string, header: Buffer): string {
    if (header.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
        return 'image/png';
    }
    if (header.subarray(0, JPEG_SIGNATURE.length).equals(JPEG_SIGNATURE)) {
        return 'image/jpeg';
    }
    return IMAGE_TYPES_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? 'image/jpeg';
}

/**
 * Reads the first bytes of a local image and runs {@link detectImageContentType}.
 */
export async function sniffImageContentType(filePath: string): Promise<string> {
    const handle = await fs.promises.open(filePath, 'r');
    try {
        const header = Buffer.alloc(PNG_SIGNATURE.length);
        const { bytesRead } = await handle.read(header, 0, header.length, 0);
        return detectImageContentType(filePath, header.subarray(0, bytesRead));
    } finally {
        await handle.close();
    }
}

export function audioContentType(filePath: string): string {
    return AUDIO_TYPES_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? 'audio/mpeg';
}
