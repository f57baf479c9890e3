import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { DownloadError } from '../../domain/errors';
import { IMediaDownloader } from '../../domain/ports/IMediaDownloader';

/**
 * Downloads generated media to local disk over HTTP.
 */
export class MediaDownloader implements IMediaDownloader {
    async download(url: string, outputPath: string, timeoutMs: number): Promise<void> {
        console.error(`[Download] Fetching ${url} -> ${outputPath}`);

        const directory = path.dirname(outputPath);
        await fs.promises.mkdir(directory, { recursive: true });

        // Bytes land in `<output>.part` and replace the target only once complete
        const partialPath = `${outputPath}.part`;

        try {
            const response = await axios.get<Readable>(url, {
                responseType: 'stream',
                timeout: timeoutMs
            });

            const writer = fs.createWriteStream(partialPath);

            await new Promise<void>((resolve, reject) => {
                let hasError = false;
                const handleError = (err: Error) => {
                    if (hasError) return;
                    hasError = true;
                    response.data.destroy();
                    if (writer.closed) {
                        reject(err);
                        return;
                    }
                    writer.once('close', () => reject(err));
                    writer.destroy();
                };

                response.data.on('error', (err: Error) => handleError(new Error(`Download stream error: ${err.message}`)));
                writer.on('error', (err: Error) => handleError(new Error(`Write stream error: ${err.message}`)));
                writer.on('close', () => {
                    if (!hasError) resolve();
                });

                response.data.pipe(writer);
            });

            await fs.promises.rename(partialPath, outputPath);
        } catch (error) {
            await fs.promises.rm(partialPath, { force: true });
            const status = axios.isAxiosError(error) && error.response ? ` (HTTP ${error.response.status})` : '';
            const reason = error instanceof Error ? error.message : String(error);
            throw new DownloadError(url, `${reason}${status}`);
        }

        const { size } = await fs.promises.stat(outputPath);
        console.error(`[Download] ✅ Saved ${outputPath} (${(size / (1024 * 1024)).toFixed(2)} MB)`);
    }
}
