/**
 * IMediaDownloader - Port for fetching a generated artifact to local disk.
 */
export interface IMediaDownloader {
    /**
     * Streams `url` into `outputPath`, creating parent directories as needed.
     */
    download(url: string, outputPath: string, timeoutMs: number): Promise<void>;
}
