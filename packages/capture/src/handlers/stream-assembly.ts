/**
 * Segmented (DASH-style) stream reassembly: concatenates a rendition's
 * init segment and media segments into one file, and muxes separate video
 * and audio tracks.
 */

import { spawn } from 'child_process';
import { mkdir, open, rm } from 'fs/promises';
import { dirname } from 'path';
import type { ContentFetcher } from '@siteripper/http';
import { StreamReassemblyError } from '../errors.js';
import { isRecord } from '../json-text.js';

export interface StreamRendition {
    id: string;
    /** Relative to the manifest's base URL. */
    baseUrl: string;
    mimeType: string;
    /** Base64-encoded init segment, when the manifest inlines one. */
    initSegment: string | null;
    segmentUrls: string[];
    height: number;
    bitrate: number;
}

export interface StreamManifest {
    /** Relative to the manifest URL. */
    baseUrl: string;
    video: StreamRendition[];
    audio: StreamRendition[];
}

function stringField(record: Record<string, unknown>, key: string): string {
    const value = record[key];
    return typeof value === 'string' ? value : '';
}

function numberField(record: Record<string, unknown>, key: string): number {
    const value = record[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function decodeRendition(raw: unknown): StreamRendition | null {
    if (!isRecord(raw) || !Array.isArray(raw.segments)) {
        return null;
    }
    const segmentUrls: string[] = [];
    for (const segment of raw.segments) {
        if (isRecord(segment) && typeof segment.url === 'string') {
            segmentUrls.push(segment.url);
        }
    }
    const init = raw.init_segment;
    return {
        id: stringField(raw, 'id'),
        baseUrl: stringField(raw, 'base_url'),
        mimeType: stringField(raw, 'mime_type'),
        initSegment: typeof init === 'string' && init ? init : null,
        segmentUrls,
        height: numberField(raw, 'height'),
        bitrate: numberField(raw, 'bitrate'),
    };
}

function decodeRenditions(raw: unknown): StreamRendition[] {
    if (!Array.isArray(raw)) {
        return [];
    }
    return raw
        .map(decodeRendition)
        .filter((rendition): rendition is StreamRendition => rendition !== null);
}

/**
 * Decodes a segmented stream manifest.
 *
 * @throws {StreamReassemblyError} When the document has no video renditions
 */
export function decodeStreamManifest(
    raw: unknown,
    manifestUrl: string,
): StreamManifest {
    if (!isRecord(raw)) {
        throw new StreamReassemblyError(manifestUrl, 'manifest is not an object');
    }
    const manifest: StreamManifest = {
        baseUrl: stringField(raw, 'base_url'),
        video: decodeRenditions(raw.video),
        audio: decodeRenditions(raw.audio),
    };
    if (manifest.video.length === 0) {
        throw new StreamReassemblyError(manifestUrl, 'no video renditions');
    }
    return manifest;
}

/**
 * Downloads one rendition into `targetPath`: the decoded init segment
 * followed by every media segment in order.
 *
 * @throws {StreamReassemblyError} When any segment fails; the partial file
 *   is removed
 */
export async function assembleRendition(
    fetcher: ContentFetcher,
    manifestUrl: string,
    manifest: StreamManifest,
    rendition: StreamRendition,
    targetPath: string,
    headers?: Record<string, string>,
): Promise<void> {
    const base = new URL(
        rendition.baseUrl,
        new URL(manifest.baseUrl, manifestUrl),
    );

    await mkdir(dirname(targetPath), { recursive: true });
    const handle = await open(targetPath, 'w');
    try {
        if (rendition.initSegment) {
            await handle.write(Buffer.from(rendition.initSegment, 'base64'));
        }
        for (const segment of rendition.segmentUrls) {
            await fetcher.appendToFile(new URL(segment, base).href, handle, headers);
        }
    } catch (error) {
        await handle.close();
        await rm(targetPath, { force: true });
        throw new StreamReassemblyError(
            manifestUrl,
            `rendition ${rendition.id} failed: ${
                error instanceof Error ? error.message : String(error)
            }`,
            { cause: error },
        );
    }
    await handle.close();
}

/**
 * Combines a video-only and an audio-only file into one container.
 */
export interface StreamMuxer {
    mux(videoPath: string, audioPath: string, outputPath: string): Promise<void>;
}

/**
 * Muxes with the `ffmpeg` executable, copying both streams unchanged.
 */
export class FfmpegMuxer implements StreamMuxer {
    constructor(private readonly executable = 'ffmpeg') {}

    mux(videoPath: string, audioPath: string, outputPath: string): Promise<void> {
        const args = [
            '-y',
            '-loglevel',
            'error',
            '-i',
            videoPath,
            '-i',
            audioPath,
            '-c',
            'copy',
            outputPath,
        ];
        return new Promise((resolve, reject) => {
            const child = spawn(this.executable, args, {
                stdio: ['ignore', 'ignore', 'pipe'],
            });
            let stderr = '';
            child.stderr.on('data', (chunk: Buffer) => {
                stderr += chunk.toString();
            });
            child.on('error', (error) => {
                reject(
                    new StreamReassemblyError(
                        outputPath,
                        `could not run ${this.executable}: ${error.message}`,
                        { cause: error },
                    ),
                );
            });
            child.on('close', (code) => {
                if (code === 0) {
                    resolve();
                } else {
                    reject(
                        new StreamReassemblyError(
                            outputPath,
                            `${this.executable} exited with ${code}: ${stderr.trim()}`,
                        ),
                    );
                }
            });
        });
    }
}
