/**
 * Embedded video players (Vimeo-style `player.` iframes).
 *
 * The player page carries a JSON config in an inline script. It lists
 * progressive (single-file) renditions and, for streams without them, a
 * segmented manifest with separate video and audio tracks.
 */

import { existsSync } from 'fs';
import { rm } from 'fs/promises';
import { join } from 'path';
import { hashFile, placeFile } from '@siteripper/http';
import {
    DuplicatePolicy,
    ScrapeElements,
    type ScrapeJob,
} from '@siteripper/types';
import { sanitizeFilename, tryParseUrl } from '@siteripper/utils';
import { StreamReassemblyError } from '../errors.js';
import { extractJsonFromText, isRecord } from '../json-text.js';
import { selectBestRendition } from '../rendition.js';
import type { PageElement } from '../types.js';
import {
    assembleRendition,
    decodeStreamManifest,
    FfmpegMuxer,
    type StreamManifest,
    type StreamMuxer,
    type StreamRendition,
} from './stream-assembly.js';
import { idealNameFor, type AssetHandler, type HandlerContext } from './types.js';

export const PLAYER_HOST = 'player.vimeo.com';

/** Markup that replaces a captured player iframe. */
export const VIDEO_SNIPPET =
    '<video controls preload="metadata" style="max-width: 100%"><source src="{{src}}"></video>';

export interface ProgressiveRendition {
    quality: string;
    url: string;
}

export interface PlayerConfig {
    title: string | null;
    progressive: ProgressiveRendition[];
    /** Segmented manifest on the default CDN, when offered. */
    manifestUrl: string | null;
}

function record(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}

/**
 * Decodes the parts of a player config the handler uses.
 */
export function decodePlayerConfig(raw: Record<string, unknown>): PlayerConfig {
    const files = record(record(raw.request).files);

    const progressive: ProgressiveRendition[] = [];
    if (Array.isArray(files.progressive)) {
        for (const entry of files.progressive) {
            if (
                isRecord(entry) &&
                typeof entry.url === 'string' &&
                typeof entry.quality === 'string'
            ) {
                progressive.push({ quality: entry.quality, url: entry.url });
            }
        }
    }

    const dash = record(files.dash);
    const cdns = record(dash.cdns);
    const preferred =
        typeof dash.default_cdn === 'string' ? cdns[dash.default_cdn] : undefined;
    const cdn = record(preferred ?? Object.values(cdns)[0]);
    const manifestUrl = typeof cdn.url === 'string' ? cdn.url : null;

    const title = record(raw.video).title;
    return {
        title: typeof title === 'string' && title ? title : null,
        progressive,
        manifestUrl,
    };
}

/**
 * First script text holding a player config.
 */
export function findPlayerConfig(
    scripts: readonly string[],
): Record<string, unknown> | null {
    for (const script of scripts) {
        if (!script.includes('"request"')) {
            continue;
        }
        const config = extractJsonFromText(script);
        if (config && isRecord(config.request)) {
            return config;
        }
    }
    return null;
}

function extensionFor(rendition: StreamRendition): string {
    return rendition.mimeType.includes('webm') ? '.webm' : '.mp4';
}

function bestAudio(renditions: readonly StreamRendition[]): StreamRendition | null {
    let best: StreamRendition | null = null;
    for (const rendition of renditions) {
        if (!best || rendition.bitrate > best.bitrate) {
            best = rendition;
        }
    }
    return best;
}

export class EmbeddedPlayerHandler implements AssetHandler {
    readonly name = 'embedded-player';
    readonly element = ScrapeElements.IFRAMES;
    readonly selector = 'iframe';

    constructor(private readonly muxer: StreamMuxer = new FfmpegMuxer()) {}

    async canHandle(element: PageElement): Promise<boolean> {
        const src = await element.getAttribute('src');
        return !!src && src.includes(PLAYER_HOST);
    }

    async handle(context: HandlerContext): Promise<ScrapeJob[]> {
        const src = (await context.element.getAttribute('src')) ?? '';
        const id = await context.element.getAttribute('id');
        const job = {
            kind: 'video' as const,
            identifier: id ?? src,
            attribute: id ? 'id' : 'src',
            snippet: VIDEO_SNIPPET,
        };

        const config = await this.loadConfig(context, src);
        if (!config) {
            context.log('warn', `No player config found in ${src}`, { src });
            return [{ ...job, localPath: null }];
        }

        const name =
            idealNameFor(context.title, context.index, context.count) ??
            config.title ??
            undefined;

        let localPath: string | null = null;
        const progressive = selectBestRendition(
            config.progressive,
            (rendition) => rendition.quality,
        );
        if (progressive) {
            const file = await context.fetcher.fetch({
                url: progressive.url,
                outDir: join(context.dataDir, 'videos'),
                headers: context.headers,
                duplicatePolicy: DuplicatePolicy.HASH_COMPARE,
                idealFilename: name,
            });
            localPath = file.result === 'SUCCESS' ? file.filename : null;
        } else if (config.manifestUrl) {
            try {
                localPath = await this.reassemble(context, config.manifestUrl, name);
            } catch (error) {
                if (!(error instanceof StreamReassemblyError)) {
                    throw error;
                }
                context.log('error', error.message, { src });
            }
        } else {
            context.log('warn', `Player ${src} offers no downloadable stream`);
        }

        return [{ ...job, localPath }];
    }

    private async loadConfig(
        context: HandlerContext,
        src: string,
    ): Promise<PlayerConfig | null> {
        const frame = await context.element.contentDocument();
        let scripts: string[];
        if (frame) {
            scripts = await Promise.all(
                (await frame.querySelectorAll('script')).map((script) =>
                    script.textContent(),
                ),
            );
        } else {
            const url = tryParseUrl(src, context.pageUrl)?.href;
            const html = url
                ? await context.fetcher.fetchText(url, context.headers)
                : null;
            scripts = html ? [html] : [];
        }
        const raw = findPlayerConfig(scripts);
        return raw ? decodePlayerConfig(raw) : null;
    }

    /**
     * Downloads the best video and audio tracks of a segmented manifest and
     * combines them. Results are recorded in the download cache under the
     * manifest URL.
     */
    private async reassemble(
        context: HandlerContext,
        manifestUrl: string,
        name: string | undefined,
    ): Promise<string | null> {
        const cached = context.downloads.cachedDownload(manifestUrl);
        if (
            cached?.result === 'SUCCESS' &&
            cached.filename &&
            existsSync(cached.filename)
        ) {
            return cached.filename;
        }

        const text = await context.fetcher.fetchText(manifestUrl, context.headers);
        if (text === null) {
            throw new StreamReassemblyError(manifestUrl, 'manifest unavailable');
        }
        let manifest: StreamManifest;
        try {
            manifest = decodeStreamManifest(JSON.parse(text), manifestUrl);
        } catch (error) {
            if (error instanceof StreamReassemblyError) {
                throw error;
            }
            throw new StreamReassemblyError(manifestUrl, 'manifest is not JSON', {
                cause: error,
            });
        }

        const video = selectBestRendition(
            manifest.video,
            (rendition) => `${rendition.height}p`,
        );
        if (!video) {
            throw new StreamReassemblyError(manifestUrl, 'no video renditions');
        }
        const audio = bestAudio(manifest.audio);

        const dir = join(context.dataDir, 'videos');
        const stem = sanitizeFilename(name ?? '') || `video-${video.id || 'stream'}`;
        const videoPart = join(dir, `.${stem}.video.part`);
        const audioPart = join(dir, `.${stem}.audio.part`);
        const muxed = join(dir, `.${stem}.part.mkv`);

        context.log('info', `Reassembling ${manifestUrl} (${video.height}p)`);
        let placed: string;
        try {
            await assembleRendition(
                context.fetcher,
                manifestUrl,
                manifest,
                video,
                videoPart,
                context.headers,
            );
            if (audio) {
                await assembleRendition(
                    context.fetcher,
                    manifestUrl,
                    manifest,
                    audio,
                    audioPart,
                    context.headers,
                );
                await this.muxer.mux(videoPart, audioPart, muxed);
                placed = await placeFile(
                    muxed,
                    join(dir, `${stem}.mkv`),
                    await hashFile(muxed),
                    DuplicatePolicy.HASH_COMPARE,
                    manifestUrl,
                );
            } else {
                placed = await placeFile(
                    videoPart,
                    join(dir, stem + extensionFor(video)),
                    await hashFile(videoPart),
                    DuplicatePolicy.HASH_COMPARE,
                    manifestUrl,
                );
            }
        } finally {
            await Promise.all(
                [videoPart, audioPart, muxed].map((path) =>
                    rm(path, { force: true }),
                ),
            );
        }

        await context.downloads.storeDownload(manifestUrl, {
            result: 'SUCCESS',
            filename: placed,
            headers: {},
        });
        return placed;
    }
}
