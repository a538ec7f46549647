/**
 * Wistia-hosted `<video>` elements. The element only carries a blob source;
 * the real files are listed in the media JSONP the page loads.
 */

import { join } from 'path';
import {
    DuplicatePolicy,
    ScrapeElements,
    type ScrapeJob,
} from '@siteripper/types';
import { tryParseUrl } from '@siteripper/utils';
import { extractJsonFromText, isRecord } from '../json-text.js';
import type { PageElement } from '../types.js';
import { VIDEO_SNIPPET } from './embedded-player.js';
import { idealNameFor, type AssetHandler, type HandlerContext } from './types.js';

const MEDIA_SCRIPT_SELECTOR = 'script[src*="embed/medias/"]';

export interface WistiaAsset {
    type: string;
    url: string;
    width: number;
}

export interface WistiaMedia {
    name: string | null;
    assets: WistiaAsset[];
}

/**
 * Decodes the `media` object of a Wistia JSONP payload.
 */
export function decodeWistiaMedia(text: string): WistiaMedia | null {
    const payload = extractJsonFromText(text);
    const media = payload?.media;
    if (!isRecord(media) || !Array.isArray(media.assets)) {
        return null;
    }
    const assets: WistiaAsset[] = [];
    for (const asset of media.assets) {
        if (isRecord(asset) && typeof asset.url === 'string') {
            assets.push({
                type: typeof asset.type === 'string' ? asset.type : '',
                url: asset.url,
                width: typeof asset.width === 'number' ? asset.width : 0,
            });
        }
    }
    return {
        name: typeof media.name === 'string' && media.name ? media.name : null,
        assets,
    };
}

/**
 * The original upload when offered, otherwise the widest MP4 rendition.
 */
export function selectWistiaAsset(assets: readonly WistiaAsset[]): WistiaAsset | null {
    const original = assets.find((asset) => asset.type === 'original');
    if (original) {
        return original;
    }
    let best: WistiaAsset | null = null;
    for (const asset of assets) {
        if (asset.type.includes('mp4') && (!best || asset.width > best.width)) {
            best = asset;
        }
    }
    return best;
}

export class WistiaHandler implements AssetHandler {
    readonly name = 'wistia';
    readonly element = ScrapeElements.VIDEOS;
    readonly selector = 'video';

    async canHandle(element: PageElement): Promise<boolean> {
        const poster = (await element.getAttribute('poster')) ?? '';
        return poster.includes('wistia.');
    }

    async handle(context: HandlerContext): Promise<ScrapeJob[]> {
        const id = await context.element.getAttribute('id');
        const poster = (await context.element.getAttribute('poster')) ?? '';
        const job = {
            kind: 'video' as const,
            identifier: id ?? poster,
            attribute: id ? 'id' : 'poster',
            snippet: VIDEO_SNIPPET,
        };

        const scripts = await context.page.querySelectorAll(MEDIA_SCRIPT_SELECTOR);
        const script = scripts[context.index] ?? scripts[0];
        const src = script ? await script.getAttribute('src') : null;
        const mediaUrl = src ? tryParseUrl(src, context.pageUrl)?.href : undefined;
        if (!mediaUrl) {
            context.log('warn', `No Wistia media script on ${context.pageUrl}`);
            return [{ ...job, localPath: null }];
        }

        const text = await context.fetcher.fetchText(mediaUrl, context.headers);
        const media = text ? decodeWistiaMedia(text) : null;
        const asset = media ? selectWistiaAsset(media.assets) : null;
        if (!asset) {
            context.log('warn', `No downloadable Wistia asset in ${mediaUrl}`);
            return [{ ...job, localPath: null }];
        }

        const file = await context.fetcher.fetch({
            url: asset.url,
            outDir: join(context.dataDir, 'videos'),
            headers: context.headers,
            duplicatePolicy: DuplicatePolicy.HASH_COMPARE,
            idealFilename:
                idealNameFor(context.title, context.index, context.count) ??
                media?.name ??
                undefined,
        });
        context.captured.add(asset.url);
        return [
            {
                ...job,
                localPath: file.result === 'SUCCESS' ? file.filename : null,
            },
        ];
    }
}
