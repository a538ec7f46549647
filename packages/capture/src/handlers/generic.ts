/**
 * Plain `<img>` and `<video>` elements.
 */

import { join } from 'path';
import {
    DuplicatePolicy,
    ScrapeElements,
    type ScrapeJob,
} from '@siteripper/types';
import { tryParseUrl } from '@siteripper/utils';
import type { PageElement } from '../types.js';
import { idealNameFor, type AssetHandler, type HandlerContext } from './types.js';

function isFetchable(src: string | null): src is string {
    return !!src && !/^(?:data|blob|javascript):/i.test(src.trim());
}

/**
 * Downloads the source of a media element into a fixed sub-folder of the
 * page's asset directory.
 */
export class GenericContentHandler implements AssetHandler {
    constructor(
        readonly name: string,
        readonly element: number,
        readonly selector: string,
        private readonly folder: string,
    ) {}

    /**
     * The element's own `src`, or for `<video>` its first `<source src>`.
     */
    async sourceOf(element: PageElement): Promise<string | null> {
        const src = await element.getAttribute('src');
        if (isFetchable(src)) {
            return src;
        }
        for (const source of await element.querySelectorAll('source[src]')) {
            const nested = await source.getAttribute('src');
            if (isFetchable(nested)) {
                return nested;
            }
        }
        return null;
    }

    async canHandle(element: PageElement): Promise<boolean> {
        return (await this.sourceOf(element)) !== null;
    }

    async handle(context: HandlerContext): Promise<ScrapeJob[]> {
        const original = await this.sourceOf(context.element);
        if (original === null) {
            return [];
        }
        const url = tryParseUrl(original, context.pageUrl)?.href;
        if (!url) {
            context.log('debug', `Unusable ${this.name} source ${original}`);
            return [];
        }

        const file = await context.fetcher.fetch({
            url,
            outDir: join(context.dataDir, this.folder),
            headers: context.headers,
            duplicatePolicy: DuplicatePolicy.HASH_COMPARE,
            ignoredContentTypes: ['text/html'],
            idealFilename: idealNameFor(
                context.title,
                context.index,
                context.count,
            ),
        });
        context.captured.add(url);

        const localPath = file.result === 'SUCCESS' ? file.filename : null;
        if (localPath === null) {
            context.log('warn', `Could not capture ${this.name} ${url}`, {
                url,
                result: file.result,
            });
        }
        return [{ kind: 'url', original, localPath }];
    }
}

export function createImageHandler(): GenericContentHandler {
    return new GenericContentHandler(
        'image',
        ScrapeElements.IMAGES,
        'img',
        'images',
    );
}

export function createVideoHandler(): GenericContentHandler {
    return new GenericContentHandler(
        'video',
        ScrapeElements.VIDEOS,
        'video',
        'videos',
    );
}
