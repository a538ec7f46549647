import { EmbeddedPlayerHandler } from './embedded-player.js';
import { createImageHandler, createVideoHandler } from './generic.js';
import type { StreamMuxer } from './stream-assembly.js';
import type { AssetHandler } from './types.js';
import { WistiaHandler } from './wistia.js';

export * from './types.js';
export * from './generic.js';
export * from './embedded-player.js';
export * from './stream-assembly.js';
export * from './wistia.js';

/**
 * The built-in handlers. For each element the first handler that accepts
 * it wins, so site-specific handlers come before generic ones.
 */
export function defaultHandlers(muxer?: StreamMuxer): AssetHandler[] {
    return [
        new WistiaHandler(),
        createVideoHandler(),
        createImageHandler(),
        new EmbeddedPlayerHandler(muxer),
    ];
}
