/**
 * `@siteripper/http`
 *
 * HTTP plumbing for siteripper: a retrying fetch, the content fetcher that
 * downloads assets at most once per run, and content-type helpers.
 *
 * @packageDocumentation
 */

export {
    robustFetch,
    FetchError,
    getFetchErrorDetails,
    DEFAULT_HEADERS,
    type RobustFetchOptions,
} from './fetch.js';
export {
    ContentFetcher,
    placeFile,
    hashFile,
    type ContentFetcherOptions,
    type FetchRequest,
} from './fetcher.js';
export {
    baseContentType,
    isIgnoredContentType,
    extensionForContentType,
    parseContentDisposition,
    sniffExtension,
    sniffFileExtension,
    resolveFilename,
    groupFolderFor,
    loadGroupByMapping,
    DEFAULT_GROUP_BY_PATH,
    type FilenameInputs,
} from './content-type.js';
export { DuplicateFileError, ContentLengthMismatchError } from './errors.js';
