import { describe, it, expect } from 'vitest';
import { posix } from 'path';
import {
    LogDeduplicator,
    containsAny,
    defragment,
    isRelativeUrl,
    isSameUrl,
    isUrlInDomain,
    numberedFilename,
    pagePathSegments,
    randomDelay,
    refererFor,
    relativePath,
    sanitizeFilename,
    shortenFilename,
    siteRelativePath,
    splitFilename,
    urlBasename,
} from '../src/index.js';

describe('filename helpers', () => {
    it('should strip characters that are invalid in filenames', () => {
        expect(sanitizeFilename('Intro: part 1/2 "final"?')).toBe(
            'Intro part 12 final',
        );
    });

    it('should split stems and extensions', () => {
        expect(splitFilename('clip.final.mp4')).toEqual({
            stem: 'clip.final',
            ext: '.mp4',
        });
        expect(splitFilename('README')).toEqual({ stem: 'README', ext: '' });
        expect(splitFilename('.htaccess')).toEqual({
            stem: '.htaccess',
            ext: '',
        });
    });

    it('should shorten long stems and keep the extension', () => {
        const name = 'a'.repeat(100) + '.png';
        expect(shortenFilename(name)).toBe('a'.repeat(80) + '.png');
        expect(shortenFilename('short.png')).toBe('short.png');
    });

    it('should number filenames before the extension', () => {
        expect(numberedFilename('photo.jpg', 2)).toBe('photo2.jpg');
        expect(numberedFilename('notes', 1)).toBe('notes1');
    });
});

describe('relativePath', () => {
    it('should point into a nested directory', () => {
        expect(relativePath('/out/a/b/index.html', '/out/a')).toBe(
            './b/index.html',
        );
    });

    it('should climb out of sibling directories', () => {
        expect(relativePath('/out/img/x.png', '/out/a/b')).toBe(
            './../../img/x.png',
        );
    });

    it('should resolve back to the original file', () => {
        const cases: Array<[string, string]> = [
            ['/out/a/b/index.html', '/out/a'],
            ['/out/a/b/c/d/e.mp4', '/out/a/x/y'],
            ['/out/index.html', '/out/deep/er/still'],
            ['/out/a/data/images/p.png', '/out/a/'],
        ];
        for (const [file, dir] of cases) {
            expect(posix.resolve(dir, relativePath(file, dir))).toBe(file);
        }
    });
});

describe('url helpers', () => {
    it('should defragment and normalize URLs', () => {
        expect(defragment('https://example.com#top')).toBe(
            'https://example.com/',
        );
        expect(defragment('https://example.com/a?b=1#c')).toBe(
            'https://example.com/a?b=1',
        );
        expect(defragment('not a url#x')).toBe('not a url');
    });

    it('should compare URLs ignoring a trailing slash', () => {
        expect(isSameUrl('https://example.com/a/', 'https://example.com/a')).toBe(
            true,
        );
        expect(isSameUrl('https://example.com', 'https://example.com/')).toBe(
            true,
        );
        expect(
            isSameUrl('https://example.com/a?x=1', 'https://example.com/a'),
        ).toBe(false);
        expect(
            isSameUrl('https://example.com/login', 'https://example.com/a'),
        ).toBe(false);
    });

    it('should treat subdomains as in-domain', () => {
        const base = 'https://www.example.com/';
        expect(isUrlInDomain(base, 'https://example.com/x')).toBe(true);
        expect(isUrlInDomain(base, 'https://cdn.example.com/x')).toBe(true);
        expect(isUrlInDomain(base, 'https://example.org/x')).toBe(false);
        expect(isUrlInDomain(base, 'https://notexample.com/x')).toBe(false);
    });

    it('should build site-relative paths and page segments', () => {
        expect(siteRelativePath('https://example.com/docs/intro/')).toBe(
            '/docs/intro',
        );
        expect(siteRelativePath('https://example.com/')).toBe('');
        expect(pagePathSegments('https://example.com/a%20b/c')).toEqual([
            'a b',
            'c',
        ]);
    });

    it('should keep the query so query variants do not share a page', () => {
        expect(siteRelativePath('https://example.com/list/?page=1#top')).toBe(
            '/list?page=1',
        );
        expect(pagePathSegments('https://example.com/list?page=1')).toEqual([
            'list_page=1',
        ]);
        expect(pagePathSegments('https://example.com/list?page=2')).toEqual([
            'list_page=2',
        ]);
        expect(pagePathSegments('https://example.com/?q=a%20b')).toEqual([
            '_q=a b',
        ]);
    });

    it('should derive referer and basename', () => {
        expect(refererFor('https://example.com/a/b.png')).toBe(
            'https://example.com/',
        );
        expect(urlBasename('https://example.com/a/b%20c.png?x=1')).toBe(
            'b c.png',
        );
        expect(urlBasename('https://example.com/a/')).toBe('');
    });

    it('should recognise relative references', () => {
        expect(isRelativeUrl('/a/b')).toBe(true);
        expect(isRelativeUrl('b.html')).toBe(true);
        expect(isRelativeUrl('https://example.com')).toBe(false);
        expect(isRelativeUrl('//cdn.example.com/x')).toBe(false);
        expect(isRelativeUrl('www.example.com')).toBe(false);
        expect(isRelativeUrl('mailto:someone@example.com')).toBe(false);
    });

    it('should match substrings', () => {
        expect(containsAny('https://example.com/private/b', ['/private/'])).toBe(
            true,
        );
        expect(containsAny('https://example.com/a', ['/private/'])).toBe(false);
    });
});

describe('randomDelay', () => {
    it('should be disabled by a zero bound', () => {
        expect(randomDelay(0, 5000)).toBe(0);
        expect(randomDelay(1000, 0)).toBe(0);
    });

    it('should stay within the bounds', () => {
        expect(randomDelay(1000, 3000, () => 0)).toBe(1000);
        expect(randomDelay(1000, 3000, () => 0.5)).toBe(2000);
        expect(randomDelay(3000, 1000, () => 0.5)).toBe(2000);
    });
});

describe('LogDeduplicator', () => {
    it('should report each key once', () => {
        const seen = new LogDeduplicator(['preloaded']);
        expect(seen.firstTime('a')).toBe(true);
        expect(seen.firstTime('a')).toBe(false);
        expect(seen.firstTime('preloaded')).toBe(false);
        expect(seen.size).toBe(2);
    });
});
