/**
 * Sitemap Tests
 */

import { testSitemap, testSitemapIndex } from '../../../__tests__/helpers/fixtures';
import { defaultSitemapUrls, discoverSitemapUrls, parseSitemap } from '../sitemap';

describe('parseSitemap', () => {
  it('should read page URLs from a urlset', () => {
    expect(parseSitemap(testSitemap)).toEqual({
      pages: ['https://docs.example.test/guide/install', 'https://docs.example.test/guide/usage'],
      sitemaps: [],
    });
  });

  it('should read child sitemaps from a sitemap index', () => {
    expect(parseSitemap(testSitemapIndex)).toEqual({
      pages: [],
      sitemaps: ['https://docs.example.test/sitemap-guide.xml'],
    });
  });

  it('should return nothing for a document without loc entries', () => {
    expect(parseSitemap('<html><body>Not a sitemap</body></html>')).toEqual({ pages: [], sitemaps: [] });
  });
});

describe('defaultSitemapUrls', () => {
  it('should point at the site root', () => {
    expect(defaultSitemapUrls('https://docs.example.test/guide/')).toEqual([
      'https://docs.example.test/sitemap.xml',
      'https://docs.example.test/sitemap_index.xml',
    ]);
  });
});

describe('discoverSitemapUrls', () => {
  it('should follow a sitemap index one level and skip missing sitemaps', async () => {
    const documents: Record<string, string> = {
      'https://docs.example.test/sitemap_index.xml': testSitemapIndex,
      'https://docs.example.test/sitemap-guide.xml': testSitemap,
    };
    const loadText = jest.fn((url: string) => Promise.resolve(documents[url] ?? null));

    const urls = await discoverSitemapUrls(
      ['https://docs.example.test/sitemap.xml', 'https://docs.example.test/sitemap_index.xml'],
      loadText
    );

    expect(urls).toEqual(['https://docs.example.test/guide/install', 'https://docs.example.test/guide/usage']);
    expect(loadText).toHaveBeenCalledTimes(3);
  });

  it('should not follow indexes nested below the first level', async () => {
    const nestedIndex = testSitemapIndex.replace('sitemap-guide.xml', 'sitemap-deeper.xml');
    const documents: Record<string, string> = {
      'https://docs.example.test/sitemap_index.xml': testSitemapIndex,
      'https://docs.example.test/sitemap-guide.xml': nestedIndex,
      'https://docs.example.test/sitemap-deeper.xml': testSitemap,
    };
    const loadText = jest.fn((url: string) => Promise.resolve(documents[url] ?? null));

    const urls = await discoverSitemapUrls(['https://docs.example.test/sitemap_index.xml'], loadText);

    expect(urls).toEqual([]);
    expect(loadText).not.toHaveBeenCalledWith('https://docs.example.test/sitemap-deeper.xml');
  });

  it('should deduplicate pages listed in several sitemaps', async () => {
    const loadText = jest.fn((_url: string): Promise<string | null> => Promise.resolve(testSitemap));

    const urls = await discoverSitemapUrls(
      ['https://docs.example.test/a.xml', 'https://docs.example.test/b.xml'],
      loadText
    );

    expect(urls).toHaveLength(2);
  });
});
