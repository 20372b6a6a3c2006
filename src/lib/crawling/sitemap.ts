/**
 * Sitemap Discovery
 * Reads <loc> entries from sitemap.xml files to warm the frontier
 */

import * as cheerio from 'cheerio';
import { CrawlLogger, silentLogger } from '../logging/logger';
import { TextLoader } from './crawling.types';
import { siteRoot } from './url-normalizer';

const DEFAULT_SITEMAP_PATHS = ['/sitemap.xml', '/sitemap_index.xml'];

export interface ParsedSitemap {
  /**
   * Page URLs listed in a <urlset>
   */
  pages: string[];

  /**
   * Child sitemap URLs listed in a <sitemapindex>
   */
  sitemaps: string[];
}

/**
 * Parse a sitemap or sitemap index document
 */
export function parseSitemap(xml: string): ParsedSitemap {
  const $ = cheerio.load(xml, { xml: true });
  const pages: string[] = [];
  const sitemaps: string[] = [];

  $('loc').each((_, el) => {
    const loc = $(el).text().trim();
    if (!loc) return;

    const parentName = $(el).parent().prop('tagName')?.toLowerCase() ?? '';
    if (parentName.endsWith('sitemap')) {
      sitemaps.push(loc);
    } else {
      pages.push(loc);
    }
  });

  return { pages, sitemaps };
}

export function defaultSitemapUrls(baseUrl: string): string[] {
  const root = siteRoot(baseUrl);
  return DEFAULT_SITEMAP_PATHS.map((path) => `${root}${path}`);
}

/**
 * Collect page URLs from the given sitemaps, following nested sitemap
 * indexes one level deep. Unavailable sitemaps are ignored.
 */
export async function discoverSitemapUrls(
  sitemapUrls: string[],
  loadText: TextLoader,
  logger: CrawlLogger = silentLogger
): Promise<string[]> {
  const pages = new Set<string>();
  const fetched = new Set<string>();

  const visit = async (sitemapUrl: string, followIndex: boolean): Promise<void> => {
    if (fetched.has(sitemapUrl)) return;
    fetched.add(sitemapUrl);

    const xml = await loadText(sitemapUrl);
    if (xml === null) {
      logger.debug(`[SITEMAP] ${sitemapUrl} unavailable`);
      return;
    }

    const parsed = parseSitemap(xml);
    parsed.pages.forEach((page) => pages.add(page));
    logger.info(`[SITEMAP] ${sitemapUrl}: ${parsed.pages.length} pages, ${parsed.sitemaps.length} nested`);

    if (followIndex) {
      for (const child of parsed.sitemaps) {
        await visit(child, false);
      }
    }
  };

  for (const sitemapUrl of sitemapUrls) {
    await visit(sitemapUrl, true);
  }

  return Array.from(pages);
}
