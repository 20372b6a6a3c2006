/**
 * HTML Cleaner
 * Strips boilerplate markup and turns a page into plain text, a title and its links
 */

import * as cheerio from 'cheerio';
import { normalizeText } from './text.processor';

export interface CleanedPage {
  text: string;
  title: string;
  links: string[];
}

// Non-content elements removed before text extraction
const BOILERPLATE_SELECTORS = [
  'script',
  'style',
  'noscript',
  'template',
  'svg',
  'img',
  'iframe',
  'button',
  'form',
  'nav',
  'header',
  'footer',
  'aside',
  '[role="banner"]',
  '[role="navigation"]',
  '[role="contentinfo"]',
  '[role="complementary"]',
];

// Elements whose content starts and ends on its own line
const BLOCK_SELECTORS = [
  'p',
  'div',
  'section',
  'article',
  'main',
  'ul',
  'ol',
  'li',
  'dl',
  'dt',
  'dd',
  'pre',
  'blockquote',
  'table',
  'thead',
  'tbody',
  'tr',
  'th',
  'td',
  'figure',
  'figcaption',
  'hr',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
];

const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6';

const IGNORED_HREF_PREFIXES = ['#', 'mailto:', 'javascript:', 'tel:', 'data:'];

const EMPTY_PAGE: CleanedPage = { text: '', title: '', links: [] };

export function isHtmlContentType(contentType: string | undefined): boolean {
  if (!contentType || !contentType.trim()) {
    return true;
  }
  return contentType.toLowerCase().includes('html');
}

export class HtmlCleaner {
  /**
   * Clean a page. Non-HTML content types yield empty text.
   */
  clean(html: string, contentType?: string): CleanedPage {
    if (!isHtmlContentType(contentType) || !html || html.trim().length === 0) {
      return { ...EMPTY_PAGE, links: [] };
    }

    const $ = cheerio.load(html);

    // Links come from the whole document, boilerplate included
    const links = this.extractLinks($);
    const title = $('title').first().text().replace(/\s+/g, ' ').trim();

    $(BOILERPLATE_SELECTORS.join(', ')).remove();

    $(HEADING_SELECTOR).each((_, el) => {
      const $el = $(el);
      const headingText = $el.text().replace(/\s+/g, ' ').trim();
      if (!headingText) {
        $el.remove();
        return;
      }
      const level = Number(el.tagName.slice(1));
      $el.text(`${'#'.repeat(level)} ${headingText}`);
    });

    $('br').replaceWith('\n');
    $(BLOCK_SELECTORS.join(', ')).each((_, el) => {
      $(el).before('\n').after('\n');
    });

    const text = normalizeText($('body').text());
    return { text, title, links };
  }

  /**
   * Hyperlink targets in document order, without duplicates or in-page anchors
   */
  extractLinks($: cheerio.CheerioAPI): string[] {
    const seen = new Set<string>();
    const links: string[] = [];

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href')?.trim();
      if (!href) return;

      const lower = href.toLowerCase();
      if (IGNORED_HREF_PREFIXES.some((prefix) => lower.startsWith(prefix))) return;

      if (!seen.has(href)) {
        seen.add(href);
        links.push(href);
      }
    });

    return links;
  }
}

export const htmlCleaner = new HtmlCleaner();

export function cleanHtml(html: string, contentType?: string): CleanedPage {
  return htmlCleaner.clean(html, contentType);
}
