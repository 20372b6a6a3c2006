/**
 * HTML Cleaner Tests
 */

import { testHtml, testText } from '../../../__tests__/helpers/fixtures';
import { cleanHtml, HtmlCleaner, isHtmlContentType } from '../html-cleaner';

describe('HtmlCleaner', () => {
  let cleaner: HtmlCleaner;

  beforeEach(() => {
    cleaner = new HtmlCleaner();
  });

  it('should extract text, title and links from a page', () => {
    const page = cleaner.clean(testHtml, 'text/html; charset=utf-8');

    expect(page.title).toBe('Test Page');
    expect(page.text).toBe(testText);
    expect(page.links).toEqual(['/guide/install']);
  });

  it('should drop boilerplate elements from the text', () => {
    const page = cleaner.clean(testHtml);

    expect(page.text).not.toContain('Site header');
    expect(page.text).not.toContain('Copyright');
    expect(page.text).not.toContain('console.log');
    expect(page.text).not.toContain('color: red');
  });

  it('should mark headings by level and drop empty ones', () => {
    const page = cleaner.clean('<h2>Install</h2><h3> </h3><p>Run it.</p>');
    expect(page.text).toBe('## Install\n\nRun it.');
  });

  it('should keep line breaks and inline text flow', () => {
    expect(cleaner.clean('<p>one<br>two</p>').text).toBe('one\ntwo');
    expect(cleaner.clean('<p>Use <code>npm</code> now</p>').text).toBe('Use npm now');
  });

  it('should list links once each, skipping anchors and non-navigational schemes', () => {
    const html = [
      '<a href="a">A</a>',
      '<a href="a">A again</a>',
      '<a href="mailto:team@example.test">Mail</a>',
      '<a href="javascript:void(0)">Script</a>',
      '<a href="#section">Anchor</a>',
      '<a href=" b ">B</a>',
      '<a href="">Empty</a>',
    ].join('');

    expect(cleaner.clean(html).links).toEqual(['a', 'b']);
  });

  it('should return an empty page for non-HTML content or empty input', () => {
    expect(cleaner.clean('<p>x</p>', 'application/json')).toEqual({ text: '', title: '', links: [] });
    expect(cleaner.clean('   ')).toEqual({ text: '', title: '', links: [] });
  });

  it('should be deterministic', () => {
    expect(cleanHtml(testHtml)).toEqual(cleanHtml(testHtml));
  });
});

describe('isHtmlContentType', () => {
  it('should treat a missing content type as HTML', () => {
    expect(isHtmlContentType(undefined)).toBe(true);
    expect(isHtmlContentType('')).toBe(true);
  });

  it('should match HTML media types only', () => {
    expect(isHtmlContentType('text/html; charset=utf-8')).toBe(true);
    expect(isHtmlContentType('application/xhtml+xml')).toBe(true);
    expect(isHtmlContentType('text/plain')).toBe(false);
  });
});
