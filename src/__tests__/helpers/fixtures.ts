/**
 * Test Fixtures
 * Reusable test data
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { CrawlEngineConfig } from '../../lib/engine/engine.types';

export const BASE_URL = 'https://docs.example.test/guide/';

/**
 * Minimal HTML document. Links go in a <nav>, which the cleaner drops from the text.
 */
export function htmlPage(title: string, body: string, links: string[] = []): string {
  const nav = links.length > 0 ? `<nav>${links.map((href) => `<a href="${href}">${href}</a>`).join('')}</nav>` : '';
  return `<!DOCTYPE html>
<html>
<head>
  <title>${title}</title>
</head>
<body>
  ${nav}
  ${body}
  <footer>Footer text</footer>
</body>
</html>`;
}

export const testHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Test Page</title>
  <meta name="description" content="Test description">
  <style>body { color: red; }</style>
</head>
<body>
  <header>Site header</header>
  <nav><a href="/guide/install">Install</a><a href="#top">Top</a></nav>
  <h1>Test Heading</h1>
  <p>Test paragraph content.</p>
  <div class="main-content">
    <p>Main content area.</p>
  </div>
  <script>console.log('test');</script>
  <footer>Copyright</footer>
</body>
</html>
`;

export const testText = '# Test Heading\n\nTest paragraph content.\n\nMain content area.';

export const testSitemap = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url><loc>https://docs.example.test/guide/install</loc></url>
  <url><loc>https://docs.example.test/guide/usage</loc></url>
</urlset>`;

export const testSitemapIndex = `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <sitemap><loc>https://docs.example.test/sitemap-guide.xml</loc></sitemap>
</sitemapindex>`;

/**
 * Engine configuration for tests: no delay, no robots, no sitemap
 */
export function testEngineConfig(outDir: string, overrides: Partial<CrawlEngineConfig> = {}): CrawlEngineConfig {
  return {
    baseUrl: BASE_URL,
    outDir,
    maxPages: 100,
    maxDepth: 0,
    maxPending: 1000,
    allowedHosts: [],
    includePatterns: [],
    excludePatterns: [],
    userAgent: 'TestCrawler/1.0',
    delayMs: 0,
    timeoutMs: 1000,
    maxRetries: 0,
    retryBackoffMs: 0,
    respectRobots: false,
    useSitemap: false,
    sitemapUrls: [],
    chunkSize: 0,
    chunkOverlap: 0,
    minChars: 0,
    dedupKeyMode: 'content',
    outputFormats: ['min', 'full'],
    resume: false,
    saveHtml: false,
    saveText: false,
    heartbeatEvery: 0,
    concurrency: 1,
    ...overrides,
  };
}

export async function makeTempDir(prefix: string = 'corpus-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Non-empty lines of a text file ([] when missing)
 */
export async function readLines(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch {
    return [];
  }
  return raw.split('\n').filter((line) => line.length > 0);
}

export async function readJsonl(filePath: string): Promise<Array<Record<string, unknown>>> {
  const lines = await readLines(filePath);
  return lines.map((line) => {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Not a JSON object: ${line}`);
    }
    return { ...parsed };
  });
}
