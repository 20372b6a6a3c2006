/**
 * URL Normalization Utilities
 * Functions for normalizing URLs and checking crawl scope
 */

const ALLOWED_PROTOCOLS = ['http:', 'https:'];

// Resources that are never documentation pages
const NON_PAGE_EXTENSIONS = [
  '.png', '.jpg', '.jpeg', '.gif', '.svg', '.webp', '.ico', '.bmp',
  '.pdf', '.zip', '.tar', '.gz', '.tgz', '.7z', '.rar',
  '.mp4', '.mp3', '.webm', '.wav', '.mov',
  '.woff', '.woff2', '.ttf', '.eot', '.otf',
  '.css', '.js', '.mjs', '.map', '.json', '.xml', '.rss', '.atom',
  '.exe', '.dmg', '.whl', '.deb', '.rpm',
];

/**
 * Normalize a URL: resolve against a base, drop the fragment, sort query
 * params and remove the trailing slash (except for the root path).
 * Returns null when the URL cannot be parsed.
 */
export function normalizeUrl(url: string, baseUrl?: string): string | null {
  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(url.trim(), baseUrl) : new URL(url.trim());
  } catch {
    return null;
  }

  urlObj.hash = '';

  if (urlObj.search) {
    const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    );
    urlObj.search = '';
    sortedParams.forEach(([key, value]) => {
      urlObj.searchParams.append(key, value);
    });
  }

  const pathname = urlObj.pathname;
  if (pathname.length > 1 && pathname.endsWith('/')) {
    urlObj.pathname = pathname.replace(/\/+$/, '') || '/';
  }

  return urlObj.href;
}

export function hasAllowedProtocol(url: URL): boolean {
  return ALLOWED_PROTOCOLS.includes(url.protocol);
}

/**
 * Directory portion of the base URL path, without trailing slash.
 * `/doc/` and `/doc` both scope to `/doc`; `/doc/index.html` scopes to `/doc`.
 */
export function scopePath(baseUrl: URL): string {
  const path = baseUrl.pathname;
  const lastSegment = path.slice(path.lastIndexOf('/') + 1);
  const dir = lastSegment.includes('.') ? path.slice(0, path.lastIndexOf('/')) : path;
  return dir.replace(/\/+$/, '');
}

/**
 * Check whether a URL is the scope path itself or lies below it
 */
export function isWithinPath(url: URL, basePath: string): boolean {
  if (!basePath) {
    return true;
  }
  return url.pathname === basePath || url.pathname.startsWith(`${basePath}/`);
}

export function hasNonPageExtension(url: URL): boolean {
  const pathname = url.pathname.toLowerCase();
  return NON_PAGE_EXTENSIONS.some((ext) => pathname.endsWith(ext));
}

/**
 * Site root (`scheme://host`) of a URL
 */
export function siteRoot(url: string): string {
  const urlObj = new URL(url);
  return `${urlObj.protocol}//${urlObj.host}`;
}
