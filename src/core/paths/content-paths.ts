/**
 * Path derivation for content-change triggers
 */

/**
 * Paths to invalidate when the page at `url` changes: the page itself and
 * everything below it.
 *
 * Accepts absolute URLs and site-relative paths.
 *
 * @example
 * ```ts
 * pathsForUrl('https://example.com/blog/hello/');
 * // ['/blog/hello/', '/blog/hello/*']
 * ```
 */
export function pathsForUrl(url: string): string[] {
  let pathname: string;

  try {
    pathname = new URL(url, 'http://localhost').pathname;
  } catch {
    pathname = '/';
  }

  if (pathname === '') {
    pathname = '/';
  }

  return [pathname, `${pathname}*`];
}

/**
 * Collect the paths of several changed URLs, without duplicates
 */
export function collectContentPaths(urls: readonly string[]): string[] {
  const paths = new Set<string>();

  for (const url of urls) {
    for (const path of pathsForUrl(url)) {
      paths.add(path);
    }
  }

  return [...paths];
}
