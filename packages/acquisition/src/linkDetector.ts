/**
 * Link Detection
 *
 * Pulls media links out of free text and works out the filename a link
 * will be saved under, from the url and the headers of a HEAD probe.
 */

import { posix } from 'node:path';
import { MEDIA_EXTENSIONS, type MediaExtension } from '@reeldrop/core';

const URL_PATTERN = /https?:\/\/[^\s",]+/gi;

/**
 * Every http(s) url in `text`, de-duplicated, in order of first appearance
 */
export function extractUrls(text: string): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];

  for (const match of text.matchAll(URL_PATTERN)) {
    const url = match[0];
    if (!seen.has(url)) {
      seen.add(url);
      urls.push(url);
    }
  }

  return urls;
}

/**
 * Whether the url itself names the extension: `.../file.mkv`, or a
 * trailing `/mkv` path segment (optionally followed by a query or fragment).
 */
export function urlMatchesExtension(url: string, extension: string): boolean {
  const u = url.toLowerCase();
  const ext = extension.toLowerCase();

  return u.endsWith(`.${ext}`)
    || u.endsWith(`/${ext}`)
    || u.includes(`/${ext}?`)
    || u.includes(`/${ext}#`);
}

function stripQuery(url: string): string {
  return url.split('?', 1)[0]?.split('#', 1)[0] ?? '';
}

function headerLines(headers: string, name: string): string[] {
  const prefix = `${name.toLowerCase()}:`;
  return headers
    .split(/\r?\n/)
    .filter(line => line.toLowerCase().startsWith(prefix))
    .map(line => line.slice(prefix.length).trim());
}

/**
 * Filename from a Content-Disposition header, if any
 */
export function parseDispositionFilename(headers: string): string | null {
  for (const value of headerLines(headers, 'content-disposition')) {
    const extended = /filename\*=(?:UTF-8|utf-8)''([^;]+)/.exec(value);
    if (extended?.[1]) {
      return posix.basename(decodeURIComponent(extended[1].trim()));
    }

    const index = value.toLowerCase().indexOf('filename=');
    if (index !== -1) {
      const raw = value.slice(index + 'filename='.length).split(';', 1)[0] ?? '';
      const name = raw.trim().replace(/^["']+|["']+$/g, '');
      if (name) {
        return posix.basename(name);
      }
    }
  }
  return null;
}

/**
 * Target of the last redirect in a redirect chain
 */
export function parseFinalLocation(headers: string): string | null {
  return headerLines(headers, 'location').at(-1) ?? null;
}

/**
 * Basename of the last redirect target, without query or fragment
 */
export function parseRedirectBasename(headers: string): string | null {
  const location = parseFinalLocation(headers);
  if (!location) {
    return null;
  }
  const name = posix.basename(stripQuery(location));
  return name || null;
}

/**
 * The last valid Content-Length in the chain (the one after redirects)
 */
export function parseContentLength(headers: string): number | null {
  let size: number | null = null;
  for (const value of headerLines(headers, 'content-length')) {
    if (/^\d+$/.test(value)) {
      size = Number.parseInt(value, 10);
    }
  }
  return size;
}

/**
 * Filename as the server or url presents it, before normalization
 */
export function rawFilename(url: string, headers: string): string {
  return parseDispositionFilename(headers)
    ?? parseRedirectBasename(headers)
    ?? posix.basename(stripQuery(url));
}

function isMediaExtension(value: string): value is MediaExtension {
  return MEDIA_EXTENSIONS.some(ext => ext === value);
}

/**
 * Filename a link is saved under, with its extension normalized to `extension`.
 * A bare `mkv`/`mp4` name falls back to the parent path segment.
 */
export function inferFilename(url: string, headers: string, extension: MediaExtension): string {
  let name = rawFilename(url, headers);

  if (name === '' || isMediaExtension(name.toLowerCase())) {
    const parts = stripQuery(url).split('/');
    const parent = parts.length >= 2 ? parts[parts.length - 2] : undefined;
    name = `${parent || 'download'}.${extension}`;
  }

  const ext = posix.extname(name);
  const bare = ext.toLowerCase().replace(/^\./, '');

  if (!isMediaExtension(bare)) {
    name = `${name}.${extension}`;
  } else if (bare !== extension) {
    name = `${name.slice(0, -ext.length)}.${extension}`;
  }

  return posix.basename(name);
}
