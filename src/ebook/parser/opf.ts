import { posix } from 'node:path';
import * as cheerio from 'cheerio';
import type { ContentItemType, ManifestItem, OpfManifest } from '../types';

export function findOpfPath(containerXml: string): string {
  const $ = cheerio.load(containerXml, { xml: true });
  const opfPath = $('rootfile').first().attr('full-path');

  if (!opfPath) {
    throw new Error('Invalid EPUB: Cannot find OPF file path');
  }

  return opfPath;
}

export function parseOpf(opfContent: string, opfPath: string): OpfManifest {
  const $ = cheerio.load(opfContent, { xml: true });

  const titles = $('dc\\:title').toArray().map((element) => $(element).text());
  const creators = $('dc\\:creator').toArray().map((element) => $(element).text());

  const items: ManifestItem[] = [];
  $('manifest > item').each((_, element) => {
    const item = $(element);
    const id = item.attr('id');
    const href = item.attr('href');

    if (id && href) {
      items.push({ id, href, mediaType: item.attr('media-type') ?? '' });
    }
  });

  return {
    metadata: { titles, creators },
    items,
    baseDir: getBaseDir(opfPath),
  };
}

export function getBaseDir(opfPath: string): string {
  const parts = opfPath.split('/');
  if (parts.length > 1) {
    return parts.slice(0, -1).join('/') + '/';
  }
  return '';
}

/** Archive path of a manifest href, which is relative to the OPF file and may be percent-encoded. */
export function resolveItemPath(baseDir: string, href: string): string {
  return posix.normalize(baseDir + decodeHref(href));
}

function decodeHref(href: string): string {
  try {
    return decodeURIComponent(href);
  } catch {
    return href;
  }
}

export function classifyMediaType(mediaType: string): ContentItemType {
  const normalized = mediaType.toLowerCase();

  if (normalized === 'application/xhtml+xml' || normalized === 'text/html') {
    return 'document';
  }
  if (normalized === 'application/x-dtbncx+xml') {
    return 'navigation';
  }
  if (normalized === 'text/css') {
    return 'style';
  }
  if (normalized.startsWith('image/')) {
    return 'image';
  }
  if (normalized.startsWith('font/') || normalized.includes('opentype') || normalized.includes('font-')) {
    return 'font';
  }
  return 'other';
}
