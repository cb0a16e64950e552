import path from 'node:path';

export function sleep(ms: number) {
  return new Promise((res) => setTimeout(res, ms));
}

export function sanitizeFilename(input: string): string {
  const base = input
    .replace(/[\/\\:*?"<>|]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
  return base || 'file';
}

export function ensureAbsoluteUrl(baseUrl: string, href: string | undefined | null): string | null {
  if (!href) return null;
  try {
    const url = new URL(href, baseUrl);
    return url.toString();
  } catch {
    return null;
  }
}

export function urlBasename(urlStr: string): string {
  try {
    const u = new URL(urlStr);
    const last = path.posix.basename(u.pathname);
    return safeDecode(last) || 'file';
  } catch {
    return 'file';
  }
}

// Local filename for a remote document: last path segment, decoded and made filesystem-safe
export function filenameFromUrl(urlStr: string): string {
  return sanitizeFilename(urlBasename(urlStr));
}

export function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const n = parseInt(value, 10);
  return Number.isFinite(n) ? n : fallback;
}

export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, Math.max(0, max - 1)) + '…';
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
