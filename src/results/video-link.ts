// Ссылки на видео YouTube с позицией во времени.
import { toWholeSeconds } from './time.js';

const WATCH_URL = 'https://www.youtube.com/watch';

// Допустимый идентификатор видео без URL.
const BARE_ID_PATTERN = /^[\w-]+$/;

// Префиксы пути, после которых идёт идентификатор.
const PATH_PREFIXES = ['embed', 'shorts', 'live', 'v'];

function isYoutubeHost(host: string): boolean {
  return host === 'youtube.com' || host.endsWith('.youtube.com');
}

function parseUrl(reference: string): URL | null {
  const withScheme = /^[a-z]+:\/\//i.test(reference) ? reference : `https://${reference}`;
  try {
    return new URL(withScheme);
  } catch {
    return null;
  }
}

/**
 * Идентификатор видео из ссылки: watch?v=, youtu.be/<id>, /embed/<id>, /shorts/<id>
 * или сам идентификатор. Пустая строка, если идентификатор не найден.
 */
export function extractVideoId(reference: unknown): string {
  if (typeof reference !== 'string') {
    return '';
  }
  const trimmed = reference.trim();
  if (trimmed === '') {
    return '';
  }
  if (BARE_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }

  const url = parseUrl(trimmed);
  if (!url) {
    return '';
  }

  const host = url.hostname.toLowerCase();
  const segments = url.pathname.split('/').filter((segment) => segment.length > 0);
  let candidate: string | undefined;

  if (host === 'youtu.be' || host === 'www.youtu.be') {
    candidate = segments[0];
  } else if (isYoutubeHost(host)) {
    candidate = url.searchParams.get('v') ?? undefined;
    if (!candidate && segments.length >= 2 && PATH_PREFIXES.includes(segments[0] ?? '')) {
      candidate = segments[1];
    }
  }

  return candidate && BARE_ID_PATTERN.test(candidate) ? candidate : '';
}

// Ссылка на момент видео. Повторный вызов на результате даёт ту же ссылку.
export function buildDeepLink(reference: unknown, startSeconds: unknown): string {
  const videoId = extractVideoId(reference);
  if (!videoId) {
    return '';
  }
  return `${WATCH_URL}?v=${videoId}&t=${toWholeSeconds(startSeconds)}s`;
}
