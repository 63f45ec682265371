import { InvalidVideoReference } from '../utils/errors.js';

const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

function fromUrl(url: URL): string | undefined {
  const host = url.hostname.toLowerCase();
  const segments = url.pathname.split('/').filter(Boolean);

  if (host === 'youtu.be' || host.endsWith('.youtu.be')) return segments[0];

  const v = url.searchParams.get('v');
  if (v) return v;

  const marker = segments.findIndex((s) => s === 'embed' || s === 'shorts' || s === 'live');
  return marker === -1 ? undefined : segments[marker + 1];
}

/**
 * Accepts `youtu.be/<id>`, `watch?v=<id>`, `/embed/<id>`, `/shorts/<id>` URLs or a bare id.
 */
export function extractVideoId(reference: string): string {
  const trimmed = reference.trim();
  if (VIDEO_ID.test(trimmed)) return trimmed;

  let url: URL;
  try {
    url = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
  } catch {
    throw new InvalidVideoReference(reference);
  }

  const id = fromUrl(url);
  if (!id || !VIDEO_ID.test(id)) throw new InvalidVideoReference(reference);
  return id;
}
