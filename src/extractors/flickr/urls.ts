/**
 * Flickr URL recognition and id extraction.
 */
import { InvalidURLError } from '../../errors.js';
import { compilePatterns } from '../../extract/utils.js';

/** Patterns the registry matches against (search, case-insensitive). */
export const FLICKR_URL_PATTERNS = compilePatterns([
  'flickr\\.com/photos/[^/]+/\\d+',
  'flickr\\.com/p/\\w+',
  'flic\\.kr/p/\\w+',
  'flickr\\.com/photos/[^/]+/albums/\\d+',
  'flickr\\.com/photos/[^/]+/sets/\\d+',
]);

export type FlickrUrlTarget = { type: 'photo'; id: string } | { type: 'album'; id: string };

// Collections first: an album URL also satisfies the looser photo pattern's prefix.
const ALBUM_PATTERNS = [/\/photos\/[^/]+\/(?:albums|sets)\/(\d+)/i];
const PHOTO_PATTERNS = [/\/photos\/[^/]+\/(\d+)/i];
const SHORT_LINK_PATTERN = /(?:flickr\.com|flic\.kr)\/p\/([A-Za-z0-9]+)/i;

const BASE58_ALPHABET = '123456789abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ';

/**
 * Decode a flic.kr short id to the numeric photo id.
 * Returns undefined when the id contains characters outside the alphabet.
 */
export function decodeBase58(shortId: string): string | undefined {
  let value = 0n;
  for (const char of shortId) {
    const digit = BASE58_ALPHABET.indexOf(char);
    if (digit === -1) return undefined;
    value = value * 58n + BigInt(digit);
  }
  return value.toString();
}

export function parseFlickrUrl(url: string): FlickrUrlTarget {
  for (const pattern of ALBUM_PATTERNS) {
    const match = pattern.exec(url);
    if (match) return { type: 'album', id: match[1] };
  }

  for (const pattern of PHOTO_PATTERNS) {
    const match = pattern.exec(url);
    if (match) return { type: 'photo', id: match[1] };
  }

  const shortLink = SHORT_LINK_PATTERN.exec(url);
  if (shortLink) {
    const id = decodeBase58(shortLink[1]);
    if (!id) throw new InvalidURLError(url, `Invalid Flickr short link id: ${shortLink[1]}`);
    return { type: 'photo', id };
  }

  throw new InvalidURLError(url, 'Could not extract a Flickr photo or album id from URL');
}
