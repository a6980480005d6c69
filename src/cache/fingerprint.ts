export const SMALL_CONTENT_THRESHOLD = 512;
export const SMALL_CONTENT_PREFIX = 64;
export const SAMPLE_STRIDE = 16;
export const MAX_SAMPLES = 512;

/**
 * Cheap cache key for document content. Not collision free and not meant to be:
 * short content is keyed by length and prefix, longer content by a 32-bit rolling
 * hash over every 16th character (at most 512 samples) plus the length.
 */
export function fingerprint(content: string): string {
  const length = content.length;
  if (length < SMALL_CONTENT_THRESHOLD) {
    return `${length}:${content.slice(0, SMALL_CONTENT_PREFIX)}`;
  }

  let hash = length >>> 0;
  let samples = 0;
  for (let index = 0; index < length && samples < MAX_SAMPLES; index += SAMPLE_STRIDE) {
    hash = (Math.imul(hash, 31) + content.charCodeAt(index)) >>> 0;
    samples += 1;
  }
  return `${length}:${hash.toString(16)}`;
}
