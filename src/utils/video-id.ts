/**
 * @fileoverview Normalizes the many ways a video can be referenced (watch,
 * short-link, embed and shorts URLs, or a bare ID) to the 11-character ID.
 */

const VIDEO_ID_IN_URL = /(?:[?&]v=|\/v\/|youtu\.be\/|\/embed\/|\/shorts\/)([A-Za-z0-9_-]{11})(?![A-Za-z0-9_-])/;
const BARE_VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

/**
 * @returns The video ID, or null when none can be found.
 *
 * @example
 * extractVideoId('https://youtu.be/abcdefghijk?t=42'); // 'abcdefghijk'
 * extractVideoId('not a video');                       // null
 */
export function extractVideoId(input: string): string | null {
  const candidate = input.trim();
  if (isVideoId(candidate)) {
    return candidate;
  }
  const match = VIDEO_ID_IN_URL.exec(candidate);
  return match ? match[1] : null;
}

export function isVideoId(value: string): boolean {
  return BARE_VIDEO_ID.test(value);
}
