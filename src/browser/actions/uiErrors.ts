import type { RoleResolver } from '../roleResolver.js';
import { RATE_LIMIT_MARKERS } from '../constants.js';

// A banner mentioning the product name is treated as chrome (e.g. "Grok can make mistakes"),
// not as a failure. This is a heuristic: a real error that names the product is missed.
export function isBenignBanner(text: string, benignMarker: string): boolean {
  const marker = benignMarker.trim().toLowerCase();
  return marker.length > 0 && text.toLowerCase().includes(marker);
}

export function isRateLimitMessage(text: string): boolean {
  const lowered = text.toLowerCase();
  return RATE_LIMIT_MARKERS.some((marker) => lowered.includes(marker));
}

/** First visible, non-empty, non-benign error banner text, or `null`. */
export async function detectUiError(resolver: RoleResolver, benignMarker: string): Promise<string | null> {
  const banners = await resolver.resolveAll('errorBanner');
  for (const banner of banners) {
    const text = banner.text.trim();
    if (text && !isBenignBanner(text, benignMarker)) {
      return text;
    }
  }
  return null;
}
