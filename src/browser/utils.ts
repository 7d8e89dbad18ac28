export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  onRetry?: (attempt: number, error: unknown) => void;
  sleep?: (ms: number) => Promise<void>;
}

/** Runs `task` up to `retries + 1` times with a fixed pause between attempts. */
export async function withRetries<T>(task: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, delayMs = 250, onRetry, sleep = delay } = options;
  let attempt = 0;
  while (attempt <= retries) {
    try {
      return await task(attempt + 1);
    } catch (error) {
      if (attempt === retries) {
        throw error;
      }
      attempt += 1;
      onRetry?.(attempt, error);
      await sleep(delayMs);
    }
  }
  throw new Error('withRetries exhausted without result');
}

/**
 * Normalizes a site URL, ensuring it is absolute, uses http/https, and trims whitespace.
 * Falls back to the provided default when input is empty/undefined.
 */
export function normalizeSiteUrl(raw: string | null | undefined, fallback: string): string {
  const candidate = raw?.trim();
  if (!candidate) {
    return fallback;
  }
  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(candidate);
  const withScheme = hasScheme ? candidate : `https://${candidate}`;
  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new Error(`Invalid site URL: "${raw}". Provide an absolute http(s) URL.`);
  }
  if (!/^https?:$/i.test(parsed.protocol)) {
    throw new Error(`Invalid site URL protocol: "${parsed.protocol}". Use http or https.`);
  }
  return parsed.toString();
}

/** True when `url` is the landing page of `siteUrl` (same origin, root path, no query). */
export function isSiteRoot(url: string, siteUrl: string): boolean {
  try {
    const current = new URL(url);
    const site = new URL(siteUrl);
    return current.origin === site.origin && (current.pathname === '/' || current.pathname === '') && !current.search;
  } catch {
    return false;
  }
}

export function isSameSite(url: string, siteUrl: string): boolean {
  try {
    return new URL(url).hostname.toLowerCase() === new URL(siteUrl).hostname.toLowerCase();
  } catch {
    return false;
  }
}

export function previewText(text: string, max: number): string {
  const flattened = text.replace(/\s+/g, ' ').trim();
  return flattened.length > max ? `${flattened.slice(0, max)}...` : flattened;
}

/**
 * Rejects with `label` when `promise` has not settled after `ms`; the work itself is not cancelled.
 * `onLateResult` receives a value that arrives after the timeout, so resources it holds can be released.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  onLateResult?: (value: T) => Promise<void> | void,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new Error(`${label} timed out after ${ms}ms`));
    }, ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    if (timedOut && onLateResult) {
      promise.then(onLateResult).catch(() => undefined);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
