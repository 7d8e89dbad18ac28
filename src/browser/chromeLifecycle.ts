import CDP from 'chrome-remote-interface';
import type { BrowserLogger, ChromeClient, PageDriver } from './types.js';
import { CdpPageDriver } from './cdpPageDriver.js';
import { isSameSite, withRetries, withTimeout } from './utils.js';
import { AutomationError, describeError } from '../errors.js';

export interface SiteTabOptions {
  chromeHost: string;
  chromePort: number;
  siteUrl: string;
  maxRetries: number;
  retryDelayMs: number;
  /** Bound on each CDP step (listing targets, attaching, the responsiveness probe). */
  stepTimeoutMs?: number;
}

export interface TargetSummary {
  id: string;
  type: string;
  url: string;
}

export interface SiteTabConnection {
  driver: PageDriver;
  targetId: string;
  /** Detaches the protocol client; the tab itself stays open. */
  close: () => Promise<void>;
}

export interface ChromeConnectDeps {
  listTargets?: (host: string, port: number) => Promise<TargetSummary[]>;
  openTarget?: (host: string, port: number, url: string) => Promise<TargetSummary>;
  attach?: (host: string, port: number, targetId: string) => Promise<ChromeClient>;
  sleep?: (ms: number) => Promise<void>;
}

export const CONNECT_TROUBLESHOOTING = [
  'Make sure Chrome is running with --remote-debugging-port=<port>',
  'Check that the DevTools port is reachable and not used by another process',
  'Try closing and restarting Chrome',
  'Make sure you are logged into the site in that Chrome profile',
];

/** First page target already on the site, preferring the site root. */
export function pickSiteTarget(targets: TargetSummary[], siteUrl: string): TargetSummary | undefined {
  const pages = targets.filter((target) => target.type === 'page' && isSameSite(target.url, siteUrl));
  return pages.find((target) => stripTrailingSlash(target.url) === stripTrailingSlash(siteUrl)) ?? pages[0];
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

const defaultDeps: Required<Omit<ChromeConnectDeps, 'sleep'>> = {
  listTargets: async (host, port) => {
    const targets = await CDP.List({ host, port });
    return targets.map((target) => ({ id: target.id, type: target.type, url: target.url }));
  },
  openTarget: async (host, port, url) => {
    const target = await CDP.New({ host, port, url });
    return { id: target.id, type: target.type, url: target.url };
  },
  attach: (host, port, targetId) => CDP({ host, port, target: targetId }),
};

/**
 * Attaches to the user's running Chrome: reuses a tab on the site or opens one, enables the
 * domains the driver needs and brings the tab forward. An unresponsive tab is replaced by a
 * fresh one. Never launches Chrome and never closes the tab.
 */
export async function connectToSiteTab(
  options: SiteTabOptions,
  logger: BrowserLogger,
  deps: ChromeConnectDeps = {},
): Promise<SiteTabConnection> {
  const { chromeHost: host, chromePort: port, siteUrl } = options;
  const stepTimeoutMs = options.stepTimeoutMs ?? 10_000;
  const listTargets = deps.listTargets ?? defaultDeps.listTargets;
  const openTarget = deps.openTarget ?? defaultDeps.openTarget;
  const attach = deps.attach ?? defaultDeps.attach;

  const prepare = async (targetId: string, fresh: boolean): Promise<SiteTabConnection> => {
    const client = await withTimeout(attach(host, port, targetId), stepTimeoutMs, 'Attaching to tab', (late) =>
      late.close(),
    );
    const close = async () => {
      await client.close();
    };
    try {
      await Promise.all([client.Page.enable(), client.Runtime.enable()]);
      await client.Page.bringToFront();
      const driver = new CdpPageDriver(client);
      if (fresh) {
        await driver.waitForDocumentReady();
      } else {
        await withTimeout(driver.currentUrl(), stepTimeoutMs, 'Tab responsiveness check');
      }
      return { driver, targetId, close };
    } catch (error) {
      await close().catch(() => undefined);
      throw error;
    }
  };

  const connectOnce = async (attempt: number): Promise<SiteTabConnection> => {
    logger(`Connecting to Chrome via CDP at ${host}:${port} (attempt ${attempt}/${options.maxRetries})...`);
    const targets = await withTimeout(listTargets(host, port), stepTimeoutMs, 'Listing Chrome targets');
    const existing = pickSiteTarget(targets, siteUrl);
    if (existing) {
      logger(`Using existing tab ${existing.url}`);
      try {
        return await prepare(existing.id, false);
      } catch (error) {
        logger(`Existing tab seems unresponsive (${describeError(error)}); creating a new tab...`);
      }
    } else {
      logger('No site tab found, creating a new one...');
    }
    const created = await withTimeout(openTarget(host, port, siteUrl), stepTimeoutMs, 'Opening a new tab');
    return prepare(created.id, true);
  };

  try {
    const connection = await withRetries(connectOnce, {
      retries: Math.max(0, options.maxRetries - 1),
      delayMs: options.retryDelayMs,
      sleep: deps.sleep,
      onRetry: (attempt, error) => {
        logger(`Failed to connect to Chrome (attempt ${attempt}): ${describeError(error)}`);
        logger(`Retrying in ${Math.round(options.retryDelayMs / 1000)} seconds...`);
      },
    });
    logger('Chrome connection established successfully');
    return connection;
  } catch (error) {
    throw new AutomationError(
      `Could not connect to Chrome at ${host}:${port} after ${options.maxRetries} attempts: ${describeError(error)}`,
      { stage: 'connect', code: 'chrome-unreachable', details: { hints: CONNECT_TROUBLESHOOTING } },
      error,
    );
  }
}
