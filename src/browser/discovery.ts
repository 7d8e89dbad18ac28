import fs from 'node:fs/promises';
import path from 'node:path';
import type { BrowserLogger, ConversationState, PageDriver, Role } from './types.js';
import { ROLES } from './types.js';
import type { RoleResolver } from './roleResolver.js';
import { readConversationState } from './actions/conversation.js';
import { previewText } from './utils.js';

export interface DiscoveredElement {
  pattern: string;
  index: number;
  tag: string;
  enabled: boolean;
  text: string;
  aria_label: string;
  placeholder: string;
  class: string;
}

export type PageStateLabel = 'new_conversation' | 'thread_view' | 'unknown';

export interface DiscoveryReport {
  timestamp: string;
  url: string;
  detected_state: PageStateLabel;
  /** Keyed like `role_patterns` in the config file so working patterns can be copied over. */
  roles: Record<string, DiscoveredElement[]>;
}

export function configKeyForRole(role: Role): string {
  return role.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function pageStateLabel(state: ConversationState): PageStateLabel {
  switch (state) {
    case 'empty':
      return 'new_conversation';
    case 'populated':
      return 'thread_view';
    default:
      return 'unknown';
  }
}

/** Probes every configured pattern of every role and reports the visible matches. */
export async function discoverUi(
  page: PageDriver,
  resolver: RoleResolver,
  logger: BrowserLogger,
  now: () => Date = () => new Date(),
): Promise<DiscoveryReport> {
  const roles: Record<string, DiscoveredElement[]> = {};
  for (const role of ROLES) {
    logger(`=== ${role} ===`);
    const found: DiscoveredElement[] = [];
    for (const pattern of resolver.patternsFor(role)) {
      const probes = await resolver.probe(role, pattern);
      for (const probe of probes) {
        if (!probe.visible) continue;
        found.push({
          pattern,
          index: probe.index,
          tag: probe.tag,
          enabled: probe.enabled,
          text: probe.text.slice(0, 100),
          aria_label: probe.label,
          placeholder: probe.placeholder,
          class: probe.className,
        });
        logger(`Found: ${pattern} - ${probe.tag} - '${previewText(probe.text, 50)}' - '${probe.label}'`);
      }
    }
    logger(`Found ${found.length} visible ${role} candidates`);
    roles[configKeyForRole(role)] = found;
  }
  return {
    timestamp: now().toISOString(),
    url: await page.currentUrl(),
    detected_state: pageStateLabel(await readConversationState(resolver)),
    roles,
  };
}

const pad = (value: number) => String(value).padStart(2, '0');

/** `grok_ui_<state>_YYYYMMDD_HHMMSS.json` in local time. */
export function discoveryFilename(state: PageStateLabel, date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `grok_ui_${state}_${day}_${time}.json`;
}

export async function saveDiscoveryReport(report: DiscoveryReport, dir: string, date: Date = new Date()): Promise<string> {
  const filePath = path.join(dir, discoveryFilename(report.detected_state, date));
  await fs.writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  return filePath;
}
