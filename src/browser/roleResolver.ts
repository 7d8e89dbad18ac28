import type { BrowserLogger, ElementProbe, PageDriver, ResolvedElement, Role, RolePatternTable } from './types.js';
import { ROLE_PATTERNS } from './constants.js';
import { parseLocatorPattern } from './locator.js';
import { describeError } from '../errors.js';
import { previewText } from './utils.js';

export interface ResolveOptions {
  requireEnabled?: boolean;
}

/**
 * Maps a logical role to a live element by walking the role's locator patterns in priority
 * order. A miss is a normal outcome (`null`), not an error; best-effort by nature since the
 * target page changes without notice.
 */
export class RoleResolver {
  constructor(
    private readonly page: PageDriver,
    private readonly patterns: RolePatternTable = ROLE_PATTERNS,
    private readonly logger?: BrowserLogger,
  ) {}

  patternsFor(role: Role): readonly string[] {
    return this.patterns[role];
  }

  async resolve(role: Role, { requireEnabled = true }: ResolveOptions = {}): Promise<ResolvedElement | null> {
    for (const pattern of this.patterns[role]) {
      const probes = await this.probe(role, pattern);
      const hit = probes.find((probe) => probe.visible && (!requireEnabled || probe.enabled));
      if (hit) {
        this.trace(`${role}: matched ${pattern} [${hit.index}] ${describeProbe(hit)}`);
        return toResolved(role, pattern, hit);
      }
    }
    this.trace(`${role}: no visible match`);
    return null;
  }

  /** Visible matches of the first pattern that has any, in document order. */
  async resolveAll(role: Role, { requireEnabled = false }: ResolveOptions = {}): Promise<ResolvedElement[]> {
    for (const pattern of this.patterns[role]) {
      const probes = await this.probe(role, pattern);
      const hits = probes.filter((probe) => probe.visible && (!requireEnabled || probe.enabled));
      if (hits.length > 0) {
        return hits.map((probe) => toResolved(role, pattern, probe));
      }
    }
    return [];
  }

  /** Every match of one pattern, visible or not; used by UI discovery. */
  async probe(role: Role, pattern: string): Promise<ElementProbe[]> {
    try {
      return await this.page.queryAll(parseLocatorPattern(pattern));
    } catch (error) {
      this.trace(`${role}: pattern ${pattern} failed (${describeError(error)})`);
      return [];
    }
  }

  private trace(message: string): void {
    if (this.logger?.verbose) {
      this.logger(`[resolver] ${message}`);
    }
  }
}

function toResolved(role: Role, pattern: string, probe: ElementProbe): ResolvedElement {
  return {
    role,
    pattern,
    handle: { query: parseLocatorPattern(pattern), index: probe.index },
    visible: probe.visible,
    enabled: probe.enabled,
    tag: probe.tag,
    label: probe.label,
    text: probe.text,
  };
}

function describeProbe(probe: ElementProbe): string {
  const parts = [`<${probe.tag}>`];
  if (probe.label) parts.push(`aria-label="${probe.label}"`);
  if (probe.text) parts.push(`"${previewText(probe.text, 40)}"`);
  return parts.join(' ');
}

export function describeElement(element: ResolvedElement): string {
  const parts = [`${element.role} via ${element.pattern}`, `<${element.tag}>`];
  if (element.label) parts.push(`aria-label="${element.label}"`);
  if (element.text) parts.push(`"${previewText(element.text, 50)}"`);
  if (!element.enabled) parts.push('(disabled)');
  return parts.join(' ');
}
