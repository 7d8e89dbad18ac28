import { z } from 'zod';
import type { ChromeClient, ElementHandleRef, ElementProbe, LocatorQuery, PageDriver } from './types.js';
import { ENTER_KEY_EVENT, ENTER_KEY_TEXT } from './constants.js';
import {
  buildClickTargetExpression,
  buildDomClickExpression,
  buildFocusAndClearExpression,
  buildProbeExpression,
  formatLocatorQuery,
} from './locator.js';
import { delay } from './utils.js';

const probeListSchema = z.array(
  z.object({
    index: z.number().int(),
    tag: z.string(),
    visible: z.boolean(),
    enabled: z.boolean(),
    text: z.string(),
    label: z.string(),
    placeholder: z.string(),
    className: z.string(),
  }),
);

const clickTargetSchema = z.union([
  z.object({ found: z.literal(false) }),
  z.object({ found: z.literal(true), x: z.number(), y: z.number(), width: z.number(), height: z.number() }),
]);

const focusResultSchema = z.object({ focused: z.boolean() });

export interface CdpPageDriverOptions {
  /** Upper bound for `document.readyState` after navigate/reload. */
  readyTimeoutMs?: number;
}

/** PageDriver over a CDP client attached to one tab. */
export class CdpPageDriver implements PageDriver {
  private readonly readyTimeoutMs: number;

  constructor(
    private readonly client: ChromeClient,
    options: CdpPageDriverOptions = {},
  ) {
    this.readyTimeoutMs = options.readyTimeoutMs ?? 30_000;
  }

  async queryAll(query: LocatorQuery): Promise<ElementProbe[]> {
    const value = await this.evaluate(buildProbeExpression(query), `query ${formatLocatorQuery(query)}`);
    return probeListSchema.parse(value);
  }

  async click(handle: ElementHandleRef): Promise<void> {
    const target = clickTargetSchema.parse(
      await this.evaluate(buildClickTargetExpression(handle), `locate ${formatLocatorQuery(handle.query)}`),
    );
    if (!target.found) {
      throw new Error(`Element ${formatLocatorQuery(handle.query)} [${handle.index}] is no longer on the page.`);
    }
    if (target.width <= 0 || target.height <= 0) {
      await this.evaluate(buildDomClickExpression(handle), 'dispatch click');
      return;
    }
    const x = Math.max(0, target.x);
    const y = Math.max(0, target.y);
    const { Input } = this.client;
    await Input.dispatchMouseEvent({ type: 'mouseMoved', x, y, button: 'left' });
    await Input.dispatchMouseEvent({ type: 'mousePressed', x, y, button: 'left', clickCount: 1 });
    await Input.dispatchMouseEvent({ type: 'mouseReleased', x, y, button: 'left', clickCount: 1 });
  }

  async fill(handle: ElementHandleRef, text: string): Promise<void> {
    await this.click(handle);
    const focus = focusResultSchema.parse(await this.evaluate(buildFocusAndClearExpression(handle), 'focus input'));
    if (!focus.focused) {
      throw new Error(`Failed to focus ${formatLocatorQuery(handle.query)} before typing.`);
    }
    await this.client.Input.insertText({ text });
  }

  async pressEnter(): Promise<void> {
    const { Input } = this.client;
    await Input.dispatchKeyEvent({ type: 'keyDown', ...ENTER_KEY_EVENT, text: ENTER_KEY_TEXT, unmodifiedText: ENTER_KEY_TEXT });
    await Input.dispatchKeyEvent({ type: 'keyUp', ...ENTER_KEY_EVENT });
  }

  async currentUrl(): Promise<string> {
    const value = await this.evaluate('location.href', 'read location');
    return typeof value === 'string' ? value : '';
  }

  async navigate(url: string): Promise<void> {
    const { errorText } = await this.client.Page.navigate({ url });
    if (errorText) {
      throw new Error(`Navigation to ${url} failed: ${errorText}`);
    }
    await this.waitForDocumentReady();
  }

  async reload(): Promise<void> {
    await this.client.Page.reload({ ignoreCache: false });
    await this.waitForDocumentReady();
  }

  async waitForDocumentReady(): Promise<void> {
    const deadline = Date.now() + this.readyTimeoutMs;
    while (Date.now() < deadline) {
      const state = await this.evaluate('document.readyState', 'read readyState').catch(() => null);
      if (state === 'complete' || state === 'interactive') {
        return;
      }
      await delay(100);
    }
    throw new Error('Page did not reach ready state in time.');
  }

  private async evaluate(expression: string, label: string): Promise<unknown> {
    const { result, exceptionDetails } = await this.client.Runtime.evaluate({
      expression,
      returnByValue: true,
      awaitPromise: true,
    });
    if (exceptionDetails) {
      const detail = exceptionDetails.exception?.description ?? exceptionDetails.text;
      throw new Error(`Page script failed (${label}): ${detail}`);
    }
    const value: unknown = result.value;
    return value;
  }
}
