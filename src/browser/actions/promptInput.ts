import type { BrowserLogger, PageDriver } from '../types.js';
import type { RoleResolver } from '../roleResolver.js';
import { describeElement } from '../roleResolver.js';
import type { SpeechInjector } from '../../speech/index.js';
import type { InputMode } from '../../config.js';
import { delay } from '../utils.js';
import { describeError } from '../../errors.js';
import { detectUiError } from './uiErrors.js';

export type InputChannel = 'voice' | 'text';

export type SubmitResult = { ok: true; channel: InputChannel } | { ok: false; reason: string };

export interface PromptInputOptions {
  inputMode: InputMode;
  maxRetries: number;
  retryDelayMs: number;
  audioWaitMs: number;
  transcriptionWaitMs: number;
  inputSettleMs: number;
  benignErrorMarker: string;
  /** Pause after clicking the exit-voice control. */
  exitVoiceWaitMs?: number;
}

export interface PromptInputDeps {
  sleep?: (ms: number) => Promise<void>;
}

/** Voice-first prompt submission with a typed-text fallback; one channel wins per prompt. */
export class PromptInput {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly page: PageDriver,
    private readonly resolver: RoleResolver,
    private readonly speech: SpeechInjector | null,
    private readonly options: PromptInputOptions,
    private readonly logger: BrowserLogger,
    deps: PromptInputDeps = {},
  ) {
    this.sleep = deps.sleep ?? delay;
  }

  async submit(text: string): Promise<SubmitResult> {
    if (this.options.inputMode === 'voice' && this.speech) {
      if (await this.activateVoiceMode()) {
        if (await this.speak(text)) {
          return { ok: true, channel: 'voice' };
        }
        this.logger('TTS failed, falling back to text');
        await this.exitVoiceMode();
      } else {
        this.logger('Voice mode unavailable, using text input');
      }
    }
    if (await this.sendText(text)) {
      return { ok: true, channel: 'text' };
    }
    return { ok: false, reason: 'Failed to send input after retries' };
  }

  async activateVoiceMode(): Promise<boolean> {
    const { maxRetries } = this.options;
    for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
      const button = await this.resolver.resolve('voiceButton');
      if (button) {
        this.trace(`Found ${describeElement(button)}`);
        try {
          await this.page.click(button.handle);
          await this.sleep(this.options.audioWaitMs);
          const uiError = await detectUiError(this.resolver, this.options.benignErrorMarker);
          if (!uiError) {
            this.logger('Voice mode activated');
            return true;
          }
          this.logger(`Voice mode error: ${uiError}`);
        } catch (error) {
          this.logger(`Voice button click failed: ${describeError(error)}`);
        }
      } else {
        this.logger('Voice button not found');
      }
      if (attempt < maxRetries) {
        await this.sleep(this.options.retryDelayMs);
      }
    }
    return false;
  }

  /** Leaves voice mode when its exit control is showing; absent control means already out. */
  async exitVoiceMode(): Promise<boolean> {
    const { maxRetries } = this.options;
    for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
      const button = await this.resolver.resolve('exitVoiceButton');
      if (!button) {
        this.trace('Not in voice mode (no exit control)');
        return true;
      }
      try {
        await this.page.click(button.handle);
        await this.sleep(this.options.exitVoiceWaitMs ?? 2_000);
        this.logger('Exited voice mode');
        return true;
      } catch (error) {
        this.logger(`Exit voice button click failed: ${describeError(error)}`);
      }
      if (attempt < maxRetries) {
        await this.sleep(this.options.retryDelayMs);
      }
    }
    return false;
  }

  async sendText(text: string): Promise<boolean> {
    const { maxRetries } = this.options;
    for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
      const input = await this.resolver.resolve('textInput');
      if (input) {
        this.trace(`Found ${describeElement(input)}`);
        try {
          await this.page.fill(input.handle, text);
          await this.page.pressEnter();
          await this.sleep(this.options.inputSettleMs);
          const uiError = await detectUiError(this.resolver, this.options.benignErrorMarker);
          if (!uiError) {
            this.logger('Text input sent');
            return true;
          }
          this.logger(`Text input error: ${uiError}`);
        } catch (error) {
          this.logger(`Text input failed: ${describeError(error)}`);
        }
      } else {
        this.logger('Text input not found');
      }
      if (attempt < maxRetries) {
        await this.sleep(this.options.retryDelayMs);
      }
    }
    return false;
  }

  private async speak(text: string): Promise<boolean> {
    if (!this.speech) {
      return false;
    }
    try {
      await this.speech.speak(text);
    } catch (error) {
      this.logger(`Error with TTS: ${describeError(error)}`);
      return false;
    }
    this.logger('Waiting for transcription to complete...');
    await this.sleep(this.options.transcriptionWaitMs);
    return true;
  }

  private trace(message: string): void {
    if (this.logger.verbose) {
      this.logger(message);
    }
  }
}
