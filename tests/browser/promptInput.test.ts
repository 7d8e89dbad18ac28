import { describe, expect, test } from 'vitest';
import { PromptInput, type PromptInputOptions } from '../../src/browser/actions/promptInput.js';
import { RoleResolver } from '../../src/browser/roleResolver.js';
import type { SpeechInjector } from '../../src/speech/index.js';
import { FakePage, TEST_PATTERNS, createFakeClock, createRecordingLogger } from '../helpers/fakePage.js';

const options: PromptInputOptions = {
  inputMode: 'voice',
  maxRetries: 2,
  retryDelayMs: 100,
  audioWaitMs: 3_000,
  transcriptionWaitMs: 3_000,
  inputSettleMs: 1_000,
  benignErrorMarker: 'grok',
};

function recordingSpeech(fail = false): SpeechInjector & { spoken: string[] } {
  const spoken: string[] = [];
  return {
    spoken,
    speak: async (text: string) => {
      if (fail) {
        throw new Error('synthesis offline');
      }
      spoken.push(text);
    },
  };
}

function setup(page: FakePage, speech: SpeechInjector | null, overrides: Partial<PromptInputOptions> = {}) {
  const clock = createFakeClock();
  const logger = createRecordingLogger();
  const input = new PromptInput(page, new RoleResolver(page, TEST_PATTERNS), speech, { ...options, ...overrides }, logger, clock);
  return { input, clock, logger };
}

describe('PromptInput.submit', () => {
  test('speaks through voice mode when it activates', async () => {
    const page = new FakePage([{ selectors: ['#voice'] }, { selectors: ['#input'] }]);
    const speech = recordingSpeech();
    const { input, clock } = setup(page, speech);

    expect(await input.submit('hello grok')).toEqual({ ok: true, channel: 'voice' });
    expect(page.clicks).toEqual(['#voice']);
    expect(speech.spoken).toEqual(['hello grok']);
    expect(page.typed).toEqual([]);
    expect(clock.sleeps).toEqual([3_000, 3_000]);
  });

  test('falls back to typing when no voice control resolves', async () => {
    const page = new FakePage([{ selectors: ['#input'] }]);
    const speech = recordingSpeech();
    const { input, clock } = setup(page, speech);

    expect(await input.submit('hello grok')).toEqual({ ok: true, channel: 'text' });
    expect(speech.spoken).toEqual([]);
    expect(page.typed).toEqual([{ selector: '#input', text: 'hello grok' }]);
    expect(page.enterPresses).toBe(1);
    expect(clock.sleeps).toEqual([100, 1_000]);
  });

  test('leaves voice mode before typing when speech fails', async () => {
    const page = new FakePage([{ selectors: ['#voice'] }, { selectors: ['#exit-voice'] }, { selectors: ['#input'] }]);
    const { input, clock, logger } = setup(page, recordingSpeech(true));

    expect(await input.submit('hello grok')).toEqual({ ok: true, channel: 'text' });
    expect(page.clicks).toEqual(['#voice', '#exit-voice']);
    expect(clock.sleeps).toEqual([3_000, 2_000, 1_000]);
    expect(logger.lines).toContain('Error with TTS: synthesis offline');
    expect(logger.lines).toContain('TTS failed, falling back to text');
  });

  test('an error banner after the voice click falls through to typing', async () => {
    const page = new FakePage([{ selectors: ['#input'] }]);
    const banner = { selectors: ['#alert'], text: 'Microphone access failed' };
    page.add({
      selectors: ['#voice'],
      onClick: (target) => {
        if (!target.elements.includes(banner)) target.add(banner);
      },
    });
    page.onEnter = (target) => target.remove(banner);
    const speech = recordingSpeech();
    const { input, clock, logger } = setup(page, speech);

    expect(await input.submit('hello grok')).toEqual({ ok: true, channel: 'text' });
    expect(page.clicks).toEqual(['#voice', '#voice']);
    expect(speech.spoken).toEqual([]);
    expect(page.typed).toEqual([{ selector: '#input', text: 'hello grok' }]);
    expect(clock.sleeps).toEqual([3_000, 100, 3_000, 1_000]);
    expect(logger.lines.filter((line) => line === 'Voice mode error: Microphone access failed')).toHaveLength(2);
    expect(logger.lines).toContain('Voice mode unavailable, using text input');
  });

  test('text mode never touches the voice control', async () => {
    const page = new FakePage([{ selectors: ['#voice'] }, { selectors: ['#input'] }]);
    const speech = recordingSpeech();
    const { input } = setup(page, speech, { inputMode: 'text' });

    expect(await input.submit('typed only')).toEqual({ ok: true, channel: 'text' });
    expect(page.clicks).toEqual([]);
    expect(speech.spoken).toEqual([]);
  });

  test('an error banner after Enter fails the attempt; both channels failing is reported', async () => {
    const page = new FakePage([{ selectors: ['#input'] }]);
    page.onEnter = (target) => {
      target.add({ selectors: ['#alert'], text: 'Message failed to send' });
    };
    const { input, logger } = setup(page, null);

    expect(await input.submit('hello grok')).toEqual({ ok: false, reason: 'Failed to send input after retries' });
    expect(page.enterPresses).toBe(2);
    expect(logger.lines.filter((line) => line === 'Text input error: Message failed to send')).toHaveLength(2);
  });
});

describe('PromptInput.exitVoiceMode', () => {
  test('no exit control means already out of voice mode', async () => {
    const page = new FakePage();
    const { input, clock } = setup(page, null);

    expect(await input.exitVoiceMode()).toBe(true);
    expect(page.clicks).toEqual([]);
    expect(clock.sleeps).toEqual([]);
  });
});
