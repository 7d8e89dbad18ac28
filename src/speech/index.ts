import type { BrowserLogger } from '../browser/types.js';
import { createPlayer, type PlayFile } from './playback.js';
import { synthesizeToTempFile, type SynthesisOptions, type Synthesizer } from './tts.js';

/** Speaks prompt text into the default audio output so the page's microphone hears it. */
export interface SpeechInjector {
  speak(text: string): Promise<void>;
}

export interface EdgeSpeechInjectorOptions extends SynthesisOptions {
  audioPlayer: string | null;
}

export interface EdgeSpeechInjectorDeps {
  synthesize?: Synthesizer;
  play?: PlayFile;
}

export class EdgeSpeechInjector implements SpeechInjector {
  private readonly synthesize: Synthesizer;
  private readonly play: PlayFile;

  constructor(
    private readonly options: EdgeSpeechInjectorOptions,
    private readonly logger: BrowserLogger,
    deps: EdgeSpeechInjectorDeps = {},
  ) {
    this.synthesize = deps.synthesize ?? synthesizeToTempFile;
    this.play = deps.play ?? createPlayer(options.audioPlayer);
  }

  async speak(text: string): Promise<void> {
    this.logger(`Converting to speech (${this.options.voice})...`);
    const clip = await this.synthesize(text, { voice: this.options.voice, rate: this.options.rate });
    try {
      this.logger('Playing audio...');
      await this.play(clip.filePath);
    } finally {
      await clip.dispose();
    }
  }
}

export { defaultPlayerCandidates, parsePlayerCommand } from './playback.js';
