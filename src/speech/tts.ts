import os from 'node:os';
import path from 'node:path';
import { mkdtemp, rm } from 'node:fs/promises';
import { MsEdgeTTS, OUTPUT_FORMAT } from 'msedge-tts';
import { AutomationError, describeError } from '../errors.js';

export interface SynthesisOptions {
  voice: string;
  /** Signed percentage such as "+0%" or "-10%". */
  rate: string;
}

export interface SynthesizedClip {
  filePath: string;
  /** Removes the clip and its temp directory. */
  dispose: () => Promise<void>;
}

export type Synthesizer = (text: string, options: SynthesisOptions) => Promise<SynthesizedClip>;

/** Neural TTS into a temporary MP3; the caller owns cleanup through `dispose`. */
export const synthesizeToTempFile: Synthesizer = async (text, options) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'grok-voice-tts-'));
  const dispose = () => rm(dir, { recursive: true, force: true });
  try {
    const tts = new MsEdgeTTS();
    await tts.setMetadata(options.voice, OUTPUT_FORMAT.AUDIO_24KHZ_48KBITRATE_MONO_MP3);
    const filePath = await tts.toFile(path.join(dir, 'prompt.mp3'), text, { rate: options.rate });
    return { filePath, dispose };
  } catch (error) {
    await dispose();
    throw new AutomationError(`Speech synthesis failed: ${describeError(error)}`, { stage: 'speech', code: 'tts-failed' }, error);
  }
};
