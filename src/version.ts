import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const packageSchema = z.object({ name: z.string(), version: z.string() });

let cachedVersion: string | null = null;

/** Version from the nearest package.json named `grok-voice-bench`, above this module (src/ or dist/src/). */
export function getCliVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth += 1) {
    try {
      const parsed = packageSchema.safeParse(JSON.parse(readFileSync(path.join(dir, 'package.json'), 'utf8')));
      if (parsed.success && parsed.data.name === 'grok-voice-bench') {
        cachedVersion = parsed.data.version;
        return cachedVersion;
      }
    } catch {
      // not here; keep walking up
    }
    dir = path.dirname(dir);
  }
  cachedVersion = '0.0.0';
  return cachedVersion;
}
