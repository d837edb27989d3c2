import type { PhonemeResult } from "../synthesis/types.js";

export interface Phonemizer {
  /** Must be called once, with the espeak-ng data folder, before `process`. */
  init(dataPath: string): Promise<void>;
  /** Resolves to null when there is nothing to synthesize. */
  process(text: string, voice: string): Promise<PhonemeResult | null>;
  free(): void;
}
