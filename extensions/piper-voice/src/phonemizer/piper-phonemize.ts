import { spawn, type ChildProcess } from "node:child_process";
import { access } from "node:fs/promises";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { PhonemeResult, Sentence } from "../synthesis/types.js";
import type { Phonemizer } from "./index.js";

const PhonemizedLineSchema = Type.Object({
  phoneme_ids: Type.Union([Type.Array(Type.Integer()), Type.Array(Type.Array(Type.Integer()))]),
});

/**
 * Parses piper_phonemize output: one JSON object per line, where
 * `phoneme_ids` is either one sentence's ids or a list of sentences.
 */
export function parsePhonemizerOutput(stdout: string): PhonemeResult | null {
  const sentences: Sentence[] = [];

  stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .forEach((line, lineNumber) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        throw new Error(`piper_phonemize line ${lineNumber + 1} is not JSON`);
      }
      if (!Value.Check(PhonemizedLineSchema, parsed)) {
        throw new Error(`piper_phonemize line ${lineNumber + 1} has no phoneme_ids`);
      }
      for (const phonemeIds of splitSentences(parsed.phoneme_ids)) {
        sentences.push({ index: sentences.length, phonemeIds });
      }
    });

  return sentences.length > 0 ? { sentences } : null;
}

function splitSentences(ids: number[] | number[][]): number[][] {
  const flat: number[] = [];
  const nested: number[][] = [];
  for (const entry of ids) {
    if (Array.isArray(entry)) nested.push(entry);
    else flat.push(entry);
  }
  return nested.length > 0 ? nested : [flat];
}

export class PiperPhonemizer implements Phonemizer {
  private dataPath: string | null = null;
  private readonly running = new Set<ChildProcess>();

  constructor(private readonly phonemizerPath: string) {}

  async init(dataPath: string): Promise<void> {
    await access(dataPath);
    this.dataPath = dataPath;
  }

  async process(text: string, voice: string): Promise<PhonemeResult | null> {
    if (!this.dataPath) {
      throw new Error("Phonemizer is not initialized");
    }
    if (!text.trim()) return null;

    const stdout = await this.exec(["-l", voice, "--espeak_data", this.dataPath], text);
    return parsePhonemizerOutput(stdout);
  }

  free(): void {
    for (const child of this.running) child.kill();
    this.running.clear();
    this.dataPath = null;
  }

  private exec(args: string[], input: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const phonemize = spawn(this.phonemizerPath, args, {
        stdio: ["pipe", "pipe", "pipe"],
      });
      this.running.add(phonemize);

      const chunks: Buffer[] = [];
      const errors: Buffer[] = [];

      phonemize.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
      phonemize.stderr.on("data", (chunk: Buffer) => errors.push(chunk));

      phonemize.on("error", (err) => {
        this.running.delete(phonemize);
        reject(err);
      });
      phonemize.on("close", (code) => {
        this.running.delete(phonemize);
        if (code === 0) {
          resolve(Buffer.concat(chunks).toString("utf8"));
          return;
        }
        const message = Buffer.concat(errors).toString().trim();
        reject(new Error(message || `piper_phonemize exited with code ${code}`));
      });

      // A child that exits before reading its input breaks the pipe; close reports why.
      phonemize.stdin.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code !== "EPIPE") reject(err);
      });
      phonemize.stdin.write(`${input}\n`);
      phonemize.stdin.end();
    });
  }
}
