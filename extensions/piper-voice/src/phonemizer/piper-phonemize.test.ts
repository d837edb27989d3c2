import { EventEmitter } from "node:events";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeEach } from "vitest";
import { PiperPhonemizer, parsePhonemizerOutput } from "./piper-phonemize.js";

const child = vi.hoisted(() => ({ spawn: vi.fn() }));

vi.mock("node:child_process", () => ({ spawn: child.spawn }));

class FakeStdin extends EventEmitter {
  readonly written: string[] = [];
  readonly end = vi.fn();

  write(chunk: string): boolean {
    this.written.push(chunk);
    return true;
  }
}

class FakeChild extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
  readonly stdin = new FakeStdin();
  readonly kill = vi.fn();
}

function pipeError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`write ${code}`), { code });
}

function nextChild(): FakeChild {
  const fake = new FakeChild();
  child.spawn.mockReturnValueOnce(fake);
  return fake;
}

describe("parsePhonemizerOutput", () => {
  it("reads one sentence per line", () => {
    const stdout = '{"phoneme_ids":[1,20,3]}\n\n{"phoneme_ids":[1,4,2]}\n';

    expect(parsePhonemizerOutput(stdout)).toEqual({
      sentences: [
        { index: 0, phonemeIds: [1, 20, 3] },
        { index: 1, phonemeIds: [1, 4, 2] },
      ],
    });
  });

  it("splits nested id lists into sentences", () => {
    const stdout = '{"text":"Hi. Bye.","phoneme_ids":[[1,5,2],[1,6,2]]}';

    expect(parsePhonemizerOutput(stdout)?.sentences).toEqual([
      { index: 0, phonemeIds: [1, 5, 2] },
      { index: 1, phonemeIds: [1, 6, 2] },
    ]);
  });

  it("keeps an empty id list as an empty sentence", () => {
    expect(parsePhonemizerOutput('{"phoneme_ids":[]}')).toEqual({ sentences: [{ index: 0, phonemeIds: [] }] });
  });

  it("returns null for empty output", () => {
    expect(parsePhonemizerOutput("\n  \n")).toBeNull();
  });

  it("rejects malformed lines", () => {
    expect(() => parsePhonemizerOutput('{"phoneme_ids":[1]}\nnot json')).toThrow("piper_phonemize line 2 is not JSON");
    expect(() => parsePhonemizerOutput('{"phonemes":["h"]}')).toThrow("piper_phonemize line 1 has no phoneme_ids");
    expect(() => parsePhonemizerOutput('{"phoneme_ids":[1.5]}')).toThrow("piper_phonemize line 1 has no phoneme_ids");
  });
});

describe("PiperPhonemizer", () => {
  const dataPath = tmpdir();

  beforeEach(() => {
    child.spawn.mockReset();
  });

  it("must be initialized before use", async () => {
    const phonemizer = new PiperPhonemizer("piper_phonemize");

    await expect(phonemizer.process("Hello.", "en-us")).rejects.toThrow("Phonemizer is not initialized");
    await expect(phonemizer.init(join(dataPath, "missing-espeak-ng-data"))).rejects.toThrow();
    expect(child.spawn).not.toHaveBeenCalled();
  });

  it("skips blank text without spawning", async () => {
    const phonemizer = new PiperPhonemizer("piper_phonemize");
    await phonemizer.init(dataPath);

    await expect(phonemizer.process("   ", "en-us")).resolves.toBeNull();
    expect(child.spawn).not.toHaveBeenCalled();
  });

  it("pipes text through piper_phonemize", async () => {
    const phonemizer = new PiperPhonemizer("/opt/piper/piper_phonemize");
    await phonemizer.init(dataPath);
    const fake = nextChild();

    const pending = phonemizer.process("Hello there.", "en-gb");
    fake.stdout.emit("data", Buffer.from('{"phoneme_ids":'));
    fake.stdout.emit("data", Buffer.from("[1,2]}\n"));
    fake.emit("close", 0);

    await expect(pending).resolves.toEqual({ sentences: [{ index: 0, phonemeIds: [1, 2] }] });
    expect(child.spawn).toHaveBeenCalledWith(
      "/opt/piper/piper_phonemize",
      ["-l", "en-gb", "--espeak_data", dataPath],
      { stdio: ["pipe", "pipe", "pipe"] },
    );
    expect(fake.stdin.written).toEqual(["Hello there.\n"]);
    expect(fake.stdin.end).toHaveBeenCalled();
  });

  it("reports stderr or the exit code on failure", async () => {
    const phonemizer = new PiperPhonemizer("piper_phonemize");
    await phonemizer.init(dataPath);

    const noisy = nextChild();
    const first = phonemizer.process("Hi.", "xx");
    noisy.stderr.emit("data", Buffer.from("Failed to set espeak-ng voice: xx\n"));
    noisy.emit("close", 1);
    await expect(first).rejects.toThrow("Failed to set espeak-ng voice: xx");

    const quiet = nextChild();
    const second = phonemizer.process("Hi.", "en-us");
    quiet.emit("close", 2);
    await expect(second).rejects.toThrow("piper_phonemize exited with code 2");
  });

  it("reports the exit status when the child quits before reading its input", async () => {
    const phonemizer = new PiperPhonemizer("piper_phonemize");
    await phonemizer.init(dataPath);
    const fake = nextChild();

    const pending = phonemizer.process("hello world ".repeat(1000), "zz");
    fake.stderr.emit("data", Buffer.from("Unknown voice: zz\n"));
    expect(() => fake.stdin.emit("error", pipeError("EPIPE"))).not.toThrow();
    fake.emit("close", 1);

    await expect(pending).rejects.toThrow("Unknown voice: zz");
  });

  it("rejects on other stdin failures", async () => {
    const phonemizer = new PiperPhonemizer("piper_phonemize");
    await phonemizer.init(dataPath);
    const fake = nextChild();

    const pending = phonemizer.process("Hi.", "en-us");
    fake.stdin.emit("error", pipeError("EIO"));

    await expect(pending).rejects.toThrow("write EIO");
  });

  it("kills running processes when freed", async () => {
    const phonemizer = new PiperPhonemizer("piper_phonemize");
    await phonemizer.init(dataPath);
    const fake = nextChild();

    const pending = phonemizer.process("Hi.", "en-us");
    phonemizer.free();
    fake.emit("close", null);

    await expect(pending).rejects.toThrow("piper_phonemize exited with code null");
    expect(fake.kill).toHaveBeenCalledTimes(1);
    await expect(phonemizer.process("Hi.", "en-us")).rejects.toThrow("Phonemizer is not initialized");
  });
});
