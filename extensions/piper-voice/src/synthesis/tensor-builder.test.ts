import { describe, it, expect } from "vitest";
import { RequestAbortError, SentenceSkipError } from "../errors.js";
import { PIPER_INPUTS } from "../testing/stub-session.js";
import { buildInputTensors, describeTensor } from "./tensor-builder.js";

const controls = { speed: 1.0, pitch: 1.0, glottal: 0.8 };

describe("buildInputTensors", () => {
  it("binds ids, length and scales to the first three inputs by position", () => {
    const set = buildInputTensors(PIPER_INPUTS, [1, 2, 3], controls);

    expect(set.ids.name).toBe("input");
    expect(set.ids.type).toBe("int64");
    expect(set.ids.dims).toEqual([1, 3]);
    expect(Array.from(set.ids.data)).toEqual([1n, 2n, 3n]);

    expect(set.lengths.name).toBe("input_lengths");
    expect(set.lengths.dims).toEqual([1]);
    expect(Array.from(set.lengths.data)).toEqual([3n]);

    expect(set.scales.name).toBe("scales");
    expect(set.scales.type).toBe("float32");
    expect(set.scales.dims).toEqual([3]);
    expect(set.scales.data).toEqual(Float32Array.of(1.0, 1.0, 0.8));
  });

  it("ignores inputs past the third", () => {
    const set = buildInputTensors([...PIPER_INPUTS, { name: "sid" }], [7], controls);
    expect([set.ids.name, set.lengths.name, set.scales.name]).toEqual(["input", "input_lengths", "scales"]);
  });

  it("keeps the declared order even when names are unexpected", () => {
    const set = buildInputTensors([{ name: "a" }, { name: "b" }, { name: "c" }], [4, 5], controls);
    expect([set.ids.name, set.lengths.name, set.scales.name]).toEqual(["a", "b", "c"]);
  });

  it("aborts the request when the model declares fewer than three inputs", () => {
    expect(() => buildInputTensors(PIPER_INPUTS.slice(0, 2), [1], controls)).toThrow(RequestAbortError);
    expect(() => buildInputTensors(PIPER_INPUTS.slice(0, 2), [1], controls)).toThrow(
      "Model declares 2 inputs, expected at least 3",
    );
  });

  it("rejects empty and negative phoneme ids as a sentence skip", () => {
    const empty = () => buildInputTensors(PIPER_INPUTS, [], controls);
    expect(empty).toThrow(SentenceSkipError);
    expect(empty).toThrow("Phoneme ids are empty");

    try {
      buildInputTensors(PIPER_INPUTS, [1, -2], controls);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SentenceSkipError);
      expect(err).toMatchObject({ reason: "invalid-phoneme-ids", message: "Invalid phoneme id: -2" });
    }
  });

  it("drops its buffers on release", () => {
    const set = buildInputTensors(PIPER_INPUTS, [1, 2, 3], controls);
    set.release();

    expect(set.ids.data.length).toBe(0);
    expect(set.lengths.data.length).toBe(0);
    expect(set.scales.data.length).toBe(0);
    expect(set.ids.name).toBe("input");
  });
});

describe("describeTensor", () => {
  it("prints name, shape, type and values", () => {
    const set = buildInputTensors(PIPER_INPUTS, [1, 2, 3], controls);
    expect(describeTensor(set.ids)).toBe("input shape=[1,3] type=int64 values=[1,2,3]");
    expect(describeTensor(set.lengths)).toBe("input_lengths shape=[1] type=int64 values=[3]");
    expect(describeTensor(set.scales)).toBe("scales shape=[3] type=float32 values=[1,1,0.800000011920929]");
  });
});
