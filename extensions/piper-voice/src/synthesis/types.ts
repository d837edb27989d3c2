import type { SkipReason } from "../errors.js";

export type Sentence = {
  index: number;
  phonemeIds: readonly number[];
};

/** Sentences in the order they should be spoken. Entries may be absent. */
export type PhonemeResult = {
  readonly sentences: ReadonlyArray<Sentence | null | undefined>;
};

export type SynthesisControls = {
  speed: number;
  pitch: number;
  glottal: number;
};

export type ModelInputSlot = {
  name: string;
  dims?: ReadonlyArray<number | string>;
  type?: string;
};

export type ModelInputSpec = readonly ModelInputSlot[];

export type InputTensor =
  | { name: string; type: "int64"; dims: readonly number[]; data: BigInt64Array }
  | { name: string; type: "float32"; dims: readonly number[]; data: Float32Array };

export type Int64Tensor = Extract<InputTensor, { type: "int64" }>;
export type Float32Tensor = Extract<InputTensor, { type: "float32" }>;

export type InputTensorSet = {
  ids: Int64Tensor;
  lengths: Int64Tensor;
  scales: Float32Tensor;
  release: () => void;
};

/** Primary output as reported by the inference backend, before validation. */
export type InferenceOutput = {
  name: string;
  type: string;
  dims: readonly number[];
  data: unknown;
};

export type SampleRun = Float32Array;

export type Waveform = Float32Array;

export type SentenceOutcome =
  | { ok: true; sentence: Sentence }
  | { ok: false; reason: string };

export type SkippedSentence = {
  position: number;
  reason: SkipReason;
  message: string;
};

export type SynthesisResult =
  | {
      status: "ok";
      waveform: Waveform;
      sentenceCount: number;
      skipped: SkippedSentence[];
    }
  | { status: "no-audio"; skipped: SkippedSentence[] }
  | { status: "aborted"; error: string }
  | { status: "cancelled"; skipped: SkippedSentence[] };
