import { RequestAbortError, SentenceSkipError } from "../errors.js";
import type { InputTensor, InputTensorSet, ModelInputSpec, SynthesisControls } from "./types.js";

export const REQUIRED_INPUT_COUNT = 3;

export function assertInputSpec(inputs: ModelInputSpec): void {
  if (inputs.length < REQUIRED_INPUT_COUNT) {
    throw new RequestAbortError(
      `Model declares ${inputs.length} inputs, expected at least ${REQUIRED_INPUT_COUNT}`,
    );
  }
}

/**
 * Shapes one sentence into the model's first three inputs, matched by
 * position: phoneme ids `[1, N]`, length `[1]`, scales `[3]`.
 */
export function buildInputTensors(
  inputs: ModelInputSpec,
  phonemeIds: readonly number[],
  controls: SynthesisControls,
): InputTensorSet {
  assertInputSpec(inputs);

  if (phonemeIds.length === 0) {
    throw new SentenceSkipError("invalid-phoneme-ids", "Phoneme ids are empty");
  }
  const bad = phonemeIds.find((id) => !Number.isSafeInteger(id) || id < 0);
  if (bad !== undefined) {
    throw new SentenceSkipError("invalid-phoneme-ids", `Invalid phoneme id: ${bad}`);
  }

  const [idsSlot, lengthsSlot, scalesSlot] = inputs;
  const set: InputTensorSet = {
    ids: {
      name: idsSlot.name,
      type: "int64",
      dims: [1, phonemeIds.length],
      data: BigInt64Array.from(phonemeIds, (id) => BigInt(id)),
    },
    lengths: {
      name: lengthsSlot.name,
      type: "int64",
      dims: [1],
      data: BigInt64Array.of(BigInt(phonemeIds.length)),
    },
    scales: {
      name: scalesSlot.name,
      type: "float32",
      dims: [3],
      data: Float32Array.of(controls.speed, controls.pitch, controls.glottal),
    },
    release() {
      set.ids = { ...set.ids, dims: [0], data: new BigInt64Array(0) };
      set.lengths = { ...set.lengths, dims: [0], data: new BigInt64Array(0) };
      set.scales = { ...set.scales, dims: [0], data: new Float32Array(0) };
    },
  };
  return set;
}

export function describeTensor(tensor: InputTensor): string {
  const values = Array.from<number | bigint, string>(tensor.data, String);
  return `${tensor.name} shape=[${tensor.dims.join(",")}] type=${tensor.type} values=[${values.join(",")}]`;
}
