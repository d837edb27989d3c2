import { EmptyOutputError, OutputTypeMismatchError } from "../errors.js";
import type { InferenceOutput, SampleRun } from "./types.js";

export function extractSampleRun(output: InferenceOutput | null | undefined): SampleRun {
  if (!output) throw new EmptyOutputError();

  if (output.type !== "float32") {
    throw new OutputTypeMismatchError(output.type);
  }
  if (!(output.data instanceof Float32Array)) {
    throw new OutputTypeMismatchError(describeData(output.data));
  }

  // The backend may reuse or dispose its buffer after the run.
  return Float32Array.from(output.data);
}

function describeData(data: unknown): string {
  if (data === null || data === undefined) return String(data);
  if (typeof data === "object") return data.constructor.name;
  return typeof data;
}
