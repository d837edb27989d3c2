import type { Backend } from "../config.js";
import type { InferenceOutput, InputTensor, ModelInputSpec } from "./types.js";

export type StepResult =
  | { done: true }
  /** `until` settles when the backend is ready to be advanced again. */
  | { done: false; until?: Promise<void> };

/** One inference run, advanced a bounded step at a time by its driver. */
export interface Execution {
  advance(): StepResult;
  abandon(): void;
}

export interface InferenceSession {
  readonly inputs: ModelInputSpec;
  /** Last bind wins for a given name. */
  bind(name: string, tensor: InputTensor): void;
  /** Throws MissingInputError if a declared input is unbound, SessionBusyError if a run is in flight. */
  run(): Execution;
  /** Primary output of the last completed run; undefined until it completes. */
  peekOutput(): InferenceOutput | undefined;
  clearBindings(): void;
  release(): Promise<void>;
}

export type LoadedModel = {
  path: string;
  bytes: Uint8Array;
};

export interface ModelLoader {
  load(modelPath: string): Promise<LoadedModel>;
  createSession(model: LoadedModel, backend: Backend): Promise<InferenceSession>;
}
