export class PiperVoiceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Fails the whole request; the caller gets no audio. */
export class RequestAbortError extends PiperVoiceError {}

export type SkipReason =
  | "invalid-sentence"
  | "invalid-phoneme-ids"
  | "unknown-input"
  | "missing-input"
  | "inference-failed"
  | "empty-output"
  | "output-type-mismatch";

/** Fails one sentence; scheduling moves on to the next one. */
export class SentenceSkipError extends PiperVoiceError {
  constructor(
    readonly reason: SkipReason,
    message: string,
  ) {
    super(message);
  }
}

export class MissingInputError extends SentenceSkipError {
  constructor(readonly inputName: string) {
    super("missing-input", `Input "${inputName}" was never bound`);
  }
}

export class EmptyOutputError extends SentenceSkipError {
  constructor() {
    super("empty-output", "Output tensor is null");
  }
}

export class OutputTypeMismatchError extends SentenceSkipError {
  constructor(readonly actualType: string) {
    super("output-type-mismatch", `Output is not a float32 tensor, but ${actualType}`);
  }
}

export class SessionBusyError extends PiperVoiceError {
  constructor() {
    super("Inference session already has a run in flight");
  }
}

export class SynthesisCancelledError extends PiperVoiceError {
  constructor() {
    super("Synthesis cancelled by teardown");
  }
}
