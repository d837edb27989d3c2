import type { LoggerLike } from "../diagnostics.js";
import {
  RequestAbortError,
  SentenceSkipError,
  SynthesisCancelledError,
  type SkipReason,
} from "../errors.js";
import { runCooperatively, type YieldToHost } from "./cooperative-executor.js";
import type { InferenceSession } from "./inference-session.js";
import { extractSampleRun } from "./output-extractor.js";
import { assertInputSpec, buildInputTensors, describeTensor } from "./tensor-builder.js";
import type {
  ModelInputSpec,
  PhonemeResult,
  SampleRun,
  Sentence,
  SentenceOutcome,
  SkippedSentence,
  SynthesisControls,
  SynthesisResult,
} from "./types.js";
import { WaveformAssembler } from "./waveform-assembler.js";

export type SchedulerRequest = {
  phonemes: PhonemeResult | null | undefined;
  controls: SynthesisControls;
  inputs: ModelInputSpec;
  session: InferenceSession;
  logger?: LoggerLike;
  signal?: AbortSignal;
  yieldToHost?: YieldToHost;
};

export function acceptSentence(
  sentence: Sentence | null | undefined,
  position: number,
): SentenceOutcome {
  if (!sentence) {
    return { ok: false, reason: `Sentence ${position} is absent` };
  }
  if (sentence.phonemeIds.length === 0) {
    return { ok: false, reason: `Sentence ${position} has no phoneme ids` };
  }
  return { ok: true, sentence };
}

export function describeInputs(inputs: ModelInputSpec): string[] {
  return [
    `Model expects ${inputs.length} inputs:`,
    ...inputs.map(
      (input, i) =>
        `Input ${i}: name=${input.name}, shape=${input.dims ? `[${input.dims.join(",")}]` : "?"}, type=${input.type ?? "?"}`,
    ),
  ];
}

/**
 * Synthesizes every sentence in order and concatenates the results. A failing
 * sentence is logged and skipped; only a missing phoneme result or a model
 * with too few inputs fails the request.
 */
export async function synthesizeSentences(request: SchedulerRequest): Promise<SynthesisResult> {
  const { phonemes, controls, inputs, session, logger, signal, yieldToHost } = request;
  const logInfo = logger?.info ?? (() => undefined);
  const logWarn = logger?.warn ?? (() => undefined);

  if (!phonemes || phonemes.sentences.length === 0) {
    const error = "Phoneme result or sentences are null/empty";
    logWarn(`${error}. Aborting TTS.`);
    return { status: "aborted", error };
  }

  describeInputs(inputs).forEach((line) => logInfo(line));
  try {
    assertInputSpec(inputs);
  } catch (err) {
    return abortRequest(err, logWarn);
  }

  const assembler = new WaveformAssembler();
  const skipped: SkippedSentence[] = [];
  const skip = (position: number, reason: SkipReason, message: string) => {
    logWarn(`${message}. Skipping sentence ${position}.`);
    skipped.push({ position, reason, message });
  };

  const synthesizeSentence = async (sentence: Sentence): Promise<SampleRun> => {
    const tensors = buildInputTensors(inputs, sentence.phonemeIds, controls);
    try {
      for (const tensor of [tensors.ids, tensors.lengths, tensors.scales]) {
        logInfo(`Setting input: ${describeTensor(tensor)}`);
        session.bind(tensor.name, tensor);
      }

      const steps = await runCooperatively(session.run(), { signal, yieldToHost });
      const output = session.peekOutput();
      if (output) {
        logInfo(`Output ${output.name}: shape=[${output.dims.join(",")}] type=${output.type} after ${steps} steps`);
      }
      return extractSampleRun(output);
    } finally {
      session.clearBindings();
      tensors.release();
    }
  };

  for (let position = 0; position < phonemes.sentences.length; position += 1) {
    if (signal?.aborted) return { status: "cancelled", skipped };

    const outcome = acceptSentence(phonemes.sentences[position], position);
    if (!outcome.ok) {
      skip(position, "invalid-sentence", outcome.reason);
      continue;
    }

    try {
      const run = await synthesizeSentence(outcome.sentence);
      assembler.append(run);
      logInfo(`Sentence ${outcome.sentence.index}: ${run.length} samples`);
    } catch (err) {
      if (err instanceof SynthesisCancelledError) return { status: "cancelled", skipped };
      if (err instanceof RequestAbortError) return abortRequest(err, logWarn);
      if (err instanceof SentenceSkipError) {
        skip(position, err.reason, err.message);
      } else {
        skip(position, "inference-failed", `Inference failed: ${String(err)}`);
      }
    }
  }

  if (assembler.sampleCount === 0) {
    logWarn("No audio samples generated.");
    return { status: "no-audio", skipped };
  }

  return {
    status: "ok",
    waveform: assembler.assemble(),
    sentenceCount: assembler.runCount,
    skipped,
  };
}

function abortRequest(err: unknown, logWarn: (message: string) => void): SynthesisResult {
  if (!(err instanceof RequestAbortError)) throw err;
  logWarn(`${err.message}. Aborting.`);
  return { status: "aborted", error: err.message };
}
