import { createClip, type AudioClip } from "./audio-clip.js";
import { resolveControls, resolveDataPath, type PiperVoiceConfig } from "./config.js";
import type { LoggerLike } from "./diagnostics.js";
import type { Phonemizer } from "./phonemizer/index.js";
import type { YieldToHost } from "./synthesis/cooperative-executor.js";
import type { InferenceSession, ModelLoader } from "./synthesis/inference-session.js";
import { describeInputs, synthesizeSentences } from "./synthesis/sentence-scheduler.js";
import type { ModelInputSpec, PhonemeResult, SynthesisResult } from "./synthesis/types.js";

export type PiperTTSOptions = {
  config: PiperVoiceConfig;
  phonemizer: Phonemizer;
  modelLoader: ModelLoader;
  logger?: LoggerLike;
  yieldToHost?: YieldToHost;
};

/**
 * Owns the phonemizer and the inference session for the lifetime of the
 * plugin. Requests run one at a time, in the order they were made.
 */
export class PiperTTS {
  private readonly abort = new AbortController();
  private starting: Promise<InferenceSession> | null = null;
  private session: InferenceSession | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private disposing: Promise<void> | null = null;

  constructor(private readonly options: PiperTTSOptions) {}

  get inputs(): ModelInputSpec {
    return this.session?.inputs ?? [];
  }

  get disposed(): boolean {
    return this.disposing !== null;
  }

  async start(): Promise<void> {
    this.assertAlive();
    if (!this.starting) {
      this.starting = this.initialize().catch((err: unknown) => {
        this.starting = null;
        throw err;
      });
    }
    await this.starting;
  }

  synthesize(text: string): Promise<SynthesisResult> {
    this.assertAlive();
    const request = this.queue.then(() => this.runRequest(text));
    // Keep the queue moving after a failed request; the caller still sees the error.
    this.queue = request.catch(() => undefined);
    return request;
  }

  async textToSpeech(text: string): Promise<AudioClip | null> {
    const result = await this.synthesize(text);
    if (result.status !== "ok") return null;
    return createClip(result.waveform, { sampleRate: this.options.config.sampleRate });
  }

  dispose(): Promise<void> {
    if (!this.disposing) {
      this.disposing = this.teardown();
    }
    return this.disposing;
  }

  private async initialize(): Promise<InferenceSession> {
    const { config, phonemizer, modelLoader } = this.options;
    const logInfo = this.options.logger?.info ?? (() => undefined);

    const dataPath = resolveDataPath(config);
    await phonemizer.init(dataPath);
    logInfo(`Phonemizer ready (data: ${dataPath})`);

    const model = await modelLoader.load(config.modelPath);
    const session = await modelLoader.createSession(model, config.backend);
    logInfo(`Loaded model ${model.path} (backend: ${config.backend})`);
    describeInputs(session.inputs).forEach((line) => logInfo(line));

    if (this.disposing) {
      await session.release();
      throw new Error("PiperTTS was disposed while starting");
    }
    this.session = session;
    return session;
  }

  private async runRequest(text: string): Promise<SynthesisResult> {
    const { config, phonemizer, logger, yieldToHost } = this.options;
    if (this.abort.signal.aborted) return { status: "cancelled", skipped: [] };

    const session = await this.ensureSession();

    let phonemes: PhonemeResult | null;
    try {
      phonemes = await phonemizer.process(text, config.voice);
    } catch (err) {
      const error = `Phonemizer failed: ${err instanceof Error ? err.message : String(err)}`;
      logger?.warn?.(error);
      return { status: "aborted", error };
    }

    return synthesizeSentences({
      phonemes,
      controls: resolveControls(config),
      inputs: session.inputs,
      session,
      logger,
      signal: this.abort.signal,
      yieldToHost,
    });
  }

  private async ensureSession(): Promise<InferenceSession> {
    await this.start();
    if (!this.session) throw new Error("Inference session unavailable");
    return this.session;
  }

  private async teardown(): Promise<void> {
    this.abort.abort();
    await this.queue;

    const starting = this.starting;
    if (starting) {
      await starting.catch((err: unknown) => {
        this.options.logger?.warn?.(`Start failed before teardown: ${String(err)}`);
      });
    }

    const session = this.session;
    this.session = null;
    if (session) await session.release();

    this.options.phonemizer.free();
    this.options.logger?.info?.("PiperTTS released");
  }

  private assertAlive(): void {
    if (this.disposing) throw new Error("PiperTTS has been disposed");
  }
}
