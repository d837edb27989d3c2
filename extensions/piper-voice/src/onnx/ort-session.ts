import { readFile } from "node:fs/promises";
import type { Backend } from "../config.js";
import { MissingInputError, SentenceSkipError, SessionBusyError } from "../errors.js";
import type {
  Execution,
  InferenceSession,
  LoadedModel,
  ModelLoader,
  StepResult,
} from "../synthesis/inference-session.js";
import type { InferenceOutput, InputTensor, ModelInputSpec } from "../synthesis/types.js";

// onnxruntime-web types (dynamically imported)
type OrtModule = typeof import("onnxruntime-web");
type OrtSession = import("onnxruntime-web").InferenceSession;
type OrtTensor = import("onnxruntime-web").Tensor;

let ortModule: OrtModule | null = null;

async function loadOrt(): Promise<OrtModule> {
  if (!ortModule) {
    ortModule = await import("onnxruntime-web");
  }
  return ortModule;
}

export class OrtModelLoader implements ModelLoader {
  async load(modelPath: string): Promise<LoadedModel> {
    const bytes = await readFile(modelPath);
    return { path: modelPath, bytes: new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength) };
  }

  async createSession(model: LoadedModel, backend: Backend): Promise<InferenceSession> {
    const ort = await loadOrt();
    const handle = await ort.InferenceSession.create(model.bytes, {
      executionProviders: [backend],
    });
    return new OrtInferenceSession(ort, handle);
  }
}

type RunOutcome =
  | { ok: true; outputs: Record<string, OrtTensor> }
  | { ok: false; error: unknown };

export class OrtInferenceSession implements InferenceSession {
  readonly inputs: ModelInputSpec;
  private readonly bindings = new Map<string, InputTensor>();
  private active: OrtExecution | null = null;
  private inFlight: Promise<void> | null = null;
  private output: OrtTensor | null = null;
  private released = false;

  constructor(
    private readonly ort: OrtModule,
    private readonly handle: OrtSession,
  ) {
    this.inputs = handle.inputMetadata.map((meta) =>
      "shape" in meta ? { name: meta.name, dims: meta.shape, type: meta.type } : { name: meta.name },
    );
  }

  bind(name: string, tensor: InputTensor): void {
    if (!this.inputs.some((input) => input.name === name)) {
      throw new SentenceSkipError("unknown-input", `Model has no input named "${name}"`);
    }
    this.bindings.set(name, tensor);
  }

  run(): Execution {
    if (this.released) throw new Error("Inference session has been released");
    if (this.active) throw new SessionBusyError();

    const missing = this.inputs.find((input) => !this.bindings.has(input.name));
    if (missing) throw new MissingInputError(missing.name);

    this.disposeOutput();
    const feeds: Record<string, OrtTensor> = {};
    try {
      for (const [name, tensor] of this.bindings) {
        feeds[name] = this.toOrtTensor(tensor);
      }
    } catch (err) {
      Object.values(feeds).forEach((created) => created.dispose());
      throw err;
    }
    this.active = new OrtExecution(this, feeds);
    return this.active;
  }

  peekOutput(): InferenceOutput | undefined {
    if (!this.output) return undefined;
    return {
      name: this.handle.outputNames[0] ?? "output",
      type: this.output.type,
      dims: this.output.dims,
      data: this.output.data,
    };
  }

  clearBindings(): void {
    this.bindings.clear();
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.bindings.clear();
    // A run already handed to the runtime cannot be interrupted.
    await this.inFlight;
    this.disposeOutput();
    await this.handle.release();
  }

  /** @internal used by OrtExecution */
  start(feeds: Record<string, OrtTensor>, onSettled: (outcome: RunOutcome) => void): Promise<void> {
    const settled = this.handle.run(feeds).then(
      (outputs) => onSettled({ ok: true, outputs }),
      (error: unknown) => onSettled({ ok: false, error }),
    );
    const tracked: Promise<void> = settled.finally(() => {
      Object.values(feeds).forEach((tensor) => tensor.dispose());
      if (this.inFlight === tracked) this.inFlight = null;
    });
    this.inFlight = tracked;
    return tracked;
  }

  /** @internal used by OrtExecution */
  detach(execution: OrtExecution): void {
    if (this.active === execution) this.active = null;
  }

  /** @internal used by OrtExecution */
  complete(outputs: Record<string, OrtTensor>, abandoned: boolean): void {
    const primaryName = this.handle.outputNames[0];
    for (const [name, tensor] of Object.entries(outputs)) {
      if (!abandoned && !this.released && name === primaryName) {
        this.output = tensor;
      } else {
        tensor.dispose();
      }
    }
  }

  private disposeOutput(): void {
    this.output?.dispose();
    this.output = null;
  }

  private toOrtTensor(tensor: InputTensor): OrtTensor {
    return tensor.type === "int64"
      ? new this.ort.Tensor("int64", tensor.data, tensor.dims)
      : new this.ort.Tensor("float32", tensor.data, tensor.dims);
  }
}

/**
 * The runtime executes a whole graph per call, so a run takes two steps:
 * hand the feeds over, then collect the outputs once the call settles.
 */
class OrtExecution implements Execution {
  private started: Promise<void> | null = null;
  private outcome: RunOutcome | null = null;
  private abandoned = false;
  private finished = false;

  constructor(
    private readonly session: OrtInferenceSession,
    private readonly feeds: Record<string, OrtTensor>,
  ) {}

  advance(): StepResult {
    if (this.abandoned || this.finished) return { done: true };

    if (!this.started) {
      this.started = this.session.start(this.feeds, (outcome) => {
        this.outcome = outcome;
        if (this.abandoned && outcome.ok) this.session.complete(outcome.outputs, true);
      });
      return { done: false, until: this.started };
    }

    if (!this.outcome) return { done: false, until: this.started };

    this.finished = true;
    this.session.detach(this);
    if (!this.outcome.ok) throw this.outcome.error;
    this.session.complete(this.outcome.outputs, false);
    return { done: true };
  }

  abandon(): void {
    if (this.finished || this.abandoned) return;
    this.abandoned = true;
    this.session.detach(this);
    if (!this.started) {
      Object.values(this.feeds).forEach((tensor) => tensor.dispose());
    } else if (this.outcome?.ok) {
      this.session.complete(this.outcome.outputs, true);
    }
  }
}
