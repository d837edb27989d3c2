import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { SynthesisControls } from "./synthesis/types.js";

export const BackendSchema = Type.Union(
  [Type.Literal("wasm"), Type.Literal("cpu"), Type.Literal("webgpu"), Type.Literal("webnn")],
  { default: "wasm", description: "ONNX Runtime execution provider" },
);

export type Backend = Static<typeof BackendSchema>;

export const PiperVoiceConfigSchema = Type.Object({
  enabled: Type.Boolean({ default: true }),
  modelPath: Type.String({
    default: "",
    description: "Path to the Piper ONNX voice model",
  }),
  phonemizerPath: Type.String({
    default: "piper_phonemize",
    description: "Path to the piper_phonemize binary",
  }),
  espeakDataPath: Type.String({
    default: "espeak-ng-data",
    description: "espeak-ng data folder, relative to dataRoot",
  }),
  dataRoot: Type.String({
    default: "",
    description: "Base directory for relative data paths (defaults to the working directory)",
  }),
  voice: Type.String({
    default: "en-us",
    description: "espeak-ng voice used for phonemization",
  }),
  sampleRate: Type.Integer({
    default: 22050,
    minimum: 1,
    description: "Sample rate of the model's output",
  }),
  speed: Type.Number({ default: 1.0, exclusiveMinimum: 0, description: "Speed scale" }),
  pitch: Type.Number({ default: 1.0, exclusiveMinimum: 0, description: "Pitch scale" }),
  glottal: Type.Number({ default: 0.8, minimum: 0, description: "Glottal tension scale" }),
  backend: BackendSchema,
  ffmpegPath: Type.String({
    default: "ffmpeg",
    description: "Path to ffmpeg binary",
  }),
  autoDeaf: Type.Boolean({
    default: false,
    description: "Whether the bot should deafen itself after joining",
  }),
  autoMute: Type.Boolean({
    default: false,
    description: "Whether the bot should mute itself after joining",
  }),
  logBufferSize: Type.Integer({
    default: 200,
    minimum: 0,
    description: "Number of recent log lines kept for the status action",
  }),
});

export type PiperVoiceConfig = Static<typeof PiperVoiceConfigSchema>;

export function parseConfig(value: unknown): PiperVoiceConfig {
  const config = Value.Default(PiperVoiceConfigSchema, Value.Clone(value ?? {}));
  if (Value.Check(PiperVoiceConfigSchema, config)) return config;

  const issues = [...Value.Errors(PiperVoiceConfigSchema, config)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );
  throw new Error(`Invalid piper-voice config: ${issues.join("; ")}`);
}

export function validateConfig(config: PiperVoiceConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.modelPath) {
    errors.push("modelPath is required");
  }
  if (!config.phonemizerPath) {
    errors.push("phonemizerPath is required");
  }
  if (!config.espeakDataPath) {
    errors.push("espeakDataPath is required");
  }
  if (!config.voice) {
    errors.push("voice is required");
  }
  if (!config.ffmpegPath) {
    errors.push("ffmpegPath is required");
  }

  return { valid: errors.length === 0, errors };
}

export function resolveControls(config: PiperVoiceConfig): SynthesisControls {
  return { speed: config.speed, pitch: config.pitch, glottal: config.glottal };
}

export function resolveDataPath(config: PiperVoiceConfig, cwd = process.cwd()): string {
  return path.resolve(config.dataRoot || cwd, config.espeakDataPath);
}
