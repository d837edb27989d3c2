import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parseConfig, validateConfig, type PiperVoiceConfig } from "./src/config.js";
import { createVoiceRuntime, type DiscordClientLike, type VoiceRuntime } from "./src/runtime.js";

type PluginApi = {
  pluginConfig: unknown;
  runtime?: {
    channel?: { discord?: { client?: DiscordClientLike | null } };
  };
  logger: {
    info: (message: string) => void;
    warn: (message: string) => void;
    error: (message: string) => void;
  };
  registerTool: (tool: {
    name: string;
    label?: string;
    description: string;
    parameters: unknown;
    execute: (toolCallId: string, params: unknown) => Promise<unknown>;
  }) => void;
  registerService?: (service: { id: string; stop: () => Promise<void> }) => void;
};

export const ToolParamsSchema = Type.Union([
  Type.Object({
    action: Type.Literal("join"),
    guildId: Type.String({ description: "Discord server ID" }),
    channelId: Type.String({ description: "Voice channel ID" }),
  }),
  Type.Object({
    action: Type.Literal("leave"),
    guildId: Type.String({ description: "Discord server ID" }),
  }),
  Type.Object({
    action: Type.Literal("speak"),
    guildId: Type.String({ description: "Discord server ID" }),
    text: Type.String({ description: "Text to speak" }),
  }),
  Type.Object({
    action: Type.Literal("synthesize"),
    text: Type.String({ description: "Text to synthesize" }),
    outputPath: Type.String({ description: "Where to write the WAV file" }),
  }),
  Type.Object({
    action: Type.Literal("status"),
    logLines: Type.Optional(Type.Integer({ minimum: 0, description: "Recent log lines to include" })),
  }),
]);

export type ToolParams = Static<typeof ToolParamsSchema>;

export async function executeAction(runtime: VoiceRuntime, params: ToolParams): Promise<unknown> {
  switch (params.action) {
    case "join":
      await runtime.join(params.guildId, params.channelId);
      return { ok: true };
    case "leave":
      await runtime.leave(params.guildId);
      return { ok: true };
    case "speak":
      return { ok: true, ...(await runtime.speak(params.guildId, params.text)) };
    case "synthesize":
      return { ok: true, path: params.outputPath, ...(await runtime.synthesizeToFile(params.text, params.outputPath)) };
    case "status":
      return runtime.status(params.logLines);
  }
}

const plugin = {
  id: "piper-voice",
  name: "Piper Voice",
  description: "In-process Piper neural TTS for Discord voice channels",
  configSchema: {
    parse: (value: unknown) => parseConfig(value),
    uiHints: {
      enabled: { label: "Enable Voice", help: "Enable Piper voice features" },
      modelPath: { label: "Voice Model", help: "Path to the Piper ONNX voice model" },
      phonemizerPath: { label: "Phonemizer Path", help: "Path to piper_phonemize binary" },
      espeakDataPath: { label: "espeak-ng Data", help: "espeak-ng data folder, relative to the data root" },
      dataRoot: { label: "Data Root", help: "Base directory for relative data paths" },
      voice: { label: "Voice", help: "espeak-ng voice, e.g. en-us" },
      sampleRate: { label: "Sample Rate", help: "Output sample rate of the model" },
      speed: { label: "Speed Scale", help: "Speech speed scale" },
      pitch: { label: "Pitch Scale", help: "Pitch scale" },
      glottal: { label: "Glottal Scale", help: "Glottal tension scale" },
      backend: { label: "Backend", help: "ONNX Runtime execution provider" },
      ffmpegPath: { label: "FFmpeg Path", help: "Path to ffmpeg binary" },
      logBufferSize: { label: "Log Buffer", help: "Recent log lines kept for status" },
    },
  },
  register(api: PluginApi) {
    const config: PiperVoiceConfig = parseConfig(api.pluginConfig);
    const validation = validateConfig(config);
    if (!validation.valid) {
      api.logger.warn(`[piper-voice] Config issues: ${validation.errors.join("; ")}`);
    }

    let runtime: VoiceRuntime | null = null;

    const ensureRuntime = (): VoiceRuntime => {
      if (!config.enabled) {
        throw new Error("Piper voice extension disabled");
      }

      if (!runtime) {
        runtime = createVoiceRuntime({
          config,
          discordClient: api.runtime?.channel?.discord?.client ?? null,
          logger: api.logger,
        });
      }

      return runtime;
    };

    api.registerService?.({
      id: "piper-voice",
      async stop() {
        const active = runtime;
        runtime = null;
        await active?.stop();
      },
    });

    api.registerTool({
      name: "piper_voice",
      label: "Piper Voice",
      description: "Join or leave Discord voice channels, speak text with Piper, write speech to a WAV file, or check status",
      parameters: ToolParamsSchema,
      async execute(_toolCallId, params) {
        if (!Value.Check(ToolParamsSchema, params)) {
          const first = Value.Errors(ToolParamsSchema, params).First();
          throw new Error(`Invalid parameters: ${first ? `${first.path || "/"} ${first.message}` : "unknown"}`);
        }
        return executeAction(ensureRuntime(), params);
      },
    });
  },
};

export default plugin;
