import { writeFile } from "node:fs/promises";
import type { DiscordGatewayAdapterCreator, VoiceConnection } from "@discordjs/voice";
import { VoiceManager } from "./voice-manager.js";
import { PiperTTS } from "./tts-service.js";
import { VoicePlayer } from "./audio-player.js";
import { createClip } from "./audio-clip.js";
import type { PiperVoiceConfig } from "./config.js";
import { DiagnosticLog, type LogLine, type LoggerLike } from "./diagnostics.js";
import { OrtModelLoader } from "./onnx/ort-session.js";
import type { Phonemizer } from "./phonemizer/index.js";
import { PiperPhonemizer } from "./phonemizer/piper-phonemize.js";
import type { ModelLoader } from "./synthesis/inference-session.js";
import type { ModelInputSpec } from "./synthesis/types.js";

export type { LoggerLike } from "./diagnostics.js";

export type SpeechSummary = {
  spoken: boolean;
  durationMs: number;
  sentenceCount: number;
  skippedSentences: number;
};

export type VoiceRuntimeStatus = {
  connectedGuilds: string[];
  modelInputs: ModelInputSpec;
  recentLog: LogLine[];
};

export type VoiceRuntime = {
  join: (guildId: string, channelId: string) => Promise<void>;
  leave: (guildId: string) => Promise<void>;
  speak: (guildId: string, text: string) => Promise<SpeechSummary>;
  synthesizeToFile: (text: string, outputPath: string) => Promise<SpeechSummary>;
  status: (logLimit?: number) => VoiceRuntimeStatus;
  stop: () => Promise<void>;
};

export type DiscordClientLike = {
  channels: {
    fetch: (id: string) => Promise<unknown>;
  };
};

function isAdapterCreator(value: unknown): value is DiscordGatewayAdapterCreator {
  return typeof value === "function";
}

function resolveAdapterCreator(channel: unknown): DiscordGatewayAdapterCreator {
  if (!channel || typeof channel !== "object") throw new Error("Channel not found");

  if ("isVoiceBased" in channel && typeof channel.isVoiceBased === "function" && !channel.isVoiceBased()) {
    throw new Error("Channel is not a voice-based channel");
  }

  const guild = "guild" in channel ? channel.guild : undefined;
  const creator =
    guild && typeof guild === "object" && "voiceAdapterCreator" in guild
      ? guild.voiceAdapterCreator
      : undefined;
  if (!isAdapterCreator(creator)) {
    throw new Error("Unable to resolve voice adapter for channel");
  }
  return creator;
}

const NOTHING_SPOKEN: SpeechSummary = {
  spoken: false,
  durationMs: 0,
  sentenceCount: 0,
  skippedSentences: 0,
};

export function createVoiceRuntime(options: {
  config: PiperVoiceConfig;
  discordClient?: DiscordClientLike | null;
  logger?: LoggerLike;
  phonemizer?: Phonemizer;
  modelLoader?: ModelLoader;
}): VoiceRuntime {
  const { config, discordClient } = options;

  const log = new DiagnosticLog(options.logger, config.logBufferSize);
  const tts = new PiperTTS({
    config,
    phonemizer: options.phonemizer ?? new PiperPhonemizer(config.phonemizerPath),
    modelLoader: options.modelLoader ?? new OrtModelLoader(),
    logger: log,
  });
  const voiceManager = new VoiceManager();
  let player: VoicePlayer | null = null;

  const requireDiscord = (): DiscordClientLike => {
    if (!discordClient) {
      throw new Error("Discord client not available. Ensure the discord extension is enabled.");
    }
    return discordClient;
  };

  const render = async (text: string) => {
    const result = await tts.synthesize(text);
    if (result.status !== "ok") {
      log.warn(`No audio for request (${result.status})`);
      return null;
    }
    const clip = createClip(result.waveform, { sampleRate: config.sampleRate });
    return { clip, result };
  };

  return {
    async join(guildId: string, channelId: string) {
      const channel = await requireDiscord().channels.fetch(channelId);
      const adapterCreator = resolveAdapterCreator(channel);
      await tts.start();

      await voiceManager.join({
        guildId,
        channelId,
        adapterCreator,
        selfDeaf: config.autoDeaf,
        selfMute: config.autoMute,
      });
      log.info(`Joined voice channel ${channelId} in guild ${guildId}`);
    },

    async leave(guildId: string) {
      if (voiceManager.leave(guildId)) {
        log.info(`Left voice channel in guild ${guildId}`);
      }
    },

    async speak(guildId: string, text: string) {
      const connection: VoiceConnection | undefined = voiceManager.get(guildId);
      if (!connection) {
        throw new Error(`Not connected to a voice channel for guild ${guildId}`);
      }
      if (!text.trim()) {
        log.warn("Speak called with empty text");
        return NOTHING_SPOKEN;
      }

      const rendered = await render(text);
      if (!rendered) return NOTHING_SPOKEN;

      player ??= new VoicePlayer(config.ffmpegPath);
      await player.play(rendered.clip, connection);
      return summarize(rendered.clip.durationMs, rendered.result);
    },

    async synthesizeToFile(text: string, outputPath: string) {
      if (!text.trim()) {
        log.warn("Synthesize called with empty text");
        return NOTHING_SPOKEN;
      }

      const rendered = await render(text);
      if (!rendered) return NOTHING_SPOKEN;

      await writeFile(outputPath, rendered.clip.toWav());
      log.info(`Wrote ${rendered.clip.sampleCount} samples to ${outputPath}`);
      return summarize(rendered.clip.durationMs, rendered.result);
    },

    status(logLimit?: number) {
      return {
        connectedGuilds: voiceManager.listGuilds(),
        modelInputs: tts.inputs,
        recentLog: log.recent(logLimit),
      };
    },

    async stop() {
      player?.stop();
      voiceManager.leaveAll();
      await tts.dispose();
    },
  };
}

function summarize(
  durationMs: number,
  result: { sentenceCount: number; skipped: unknown[] },
): SpeechSummary {
  return {
    spoken: true,
    durationMs,
    sentenceCount: result.sentenceCount,
    skippedSentences: result.skipped.length,
  };
}
