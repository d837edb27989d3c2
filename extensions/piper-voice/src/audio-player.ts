import {
  type AudioPlayer,
  AudioPlayerStatus,
  type VoiceConnection,
  createAudioPlayer,
  createAudioResource,
  StreamType,
} from "@discordjs/voice";
import { spawn } from "node:child_process";
import { Readable } from "node:stream";
import type { AudioClip } from "./audio-clip.js";

// Discord voice takes 48 kHz stereo s16le.
export const DISCORD_SAMPLE_RATE = 48_000;
export const DISCORD_CHANNELS = 2;

export function discordResampleArgs(clip: Pick<AudioClip, "sampleRate" | "channelCount">): string[] {
  return [
    "-f",
    "s16le",
    "-ar",
    String(clip.sampleRate),
    "-ac",
    String(clip.channelCount),
    "-i",
    "pipe:0",
    "-f",
    "s16le",
    "-ar",
    String(DISCORD_SAMPLE_RATE),
    "-ac",
    String(DISCORD_CHANNELS),
    "pipe:1",
  ];
}

export class VoicePlayer {
  private readonly player: AudioPlayer;

  constructor(private readonly ffmpegPath: string) {
    this.player = createAudioPlayer();
  }

  async play(clip: AudioClip, connection: VoiceConnection): Promise<void> {
    const pcm = await this.resampleForDiscord(clip);
    const resource = createAudioResource(Readable.from([pcm]), {
      inputType: StreamType.Raw,
    });

    connection.subscribe(this.player);
    this.player.play(resource);

    return new Promise((resolve, reject) => {
      const onIdle = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      const cleanup = () => {
        this.player.removeListener(AudioPlayerStatus.Idle, onIdle);
        this.player.removeListener("error", onError);
      };

      this.player.once(AudioPlayerStatus.Idle, onIdle);
      this.player.once("error", onError);
    });
  }

  stop(): void {
    this.player.stop(true);
  }

  private resampleForDiscord(clip: AudioClip): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const ffmpeg = spawn(this.ffmpegPath, discordResampleArgs(clip));

      const chunks: Buffer[] = [];
      const errors: Buffer[] = [];

      ffmpeg.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
      ffmpeg.stderr.on("data", (chunk: Buffer) => errors.push(chunk));
      ffmpeg.on("error", (err) => reject(err));
      ffmpeg.on("close", (code) => {
        if (code === 0) {
          resolve(Buffer.concat(chunks));
          return;
        }
        const message = Buffer.concat(errors).toString().trim();
        reject(new Error(message || `ffmpeg exited with code ${code}`));
      });

      ffmpeg.stdin.write(clip.toPcm16());
      ffmpeg.stdin.end();
    });
  }
}
