import {
  entersState,
  joinVoiceChannel,
  type VoiceConnection,
  VoiceConnectionStatus,
  type DiscordGatewayAdapterCreator,
} from "@discordjs/voice";

export type JoinOptions = {
  guildId: string;
  channelId: string;
  adapterCreator: DiscordGatewayAdapterCreator;
  selfDeaf: boolean;
  selfMute: boolean;
};

export class VoiceManager {
  private connections = new Map<string, VoiceConnection>();

  constructor(private readonly readyTimeoutMs = 30_000) {}

  async join(options: JoinOptions): Promise<VoiceConnection> {
    const existing = this.connections.get(options.guildId);
    if (existing && existing.joinConfig.channelId === options.channelId) {
      return existing;
    }
    existing?.destroy();

    const connection = joinVoiceChannel(options);
    try {
      await entersState(connection, VoiceConnectionStatus.Ready, this.readyTimeoutMs);
    } catch (err) {
      connection.destroy();
      this.connections.delete(options.guildId);
      throw err;
    }
    this.connections.set(options.guildId, connection);
    return connection;
  }

  get(guildId: string): VoiceConnection | undefined {
    return this.connections.get(guildId);
  }

  listGuilds(): string[] {
    return Array.from(this.connections.keys());
  }

  leave(guildId: string): boolean {
    const connection = this.connections.get(guildId);
    if (!connection) return false;

    connection.destroy();
    this.connections.delete(guildId);
    return true;
  }

  leaveAll(): void {
    for (const guildId of this.listGuilds()) this.leave(guildId);
  }
}
