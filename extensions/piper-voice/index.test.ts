import { describe, it, expect, vi } from "vitest";
import plugin, { executeAction } from "./index.js";
import type { VoiceRuntime } from "./src/runtime.js";

type PluginApi = Parameters<typeof plugin.register>[0];
type RegisteredTool = Parameters<PluginApi["registerTool"]>[0];
type RegisteredService = { id: string; stop: () => Promise<void> };

const spoken = { spoken: true, durationMs: 250, sentenceCount: 1, skippedSentences: 0 };

function fakeRuntime() {
  return {
    join: vi.fn(async () => undefined),
    leave: vi.fn(async () => undefined),
    speak: vi.fn(async () => spoken),
    synthesizeToFile: vi.fn(async () => spoken),
    status: vi.fn(() => ({ connectedGuilds: ["g1"], modelInputs: [], recentLog: [] })),
    stop: vi.fn(async () => undefined),
  } satisfies VoiceRuntime;
}

function registerWith(pluginConfig: unknown) {
  const tools: RegisteredTool[] = [];
  const services: RegisteredService[] = [];
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  plugin.register({
    pluginConfig,
    logger,
    registerTool: (tool) => tools.push(tool),
    registerService: (service) => services.push(service),
  });
  const [tool] = tools;
  if (!tool) throw new Error("tool was not registered");
  return { tool, services, logger };
}

describe("executeAction", () => {
  it("routes each action to the runtime", async () => {
    const runtime = fakeRuntime();

    await expect(executeAction(runtime, { action: "join", guildId: "g1", channelId: "c1" })).resolves.toEqual({
      ok: true,
    });
    await expect(executeAction(runtime, { action: "leave", guildId: "g1" })).resolves.toEqual({ ok: true });
    await expect(executeAction(runtime, { action: "speak", guildId: "g1", text: "Hi." })).resolves.toEqual({
      ok: true,
      ...spoken,
    });
    await expect(
      executeAction(runtime, { action: "synthesize", text: "Hi.", outputPath: "/tmp/hi.wav" }),
    ).resolves.toEqual({ ok: true, path: "/tmp/hi.wav", ...spoken });
    await expect(executeAction(runtime, { action: "status", logLines: 5 })).resolves.toEqual({
      connectedGuilds: ["g1"],
      modelInputs: [],
      recentLog: [],
    });

    expect(runtime.join).toHaveBeenCalledWith("g1", "c1");
    expect(runtime.leave).toHaveBeenCalledWith("g1");
    expect(runtime.speak).toHaveBeenCalledWith("g1", "Hi.");
    expect(runtime.synthesizeToFile).toHaveBeenCalledWith("Hi.", "/tmp/hi.wav");
    expect(runtime.status).toHaveBeenCalledWith(5);
  });
});

describe("piper-voice plugin", () => {
  it("parses its config through the schema", () => {
    expect(plugin.configSchema.parse({ voice: "de" })).toMatchObject({ voice: "de", glottal: 0.8 });
  });

  it("warns about an incomplete config", () => {
    const { logger } = registerWith({});

    expect(logger.warn).toHaveBeenCalledWith("[piper-voice] Config issues: modelPath is required");
  });

  it("registers the piper_voice tool", () => {
    const { tool, services } = registerWith({ modelPath: "voice.onnx" });

    expect(tool.name).toBe("piper_voice");
    expect(services.map((service) => service.id)).toEqual(["piper-voice"]);
  });

  it("rejects malformed tool parameters", async () => {
    const { tool } = registerWith({ modelPath: "voice.onnx" });

    await expect(tool.execute("call-1", { action: "dance" })).rejects.toThrow("Invalid parameters:");
    await expect(tool.execute("call-2", { action: "speak", guildId: "g1" })).rejects.toThrow("Invalid parameters:");
  });

  it("refuses to act when disabled", async () => {
    const { tool } = registerWith({ enabled: false, modelPath: "voice.onnx" });

    await expect(tool.execute("call-1", { action: "status" })).rejects.toThrow("Piper voice extension disabled");
  });

  it("reports status and stops the runtime with the host", async () => {
    const { tool, services, logger } = registerWith({ modelPath: "voice.onnx" });

    await expect(tool.execute("call-1", { action: "status" })).resolves.toEqual({
      connectedGuilds: [],
      modelInputs: [],
      recentLog: [],
    });

    await services[0].stop();

    expect(logger.info).toHaveBeenLastCalledWith("[piper-voice] PiperTTS released");
  });
});
