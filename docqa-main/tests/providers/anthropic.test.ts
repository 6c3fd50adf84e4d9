import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("@anthropic-ai/sdk", () => {
  const MockAnthropic = vi.fn();
  return { default: MockAnthropic };
});

import Anthropic from "@anthropic-ai/sdk";
import type { LlmProvider } from "../../src/core/contracts/provider.js";

async function getProvider(): Promise<LlmProvider> {
  const mod = await import("../../src/providers/anthropic/index.js");
  return mod.default;
}

function mockAnthropicConstructor(mockCreate: ReturnType<typeof vi.fn>): void {
  vi.mocked(Anthropic).mockImplementation(function (this: unknown) {
    return { messages: { create: mockCreate } } as unknown as Anthropic;
  } as never);
}

describe("Anthropic provider", () => {
  const originalEnv = { ...process.env };
  let provider: LlmProvider;

  beforeEach(async () => {
    vi.clearAllMocks();
    provider = await getProvider();
    provider.stop();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("should list its models with claude-3-5-haiku-latest as default", () => {
    expect(provider.models).toEqual(["claude-3-5-haiku-latest", "claude-sonnet-4-5"]);
    expect(provider.defaultModel).toBe("claude-3-5-haiku-latest");
  });

  it("should throw when ANTHROPIC_API_KEY is missing", () => {
    delete process.env["ANTHROPIC_API_KEY"];
    expect(() => provider.start()).toThrow("Missing ANTHROPIC_API_KEY environment variable.");
  });

  it("should initialize when API key is present", () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";
    expect(() => provider.start()).not.toThrow();
    expect(Anthropic).toHaveBeenCalledWith({ apiKey: "test-key" });
  });

  it("should move the system message into the system field", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";

    const mockCreate = vi.fn().mockResolvedValue({
      content: [{ type: "text", text: "Hello from Claude" }],
    });

    mockAnthropicConstructor(mockCreate);

    provider.start();
    const out = await provider.generateTurn({
      model: "claude-sonnet-4-5",
      messages: [
        { role: "system", content: "System" },
        { role: "user", content: "Hi" },
      ],
    });

    expect(mockCreate).toHaveBeenCalledWith({
      model: "claude-sonnet-4-5",
      max_tokens: 1024,
      system: "System",
      messages: [{ role: "user", content: "Hi" }],
    });
    expect(out).toEqual({ type: "assistant", content: "Hello from Claude" });
  });

  it("should omit the system field when no system message is sent", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";

    const mockCreate = vi.fn().mockResolvedValue({
      content: [
        { type: "text", text: "First" },
        { type: "text", text: "Second" },
      ],
    });

    mockAnthropicConstructor(mockCreate);

    provider.start();
    const out = await provider.generateTurn({
      model: "claude-3-5-haiku-latest",
      messages: [{ role: "user", content: "Hi" }],
    });

    expect(mockCreate).toHaveBeenCalledWith({
      model: "claude-3-5-haiku-latest",
      max_tokens: 1024,
      messages: [{ role: "user", content: "Hi" }],
    });
    expect(out).toEqual({ type: "assistant", content: "First\nSecond" });
  });

  it("should throw on empty response", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";

    const mockCreate = vi.fn().mockResolvedValue({
      content: [],
    });

    mockAnthropicConstructor(mockCreate);

    provider.start();
    await expect(
      provider.generateTurn({ model: "claude-3-5-haiku-latest", messages: [{ role: "user", content: "Hi" }] }),
    ).rejects.toThrow("Empty response from Anthropic.");
  });

  it("should throw when calling generateTurn before start", async () => {
    await expect(
      provider.generateTurn({ model: "claude-3-5-haiku-latest", messages: [{ role: "user", content: "Hi" }] }),
    ).rejects.toThrow("Anthropic provider not started.");
  });

  it("should clean up on stop", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";

    mockAnthropicConstructor(vi.fn());

    provider.start();
    provider.stop();
    await expect(
      provider.generateTurn({ model: "claude-3-5-haiku-latest", messages: [{ role: "user", content: "Hi" }] }),
    ).rejects.toThrow("Anthropic provider not started.");
  });
});
