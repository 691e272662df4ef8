import { describe, expect, it, vi } from "vitest";
import { ProviderRegistry, ToolProbe, defaultToolProbe } from "./registry";

const noTool: ToolProbe = () => false;

describe("ProviderRegistry", () => {
  it("lists the fixed catalog in order", () => {
    const registry = new ProviderRegistry({ env: {}, probe: noTool });

    expect(registry.getProviderNames()).toEqual(["openai", "anthropic", "gemini", "deepseek", "openrouter", "ollama"]);
  });

  it("does not list removed providers", () => {
    const names: string[] = new ProviderRegistry({ env: {}, probe: noTool }).getProviderNames();

    expect(names).not.toContain("mistral");
    expect(names).not.toContain("cohere");
    expect(names).toContain("openrouter");
  });

  it("marks network providers configured from their key variables", () => {
    const registry = new ProviderRegistry({
      env: { OPENAI_API_KEY: "test-secret", DEEPSEEK_API_KEY: "   ", GOOGLE_API_KEY: "test-secret" },
      probe: noTool,
    });

    expect(registry.getConfiguredProviders()).toEqual(["openai", "gemini"]);
  });

  it("describes each provider with example models", () => {
    const info = new ProviderRegistry({ env: { OPENROUTER_API_KEY: "test-secret" }, probe: noTool }).getProviderInfo(
      "openrouter"
    );

    expect(info.configured).toBe(true);
    expect(info.description).toBe("OpenRouter (unified access to 100+ models)");
    expect(info.models).toContain("anthropic/claude-3-5-sonnet");
  });

  it("probes the ollama binary for the local provider", () => {
    const probe = vi.fn<Parameters<ToolProbe>, boolean>(() => true);
    const registry = new ProviderRegistry({ env: {}, probe });

    expect(registry.getConfiguredProviders()).toEqual(["ollama"]);
    expect(probe).toHaveBeenCalledWith("ollama", ["--version"]);
  });

  it("treats a throwing probe as not configured", () => {
    const registry = new ProviderRegistry({
      env: {},
      probe: () => {
        throw new Error("spawn ollama ENOENT");
      },
    });

    expect(() => registry.listProviders()).not.toThrow();
    expect(registry.getProviderInfo("ollama").configured).toBe(false);
  });

  it("re-reads the environment on every query", () => {
    const env: Record<string, string | undefined> = {};
    const registry = new ProviderRegistry({ env, probe: noTool });

    expect(registry.getConfiguredProviders()).toEqual([]);
    env.ANTHROPIC_API_KEY = "test-secret";
    expect(registry.getConfiguredProviders()).toEqual(["anthropic"]);
  });

  it("runs the probe again on every query", () => {
    const probe = vi.fn<Parameters<ToolProbe>, boolean>().mockReturnValueOnce(false).mockReturnValueOnce(true);
    const registry = new ProviderRegistry({ env: {}, probe });

    expect(registry.getProviderInfo("ollama").configured).toBe(false);
    expect(registry.getProviderInfo("ollama").configured).toBe(true);
    expect(probe).toHaveBeenCalledTimes(2);
  });
});

describe("defaultToolProbe", () => {
  it("reports a missing executable as unavailable", () => {
    expect(defaultToolProbe("no-such-tool-xyz", ["--version"])).toBe(false);
  });

  it("reports a non-zero exit as unavailable", () => {
    expect(defaultToolProbe(process.execPath, ["-e", "process.exit(3)"])).toBe(false);
  });

  it("reports a clean exit as available", () => {
    expect(defaultToolProbe(process.execPath, ["--version"])).toBe(true);
  });
});
