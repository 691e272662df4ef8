import { describe, expect, it } from "vitest";
import { completion, jsonResponse, requestBody, sampleDiff, stubFetch } from "../testing/fixtures";
import { OpenAiProvider } from "./openAiProvider";

describe("OpenAiProvider", () => {
  it("posts a chat completion with bearer auth", async () => {
    const fetchMock = stubFetch(jsonResponse(completion("fix(auth): reject expired tokens")));

    const message = await new OpenAiProvider({ apiKey: "test-secret" }).generateCommitMessage(sampleDiff());

    expect(message).toMatchObject({ type: "fix", scope: "auth", description: "reject expired tokens" });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
    const body = requestBody(init);
    expect(body.model).toBe("gpt-4o-mini");
    expect(body.temperature).toBe(0.7);
    expect(body.max_tokens).toBe(500);
  });

  it("targets DeepSeek when asked to", async () => {
    const fetchMock = stubFetch(jsonResponse(completion("docs: explain provider setup")));
    const provider = new OpenAiProvider({ providerName: "deepseek", apiKey: "test-secret" });

    await provider.generateCommitMessage(sampleDiff());

    expect(provider.name).toBe("deepseek");
    expect(fetchMock.mock.calls[0][0]).toBe("https://api.deepseek.com/chat/completions");
    expect(requestBody(fetchMock.mock.calls[0][1]).model).toBe("deepseek-chat");
  });

  it("uses a custom endpoint and model", async () => {
    const fetchMock = stubFetch(jsonResponse(completion("chore: tidy")));

    await new OpenAiProvider({
      apiKey: "test-secret",
      model: "gpt-4o",
      endpoint: "http://localhost:1234/v1/chat/completions",
    }).generateCommitMessage(sampleDiff());

    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:1234/v1/chat/completions");
    expect(requestBody(fetchMock.mock.calls[0][1]).model).toBe("gpt-4o");
  });

  it("reports a missing key", () => {
    expect(new OpenAiProvider({ apiKey: "" }).validateConfig()).toEqual([
      "OpenAI API key is required. Set OPENAI_API_KEY or get one at: https://platform.openai.com/api-keys",
    ]);
    expect(new OpenAiProvider({ providerName: "deepseek", apiKey: " " }).validateConfig()[0]).toContain(
      "DEEPSEEK_API_KEY"
    );
  });

  it("names the DeepSeek key variable on 401", async () => {
    stubFetch(jsonResponse({ error: { message: "Authentication Fails" } }, 401));

    await expect(
      new OpenAiProvider({ providerName: "deepseek", apiKey: "test-secret" }).generateCommitMessage(sampleDiff())
    ).rejects.toThrow('DeepSeek API error (401 Unauthorized): Authentication Fails\n\nGet your API key at: https://platform.deepseek.com/api_keys\nThen: export DEEPSEEK_API_KEY="sk-..."');
  });
});
