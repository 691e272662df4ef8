import { isRecord } from "./http";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
}

export const COMMIT_SYSTEM_PROMPT =
  "You are a commit message generator. Generate concise conventional commit messages.";

export function buildChatCompletionBody(
  model: string,
  prompt: string,
  temperature: number,
  maxTokens: number
): ChatCompletionBody {
  return {
    model,
    messages: [
      { role: "system", content: COMMIT_SYSTEM_PROMPT },
      { role: "user", content: prompt },
    ],
    temperature,
    max_tokens: maxTokens,
  };
}

/** Reads `choices[0].message.content` from an OpenAI-style completion. */
export function extractChatCompletionText(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined;
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  const { content } = first.message;
  return typeof content === "string" ? content : undefined;
}
