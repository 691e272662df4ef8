import { vi } from "vitest";
import { GitDiff, createGitDiff } from "../git/diff";

export function sampleDiff(): GitDiff {
  return createGitDiff([
    {
      path: "src/api/auth.ts",
      changeType: "added",
      additions: 42,
      deletions: 0,
      diffContent: "@@ -0,0 +1,42 @@\n+export function login() {}",
    },
  ]);
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function completion(content: string): Record<string, unknown> {
  return {
    id: "gen-test",
    choices: [{ message: { role: "assistant", content }, finish_reason: "stop" }],
  };
}

export type FetchArgs = [input: string | URL | Request, init?: RequestInit];

/** Replaces global fetch with a mock answering `responses` in order. */
export function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn(async (..._args: FetchArgs): Promise<Response> => {
    const next = responses.shift();
    if (!next) {
      throw new Error("fetch called more times than expected");
    }
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export function requestBody(init: RequestInit | undefined): Record<string, unknown> {
  return JSON.parse(String(init?.body));
}
