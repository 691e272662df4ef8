import { describe, expect, it } from "vitest";
import { formatCommitMessage, formatSubject } from "./commitFormatter";
import { createCommitMessage } from "./commitMessage";
import { parseCommitText } from "./commitParser";

describe("formatCommitMessage", () => {
  it("renders type(scope): description", () => {
    const message = createCommitMessage({ type: "feat", scope: "api", description: "add login endpoint" });

    expect(formatCommitMessage(message)).toBe("feat(api): add login endpoint");
  });

  it("omits the parentheses without a scope", () => {
    const message = createCommitMessage({ type: "chore", description: "bump dependencies" });

    expect(formatSubject(message)).toBe("chore: bump dependencies");
  });

  it("separates the body with a blank line", () => {
    const message = createCommitMessage({
      type: "fix",
      scope: "git",
      description: "read renamed files",
      body: "Numstat reports renames with arrows.",
    });

    expect(formatCommitMessage(message)).toBe("fix(git): read renamed files\n\nNumstat reports renames with arrows.");
  });

  it("appends breaking change footers", () => {
    const message = createCommitMessage({
      type: "refactor",
      description: "rename provider options",
      body: "Options now use camelCase.",
      breakingChanges: ["baseURL is now baseUrl"],
    });

    expect(formatCommitMessage(message)).toBe(
      "refactor: rename provider options\n\nOptions now use camelCase.\n\nBREAKING CHANGE: baseURL is now baseUrl"
    );
  });

  it("truncates a long subject when a limit is given", () => {
    const message = createCommitMessage({ type: "feat", description: "a".repeat(40) });

    expect(formatCommitMessage(message, { maxSubjectLength: 20 })).toBe("feat: aaaaaaaaaaa...");
  });

  it("round-trips through parseCommitText", () => {
    const original = createCommitMessage({
      type: "perf",
      scope: "registry",
      description: "skip probe when tool is missing",
      body: "Avoids spawning a shell twice.",
    });

    const parsed = parseCommitText(formatCommitMessage(original));

    expect(parsed.type).toBe(original.type);
    expect(parsed.scope).toBe(original.scope);
    expect(parsed.description).toBe(original.description);
    expect(parsed.body).toBe(original.body);
  });
});
