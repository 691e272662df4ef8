import { DESCRIPTION_FALLBACK_LENGTH } from "../constants";
import { CommitMessage, createCommitMessage, isCommitType } from "./commitMessage";

const SUBJECT_PATTERN = /^(\w+)(?:\(([^)]+)\))?: (.+)$/;

/**
 * Parses free-form model output into a commit message.
 *
 * The first line must read `type(scope): description` or `type: description`
 * with a known type. Anything else becomes a `chore` whose description is the
 * first line cut to 50 characters. A body is taken only when the second line
 * is blank.
 */
export function parseCommitText(text: string): CommitMessage {
  const lines = text.trim().split(/\r?\n/);
  const firstLine = lines[0].trim();

  const match = firstLine.match(SUBJECT_PATTERN);
  const type = match?.[1].toLowerCase();
  if (!match || !type || !isCommitType(type)) {
    return createCommitMessage({
      type: "chore",
      description: Array.from(firstLine).slice(0, DESCRIPTION_FALLBACK_LENGTH).join(""),
    });
  }

  let body: string | null = null;
  if (lines.length > 2 && lines[1].trim() === "") {
    body = lines.slice(2).join("\n").trim() || null;
  }

  return createCommitMessage({
    type,
    scope: match[2] ?? null,
    description: match[3].trim(),
    body,
  });
}
