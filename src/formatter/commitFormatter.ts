import { CommitMessage } from "./commitMessage";

export interface CommitFormatOptions {
  maxSubjectLength?: number;
}

function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, max - 3).trimEnd() + "...";
}

export function formatSubject(message: CommitMessage): string {
  const scope = message.scope ? `(${message.scope})` : "";
  return `${message.type}${scope}: ${message.description}`;
}

/**
 * Renders the message the way git stores it: subject, then the body and any
 * `BREAKING CHANGE:` footers, each block separated by a blank line.
 */
export function formatCommitMessage(message: CommitMessage, options: CommitFormatOptions = {}): string {
  const subject = options.maxSubjectLength
    ? truncate(formatSubject(message), options.maxSubjectLength)
    : formatSubject(message);
  const blocks = [subject];

  const body = message.body?.trim();
  if (body) {
    blocks.push(body);
  }

  const footers = message.breakingChanges
    .map((note) => note.trim())
    .filter(Boolean)
    .map((note) => `BREAKING CHANGE: ${note}`);
  if (footers.length) {
    blocks.push(footers.join("\n"));
  }

  return blocks.join("\n\n");
}
