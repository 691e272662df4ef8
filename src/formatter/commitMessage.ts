export const COMMIT_TYPES = [
  "feat",
  "fix",
  "docs",
  "style",
  "refactor",
  "perf",
  "test",
  "build",
  "ci",
  "chore",
  "revert",
] as const;

export type CommitType = (typeof COMMIT_TYPES)[number];

export interface CommitMessage {
  readonly type: CommitType;
  readonly scope: string | null;
  readonly description: string;
  readonly body: string | null;
  readonly breakingChanges: readonly string[];
}

export interface CommitMessageFields {
  type: CommitType;
  scope?: string | null;
  description: string;
  body?: string | null;
  breakingChanges?: readonly string[];
}

export function isCommitType(value: string): value is CommitType {
  return COMMIT_TYPES.some((type) => type === value);
}

export function createCommitMessage(fields: CommitMessageFields): CommitMessage {
  return Object.freeze({
    type: fields.type,
    scope: fields.scope || null,
    description: fields.description,
    body: fields.body || null,
    breakingChanges: Object.freeze([...(fields.breakingChanges ?? [])]),
  });
}
