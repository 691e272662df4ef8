export type ChangeType = "added" | "modified" | "deleted" | "renamed";

export interface FileDiff {
  readonly path: string;
  readonly changeType: ChangeType;
  readonly additions: number;
  readonly deletions: number;
  readonly diffContent: string;
}

export interface GitDiff {
  readonly files: readonly FileDiff[];
  readonly totalAdditions: number;
  readonly totalDeletions: number;
}

/** Builds a GitDiff whose totals are the sums over `files`. */
export function createGitDiff(files: readonly FileDiff[]): GitDiff {
  const list = Object.freeze(files.map((file) => Object.freeze({ ...file })));
  return Object.freeze({
    files: list,
    totalAdditions: list.reduce((sum, file) => sum + file.additions, 0),
    totalDeletions: list.reduce((sum, file) => sum + file.deletions, 0),
  });
}
