import { ChangeType, FileDiff, GitDiff, createGitDiff } from "./diff";

interface LineStats {
  additions: number;
  deletions: number;
}

interface NameStatusEntry {
  changeType: ChangeType;
  path: string;
}

const STATUS_TYPES: Record<string, ChangeType> = {
  A: "added",
  C: "added",
  D: "deleted",
  M: "modified",
  T: "modified",
  R: "renamed",
};

/** Maps `old => new` and `dir/{old => new}/file` numstat paths to the new path. */
export function resolveRenamedPath(raw: string): string {
  const braced = raw.match(/^(.*)\{(.*) => (.*)\}(.*)$/);
  if (braced) {
    const [, prefix, , to, suffix] = braced;
    return `${prefix}${to}${suffix}`.replace(/\/{2,}/g, "/");
  }
  const arrow = raw.indexOf(" => ");
  return arrow >= 0 ? raw.slice(arrow + 4) : raw;
}

export function parseNumstat(output: string): Map<string, LineStats> {
  const stats = new Map<string, LineStats>();
  for (const line of output.split("\n")) {
    const parts = line.split("\t");
    if (parts.length < 3) continue;
    const [added, deleted, ...rest] = parts;
    // Binary files report "-" for both counts.
    stats.set(resolveRenamedPath(rest.join("\t")), {
      additions: added === "-" ? 0 : Number.parseInt(added, 10) || 0,
      deletions: deleted === "-" ? 0 : Number.parseInt(deleted, 10) || 0,
    });
  }
  return stats;
}

export function parseNameStatus(output: string): NameStatusEntry[] {
  const entries: NameStatusEntry[] = [];
  for (const line of output.split("\n")) {
    const parts = line.split("\t");
    if (parts.length < 2) continue;
    const changeType = STATUS_TYPES[parts[0].charAt(0)];
    if (!changeType) continue;
    entries.push({ changeType, path: parts[parts.length - 1] });
  }
  return entries;
}

function pathFromBlock(block: string): string | undefined {
  const lines = block.split("\n");
  const added = lines.find((line) => line.startsWith("+++ b/"));
  if (added) return added.slice("+++ b/".length);
  const renamed = lines.find((line) => line.startsWith("rename to "));
  if (renamed) return renamed.slice("rename to ".length);
  const removed = lines.find((line) => line.startsWith("--- a/"));
  if (removed) return removed.slice("--- a/".length);
  const header = lines[0].match(/^diff --git a\/(.+) b\/(.+)$/);
  return header ? header[2] : undefined;
}

/** Splits a combined patch into per-file blocks keyed by the file's new path. */
export function splitPatch(patch: string): Map<string, string> {
  const blocks = new Map<string, string>();
  const starts: number[] = [];
  const lines = patch.split("\n");
  lines.forEach((line, index) => {
    if (line.startsWith("diff --git ")) starts.push(index);
  });

  starts.forEach((start, i) => {
    const end = i + 1 < starts.length ? starts[i + 1] : lines.length;
    const block = lines.slice(start, end).join("\n").trimEnd();
    const filePath = pathFromBlock(block);
    if (filePath) {
      blocks.set(filePath, block);
    }
  });
  return blocks;
}

export function parseStagedDiff(numstat: string, nameStatus: string, patch: string): GitDiff {
  const stats = parseNumstat(numstat);
  const contents = splitPatch(patch);

  const files: FileDiff[] = parseNameStatus(nameStatus).map((entry) => {
    const lineStats = stats.get(entry.path) ?? { additions: 0, deletions: 0 };
    return {
      path: entry.path,
      changeType: entry.changeType,
      additions: lineStats.additions,
      deletions: lineStats.deletions,
      diffContent: contents.get(entry.path) ?? "",
    };
  });

  return createGitDiff(files);
}
