import { describe, expect, it } from "vitest";
import { parseNameStatus, parseNumstat, parseStagedDiff, resolveRenamedPath, splitPatch } from "./diffCollector";

const NUMSTAT = ["12\t3\tsrc/cli.ts", "40\t0\tsrc/ai/registry.ts", "-\t-\tassets/logo.png", "0\t25\tsrc/legacy.ts"].join(
  "\n"
);

const NAME_STATUS = ["M\tsrc/cli.ts", "A\tsrc/ai/registry.ts", "A\tassets/logo.png", "D\tsrc/legacy.ts"].join("\n");

const PATCH = [
  "diff --git a/src/cli.ts b/src/cli.ts",
  "index 1111111..2222222 100644",
  "--- a/src/cli.ts",
  "+++ b/src/cli.ts",
  "@@ -1,3 +1,12 @@",
  "+import chalk from \"chalk\";",
  "diff --git a/src/ai/registry.ts b/src/ai/registry.ts",
  "new file mode 100644",
  "--- /dev/null",
  "+++ b/src/ai/registry.ts",
  "@@ -0,0 +1,40 @@",
  "+export class ProviderRegistry {}",
  "diff --git a/assets/logo.png b/assets/logo.png",
  "new file mode 100644",
  "Binary files /dev/null and b/assets/logo.png differ",
  "diff --git a/src/legacy.ts b/src/legacy.ts",
  "deleted file mode 100644",
  "--- a/src/legacy.ts",
  "+++ /dev/null",
  "@@ -1,25 +0,0 @@",
  "-export {};",
  "",
].join("\n");

describe("resolveRenamedPath", () => {
  it("keeps plain paths", () => {
    expect(resolveRenamedPath("src/cli.ts")).toBe("src/cli.ts");
  });

  it("takes the target of a full rename", () => {
    expect(resolveRenamedPath("old.ts => new.ts")).toBe("new.ts");
  });

  it("expands braced renames", () => {
    expect(resolveRenamedPath("src/{utils => lib}/format.ts")).toBe("src/lib/format.ts");
    expect(resolveRenamedPath("src/{ => nested}/a.ts")).toBe("src/nested/a.ts");
    expect(resolveRenamedPath("src/{nested => }/a.ts")).toBe("src/a.ts");
  });
});

describe("parseNumstat", () => {
  it("reads counts and treats binary files as zero", () => {
    const stats = parseNumstat(NUMSTAT);

    expect(stats.get("src/cli.ts")).toEqual({ additions: 12, deletions: 3 });
    expect(stats.get("assets/logo.png")).toEqual({ additions: 0, deletions: 0 });
    expect(stats.size).toBe(4);
  });
});

describe("parseNameStatus", () => {
  it("maps status letters to change types", () => {
    expect(parseNameStatus("R087\tsrc/old.ts\tsrc/new.ts\nC100\ta.ts\tb.ts\nT\tlink\nX\tweird")).toEqual([
      { changeType: "renamed", path: "src/new.ts" },
      { changeType: "added", path: "b.ts" },
      { changeType: "modified", path: "link" },
    ]);
  });
});

describe("splitPatch", () => {
  it("keys each block by its file path", () => {
    const blocks = splitPatch(PATCH);

    expect([...blocks.keys()]).toEqual(["src/cli.ts", "src/ai/registry.ts", "assets/logo.png", "src/legacy.ts"]);
    expect(blocks.get("src/cli.ts")).toBe(
      [
        "diff --git a/src/cli.ts b/src/cli.ts",
        "index 1111111..2222222 100644",
        "--- a/src/cli.ts",
        "+++ b/src/cli.ts",
        "@@ -1,3 +1,12 @@",
        "+import chalk from \"chalk\";",
      ].join("\n")
    );
  });

  it("uses the rename target for pure renames", () => {
    const blocks = splitPatch(
      ["diff --git a/a.ts b/b.ts", "similarity index 100%", "rename from a.ts", "rename to b.ts"].join("\n")
    );

    expect([...blocks.keys()]).toEqual(["b.ts"]);
  });
});

describe("parseStagedDiff", () => {
  it("combines the three outputs in name-status order", () => {
    const diff = parseStagedDiff(NUMSTAT, NAME_STATUS, PATCH);

    expect(diff.files.map((file) => [file.path, file.changeType, file.additions, file.deletions])).toEqual([
      ["src/cli.ts", "modified", 12, 3],
      ["src/ai/registry.ts", "added", 40, 0],
      ["assets/logo.png", "added", 0, 0],
      ["src/legacy.ts", "deleted", 0, 25],
    ]);
    expect(diff.files[3].diffContent).toContain("deleted file mode 100644");
  });

  it("keeps the totals equal to the per-file sums", () => {
    const diff = parseStagedDiff(NUMSTAT, NAME_STATUS, PATCH);

    expect(diff.totalAdditions).toBe(52);
    expect(diff.totalDeletions).toBe(28);
  });

  it("matches renamed files across outputs", () => {
    const diff = parseStagedDiff(
      "3\t1\tsrc/{utils => lib}/format.ts",
      "R092\tsrc/utils/format.ts\tsrc/lib/format.ts",
      [
        "diff --git a/src/utils/format.ts b/src/lib/format.ts",
        "similarity index 92%",
        "rename from src/utils/format.ts",
        "rename to src/lib/format.ts",
        "--- a/src/utils/format.ts",
        "+++ b/src/lib/format.ts",
      ].join("\n")
    );

    expect(diff.files).toEqual([
      {
        path: "src/lib/format.ts",
        changeType: "renamed",
        additions: 3,
        deletions: 1,
        diffContent: expect.stringContaining("rename to src/lib/format.ts"),
      },
    ]);
  });

  it("returns an empty diff when nothing is staged", () => {
    expect(parseStagedDiff("", "", "")).toEqual({ files: [], totalAdditions: 0, totalDeletions: 0 });
  });
});
