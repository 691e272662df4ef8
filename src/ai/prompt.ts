import { GitDiff } from "../git/diff";
import { renderTemplate } from "../prompts/loader";

export function formatFileList(diff: GitDiff): string {
  return diff.files.map((file) => `- ${file.path} (+${file.additions} -${file.deletions})`).join("\n");
}

export function buildCommitPrompt(templateName: string, diff: GitDiff, templateDirectory?: string): string {
  return renderTemplate(
    templateName,
    {
      file_list: formatFileList(diff),
      total_additions: diff.totalAdditions,
      total_deletions: diff.totalDeletions,
    },
    { directory: templateDirectory }
  );
}
