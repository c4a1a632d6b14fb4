import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { UploadOutcome, WorkspaceClient } from "./client.js";

/** The part of {@link WorkspaceClient} a batch upload needs. */
export type DocumentUploader = Pick<WorkspaceClient, "uploadDocument">;

export interface UploadDirectoryOptions {
  /** File extensions to pick up, with or without the leading dot. @default [".txt"] */
  extensions?: readonly string[];
  /** Called once per extension with the number of matching files. */
  onFound?: (extension: string, count: number) => void;
  /** Called after each file, successful or not. */
  onOutcome?: (outcome: UploadOutcome) => void;
}

export interface UploadSummary {
  directory: string;
  uploaded: number;
  failed: number;
  outcomes: UploadOutcome[];
  /** True when the directory did not exist; nothing was attempted. */
  missingDirectory: boolean;
}

/**
 * Uploads every matching file directly inside `directory`, one at a time.
 *
 * A failed file is counted and the batch moves on. Files are visited per
 * extension in the order given, sorted by name within each extension.
 */
export async function uploadDirectory(
  client: DocumentUploader,
  directory: string,
  options: UploadDirectoryOptions = {},
): Promise<UploadSummary> {
  const summary: UploadSummary = {
    directory,
    uploaded: 0,
    failed: 0,
    outcomes: [],
    missingDirectory: false,
  };

  if (!(await isDirectory(directory))) {
    summary.missingDirectory = true;
    return summary;
  }

  const entries = await readdir(directory, { withFileTypes: true });
  const fileNames = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  const seen = new Set<string>();
  for (const extension of normalizeExtensions(options.extensions ?? [".txt"])) {
    const matches = fileNames.filter((name) => name.endsWith(extension) && !seen.has(name));
    options.onFound?.(extension, matches.length);

    for (const name of matches) {
      seen.add(name);
      const outcome = await client.uploadDocument(join(directory, name), name);
      summary.outcomes.push(outcome);
      if (outcome.ok) {
        summary.uploaded++;
      } else {
        summary.failed++;
      }
      options.onOutcome?.(outcome);
    }
  }

  return summary;
}

/**
 * A batch counts as successful when the directory existed and no file failed.
 */
export function uploadSucceeded(summary: UploadSummary): boolean {
  return !summary.missingDirectory && summary.failed === 0;
}

export function normalizeExtensions(extensions: readonly string[]): string[] {
  const normalized = extensions
    .map((ext) => ext.trim())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`));
  return [...new Set(normalized)];
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
