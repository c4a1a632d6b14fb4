import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Command } from "commander";
import { z } from "zod";
import type { CLIConfig } from "./config.js";
import { COMMANDS, DEFAULT_SAMPLES_DIRECTORY, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { resolveWorkspaceOptions } from "./settings.js";
import { uploadWithProgress } from "./upload-command.js";
import { executeAction } from "./utils.js";

const sampleDocumentSchema = z.object({
  filename: z.string().regex(/^[\w.-]+\.txt$/, "must be a plain .txt file name"),
  title: z.string(),
  authors: z.array(z.string()),
  year: z.number().int(),
  keywords: z.array(z.string()),
  abstract: z.string(),
});

export type SampleDocument = z.infer<typeof sampleDocumentSchema>;

export const SAMPLE_DOCUMENTS_URL = new URL("../data/sample-documents.json", import.meta.url);

export interface SamplesCommandOptions {
  dir?: string;
  upload?: boolean;
}

/**
 * Reads and validates the bundled sample documents.
 */
export async function loadSampleDocuments(source: URL | string = SAMPLE_DOCUMENTS_URL): Promise<SampleDocument[]> {
  const raw: unknown = JSON.parse(await readFile(source, "utf-8"));
  return z.array(sampleDocumentSchema).parse(raw);
}

/**
 * Plain-text rendering written to disk and uploaded to the workspace.
 */
export function renderSampleDocument(doc: SampleDocument): string {
  return [
    `Title: ${doc.title}`,
    `Authors: ${doc.authors.join(", ")}`,
    `Year: ${doc.year}`,
    `Keywords: ${doc.keywords.join(", ")}`,
    "",
    "Abstract:",
    doc.abstract,
    "",
  ].join("\n");
}

export async function executeSamples(
  options: SamplesCommandOptions,
  env: CLIEnvironment,
  config?: CLIConfig,
): Promise<void> {
  const directory = options.dir ?? DEFAULT_SAMPLES_DIRECTORY;
  const documents = await loadSampleDocuments();

  await mkdir(directory, { recursive: true });
  for (const doc of documents) {
    await writeFile(join(directory, doc.filename), renderSampleDocument(doc), "utf-8");
  }
  env.stdout.write(`Created ${documents.length} sample papers in ${directory}\n`);

  if (!options.upload) {
    return;
  }

  const client = env.createWorkspaceClient(resolveWorkspaceOptions(env, config?.workspace));
  const summary = await uploadWithProgress(client, directory, [".txt"], env);
  env.stdout.write(`\nUpload summary: ${summary.uploaded} successful, ${summary.failed} failed\n`);
  if (summary.failed > 0) {
    env.setExitCode(1);
  }
}

export function registerSamplesCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  program
    .command(COMMANDS.samples)
    .description("Write a few sample papers to disk, optionally uploading them.")
    .option(OPTION_FLAGS.directory, OPTION_DESCRIPTIONS.directory)
    .option(OPTION_FLAGS.upload, OPTION_DESCRIPTIONS.upload)
    .action((options: SamplesCommandOptions) =>
      executeAction(() => executeSamples(options, env, config), env),
    );
}
