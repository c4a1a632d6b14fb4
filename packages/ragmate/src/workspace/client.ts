import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { z } from "zod";
import type { Environment } from "../config/env.js";
import { resolveWorkspaceConfig, type WorkspaceConfigOptions } from "../config/resolve.js";
import { DEFAULT_SEARCH_LIMIT, DEFAULT_WORKSPACE_NAME, UPLOAD_MIME_TYPE } from "../core/constants.js";
import { BackendUnavailableError } from "../core/errors.js";
import type { GenerationMode } from "../core/modes.js";
import { defaultLogger, type ILogObj, type Logger } from "../logging/logger.js";
import {
  type ChatResponse,
  chatResponseSchema,
  type WorkspaceInfo,
  workspaceInfoSchema,
  type WorkspaceSource,
} from "./schemas.js";

export interface WorkspaceClientOptions extends WorkspaceConfigOptions {
  /** `fetch` implementation; defaults to the global one. */
  fetch?: typeof fetch;
  logger?: Logger<ILogObj>;
  /** Environment used for fallback settings. Defaults to `process.env`. */
  env?: Environment;
}

/**
 * Result of uploading one file. Uploads report failure as a value instead of throwing.
 */
export interface UploadOutcome {
  file: string;
  ok: boolean;
  error?: string;
}

/**
 * HTTP client for a workspace-based RAG service.
 *
 * Construction fails fast with `ConfigurationMissingError` when no API key is
 * available. Only `chat()` throws on transport problems; the provisioning and
 * upload helpers report failure through their return values.
 *
 * @example
 * ```typescript
 * const client = new WorkspaceClient({ workspaceSlug: "lab-notes" });
 * const { textResponse, sources } = await client.chat("What is RAG?", "chat");
 * ```
 */
export class WorkspaceClient {
  readonly apiUrl: string;
  readonly workspaceSlug: string;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger<ILogObj>;

  constructor(options: WorkspaceClientOptions = {}) {
    const config = resolveWorkspaceConfig(options, options.env);
    this.apiUrl = config.apiUrl;
    this.apiKey = config.apiKey;
    this.workspaceSlug = config.workspaceSlug;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "workspace" });
  }

  private get workspaceUrl(): string {
    return `${this.apiUrl}/v1/workspace/${encodeURIComponent(this.workspaceSlug)}`;
  }

  private jsonHeaders(): Record<string, string> {
    return { ...this.authHeaders(), "Content-Type": "application/json" };
  }

  /** Multipart uploads let `fetch` set the content type with its boundary. */
  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  /**
   * Sends a message to the workspace. `chat` mode allows retrieval, `query` does not.
   *
   * @throws BackendUnavailableError on transport failure, non-2xx status, or an
   *   unparseable response
   */
  async chat(message: string, mode: GenerationMode = "chat"): Promise<ChatResponse> {
    const url = `${this.workspaceUrl}/chat`;
    this.logger.debug("Workspace chat request", { url, mode, promptLength: message.length });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: this.jsonHeaders(),
        body: JSON.stringify({ message, mode }),
      });
    } catch (error) {
      throw new BackendUnavailableError(
        `Workspace chat request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    if (!response.ok) {
      await discardBody(response);
      throw new BackendUnavailableError(
        `Workspace chat request failed: HTTP ${response.status} ${response.statusText}`.trim(),
        { status: response.status },
      );
    }

    return parseBody(response, chatResponseSchema, "chat");
  }

  /**
   * Fetches workspace metadata. Any failure yields `undefined`, which callers
   * treat as "workspace not found".
   */
  async getWorkspace(): Promise<WorkspaceInfo | undefined> {
    try {
      const response = await this.fetchImpl(this.workspaceUrl, {
        method: "GET",
        headers: this.jsonHeaders(),
      });
      if (!response.ok) {
        await discardBody(response);
        this.logger.warn(`Workspace lookup failed: HTTP ${response.status}`);
        return undefined;
      }
      const info = await parseBody(response, workspaceInfoSchema, "workspace");
      return hasWorkspace(info) ? info : undefined;
    } catch (error) {
      this.logger.warn("Workspace lookup failed", error);
      return undefined;
    }
  }

  /**
   * Provisions a workspace under this client's slug.
   */
  async createWorkspace(name: string = DEFAULT_WORKSPACE_NAME): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.apiUrl}/v1/workspace/new`, {
        method: "POST",
        headers: this.jsonHeaders(),
        body: JSON.stringify({ name, slug: this.workspaceSlug }),
      });
      await discardBody(response);
      if (!response.ok) {
        this.logger.warn(`Workspace creation failed: HTTP ${response.status}`);
      }
      return response.ok;
    } catch (error) {
      this.logger.warn("Workspace creation failed", error);
      return false;
    }
  }

  /**
   * Uploads a file's bytes unchanged as `text/plain` under the form field `file`.
   */
  async uploadDocument(filePath: string, filename: string = basename(filePath)): Promise<UploadOutcome> {
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch {
      return { file: filePath, ok: false, error: `File not found: ${filePath}` };
    }

    const form = new FormData();
    form.append("file", new Blob([data], { type: UPLOAD_MIME_TYPE }), filename);

    try {
      const response = await this.fetchImpl(`${this.workspaceUrl}/upload`, {
        method: "POST",
        headers: this.authHeaders(),
        body: form,
      });
      await discardBody(response);
      if (!response.ok) {
        return { file: filePath, ok: false, error: `HTTP ${response.status} ${response.statusText}`.trim() };
      }
      return { file: filePath, ok: true };
    } catch (error) {
      return {
        file: filePath,
        ok: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Finds documents related to a query by asking in `chat` mode and keeping the
   * cited sources.
   */
  async searchDocuments(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<WorkspaceSource[]> {
    const response = await this.chat(
      `Find papers related to: ${query}. Please provide detailed information about relevant papers.`,
      "chat",
    );
    return (response.sources ?? []).slice(0, Math.max(0, limit));
  }
}

/**
 * Display name of a workspace from its metadata, or `undefined` when absent.
 */
export function workspaceName(info: WorkspaceInfo | undefined): string | undefined {
  const workspace = info?.workspace;
  if (!workspace) return undefined;
  if (Array.isArray(workspace)) return workspace[0]?.name;
  return workspace.name;
}

function hasWorkspace(info: WorkspaceInfo): boolean {
  const workspace = info.workspace;
  if (Array.isArray(workspace)) return workspace.length > 0;
  return Boolean(workspace);
}

/** Releases the connection behind a response whose body is not needed. */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

async function parseBody<S extends z.ZodTypeAny>(
  response: Response,
  schema: S,
  what: string,
): Promise<z.infer<S>> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new BackendUnavailableError(`Workspace ${what} response was not valid JSON`, {
      status: response.status,
      cause: error,
    });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BackendUnavailableError(
      `Unexpected workspace ${what} response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`,
      { status: response.status, cause: parsed.error },
    );
  }
  return parsed.data;
}
