/** CLI program name */
export const CLI_NAME = "ragmate";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION =
  "Ask questions against a workspace-based RAG service and manage its documents.";

/** Available CLI commands */
export const COMMANDS = {
  check: "check",
  setup: "setup",
  upload: "upload",
  samples: "samples",
  search: "search",
  ask: "ask",
  chat: "chat",
  init: "init",
} as const;

/** Valid log level names */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type CLILogLevel = (typeof LOG_LEVELS)[number];

/** Directories uploaded by `setup` when the config names none */
export const DEFAULT_UPLOAD_DIRECTORIES = ["./data/papers", "./data/papers_future", "./data/authors"];

/** Directory written by `samples` unless --dir is given */
export const DEFAULT_SAMPLES_DIRECTORY = "./data/papers";

/** Typed ending that leaves an interactive chat */
export const CHAT_EXIT_COMMANDS = new Set(["exit", "quit"]);

/** Command-line option flags */
export const OPTION_FLAGS = {
  logLevel: "--log-level <level>",
  extensions: "-e, --ext <extensions...>",
  directory: "-d, --dir <path>",
  upload: "--upload",
  noRag: "--no-rag",
  noMemory: "--no-memory",
  system: "-s, --system <prompt>",
  name: "-n, --name <name>",
  sender: "--sender <name>",
  context: "-c, --context <text>",
  limit: "-l, --limit <count>",
  memoryWindow: "--memory-window <count>",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  extensions: "File extensions to upload (default: .txt).",
  directory: "Directory to write the sample documents to.",
  upload: "Upload the documents after writing them.",
  noRag: "Answer without workspace retrieval (query mode).",
  noMemory: "Do not keep or replay conversation memory.",
  system: "System prompt for the agent.",
  name: "Display name of the agent.",
  sender: "Name recorded as the sender of your messages.",
  context: "Extra context placed before the question.",
  limit: "Maximum number of documents to list.",
  memoryWindow: "Number of remembered messages replayed into each prompt.",
} as const;

/** Prefix for summary output written to stderr */
export const SUMMARY_PREFIX = "[ragmate]";

/** Environment variables users are pointed at when configuration is missing */
export const SETUP_ENV_HINTS = [
  "RAGMATE_API_KEY=<your workspace API key>",
  "RAGMATE_API_URL=http://localhost:3001/api",
  "RAGMATE_WORKSPACE_SLUG=scientific-papers",
];
