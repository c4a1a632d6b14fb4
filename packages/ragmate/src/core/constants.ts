// Workspace service defaults
export const DEFAULT_API_URL = "http://localhost:3001/api";
export const DEFAULT_WORKSPACE_SLUG = "scientific-papers";
export const DEFAULT_WORKSPACE_NAME = "Scientific Papers";

// Environment variables read when explicit options are absent
export const ENV_API_URL = "RAGMATE_API_URL";
export const ENV_API_KEY = "RAGMATE_API_KEY";
export const ENV_WORKSPACE_SLUG = "RAGMATE_WORKSPACE_SLUG";
export const ENV_MODEL = "RAGMATE_MODEL";
export const ENV_OPENAI_API_KEY = "OPENAI_API_KEY";
export const ENV_OPENAI_BASE_URL = "OPENAI_BASE_URL";

/** Model used by the direct backend when none is configured */
export const DEFAULT_DIRECT_MODEL = "gpt-4o-mini";

/** Number of memory entries rendered into each prompt */
export const DEFAULT_MEMORY_WINDOW = 2;

/** Approximate characters per token for token-budget retention */
export const CHARS_PER_TOKEN = 4;

/** Sources returned by a document search unless a limit is given */
export const DEFAULT_SEARCH_LIMIT = 8;

/** MIME type used for document uploads */
export const UPLOAD_MIME_TYPE = "text/plain";
