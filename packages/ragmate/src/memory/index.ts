export { BufferedMemoryWindow, estimateMessageTokens } from "./buffered-window.js";
export type { MemoryWindow, RetentionPolicy } from "./types.js";
