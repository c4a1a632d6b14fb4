import { homedir } from "node:os";

/**
 * Expands tilde (~) to the user's home directory in a path string.
 * Only expands tildes at the start of the path.
 *
 * @example
 * expandTildePath("~/.ragmate/cli.toml") // "/home/ada/.ragmate/cli.toml"
 * expandTildePath("./data/papers")       // "./data/papers" (unchanged)
 */
export function expandTildePath(path: string): string {
  if (!path.startsWith("~")) {
    return path;
  }
  return path.replace(/^~/, homedir());
}
