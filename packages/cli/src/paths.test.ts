import { homedir } from "node:os";
import { describe, expect, it } from "vitest";
import { expandTildePath } from "./paths.js";

describe("expandTildePath", () => {
  const home = homedir();

  it("expands ~ at the start of the path", () => {
    expect(expandTildePath("~/.ragmate/cli.toml")).toBe(`${home}/.ragmate/cli.toml`);
    expect(expandTildePath("~")).toBe(home);
  });

  it("leaves other paths unchanged", () => {
    expect(expandTildePath("/srv/papers")).toBe("/srv/papers");
    expect(expandTildePath("./data/papers")).toBe("./data/papers");
    expect(expandTildePath("/data/~drafts")).toBe("/data/~drafts");
    expect(expandTildePath("")).toBe("");
  });
});
