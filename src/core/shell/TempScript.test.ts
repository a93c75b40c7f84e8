import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { withTempScript } from "./TempScript.js";
import { makeTempDir } from "../../testing/fixtures.js";

describe("withTempScript", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("writes the source as UTF-8 and removes the file afterwards", async () => {
    const seen = await withTempScript("print('héllo')\n", { dir, extension: ".py" }, async (file) => ({
      file,
      content: await fs.readFile(file, "utf8"),
    }));

    expect(path.dirname(seen.file)).toBe(dir);
    expect(seen.file.endsWith(".py")).toBe(true);
    expect(seen.content).toBe("print('héllo')\n");
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("removes the file when the callback throws", async () => {
    await expect(
      withTempScript("x", { dir, extension: ".py" }, async () => {
        throw new Error("failed inside");
      }),
    ).rejects.toThrow("failed inside");

    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("uses a new name on every call", async () => {
    const first = await withTempScript("a", { dir, extension: ".py" }, async (file) => file);
    const second = await withTempScript("b", { dir, extension: ".py" }, async (file) => file);

    expect(first).not.toBe(second);
  });
});
