import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InterpreterExecutor } from "./ScriptExecutor.js";
import {
  ScriptExecutionError,
  ScriptInterruptedError,
  ScriptTimeoutError,
} from "../errors/index.js";
import { createQuietLogger, makeTempDir } from "../../testing/fixtures.js";

describe("InterpreterExecutor", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  async function script(name: string, source: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, source, "utf8");
    return file;
  }

  function executor(timeoutMs = 10_000, interpreter = process.execPath) {
    return new InterpreterExecutor({ interpreter, timeoutMs, logger: createQuietLogger() });
  }

  it("captures stdout with its final newline", async () => {
    const file = await script("hello.js", 'process.stdout.write("hello\\n");');

    expect(await executor().execute(file)).toEqual({ exitCode: 0, stdout: "hello\n", stderr: "" });
  });

  it("captures stderr and the exit code separately", async () => {
    const file = await script("boom.js", 'process.stderr.write("boom");\nprocess.exitCode = 1;');

    expect(await executor().execute(file)).toEqual({ exitCode: 1, stdout: "", stderr: "boom" });
  });

  it("decodes output as UTF-8 and forces UTF-8 in the child environment", async () => {
    const file = await script(
      "utf8.js",
      'process.stdout.write("héllo ✓ " + process.env.PYTHONIOENCODING + " " + process.env.PYTHONUTF8);',
    );

    const result = await executor().execute(file);

    expect(result.stdout).toBe("héllo ✓ utf-8 1");
  });

  it("kills a script that outlives the timeout", async () => {
    const file = await script("sleep.js", "setTimeout(() => {}, 60_000);");
    const startedAt = Date.now();

    await expect(executor(300).execute(file)).rejects.toBeInstanceOf(ScriptTimeoutError);
    expect(Date.now() - startedAt).toBeLessThan(10_000);
  });

  it("does not wait for processes the script started once the timeout hits", async () => {
    const file = await script(
      "spawner.js",
      [
        'const { spawn } = require("child_process");',
        `spawn(${JSON.stringify(process.execPath)}, ["-e", "setTimeout(() => {}, 8000)"], { stdio: "inherit" });`,
        "setTimeout(() => {}, 60_000);",
      ].join("\n"),
    );
    const startedAt = Date.now();

    await expect(executor(300).execute(file)).rejects.toBeInstanceOf(ScriptTimeoutError);
    expect(Date.now() - startedAt).toBeLessThan(4_000);
  });

  it("stops processes the script started when cancelled", async () => {
    const file = await script(
      "spawner.js",
      [
        'const { spawn } = require("child_process");',
        `spawn(${JSON.stringify(process.execPath)}, ["-e", "setTimeout(() => {}, 8000)"], { stdio: "inherit" });`,
        "setTimeout(() => {}, 60_000);",
      ].join("\n"),
    );
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 200);
    const startedAt = Date.now();

    await expect(executor().execute(file, { signal: controller.signal })).rejects.toBeInstanceOf(
      ScriptInterruptedError,
    );
    expect(Date.now() - startedAt).toBeLessThan(4_000);
  });

  it("cancels the process when the signal aborts", async () => {
    const file = await script("sleep.js", "setTimeout(() => {}, 60_000);");
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    await expect(executor().execute(file, { signal: controller.signal })).rejects.toBeInstanceOf(
      ScriptInterruptedError,
    );
  });

  it("reports an interpreter that cannot start", async () => {
    const file = await script("hello.js", "");

    await expect(
      executor(10_000, "relay-agent-missing-interpreter").execute(file),
    ).rejects.toBeInstanceOf(ScriptExecutionError);
  });
});
