#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { readFileSync } from "fs";
import { join, dirname, basename } from "path";
import { fileURLToPath } from "url";
import { runCommand } from "./commands/run.js";
import type { RunOptions } from "./commands/types/run.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Works from both src/ (tsx) and dist/.
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

const parseLogLevel = (value: string): NonNullable<RunOptions["logLevel"]> => {
  const s = value.trim().toLowerCase();
  if (s === "debug" || s === "info" || s === "warn" || s === "error") return s;
  throw new InvalidArgumentError(`Invalid log level: ${value}`);
};

const program = new Command();

program
  .name(basename(process.argv[1] || "relay-agent"))
  .description("Chat with an OpenAI-compatible model and run local or raw-URL scripts from the same prompt")
  .version(version, "-v, --version")
  .argument("[path]", "directory whose .env is loaded", ".")
  .option("--log-level <level>", "debug | info | warn | error (overrides AGENT_LOG_LEVEL)", parseLogLevel)
  .action(async (path: string, options: RunOptions) => {
    await runCommand(path, options);
  });

await program.parseAsync();
