/**
 * Scoped temporary script file.
 *
 * `withTempScript` writes the source to a fresh, uniquely named file, hands its path to
 * `use`, and removes it on every exit path.
 */

import fs from "fs-extra";
import path from "path";
import { nanoid } from "nanoid";

export interface TempScriptOptions {
  dir: string;
  extension: string;
}

export async function withTempScript<T>(
  source: string,
  options: TempScriptOptions,
  use: (scriptPath: string) => Promise<T>,
): Promise<T> {
  await fs.ensureDir(options.dir);
  const scriptPath = path.join(options.dir, `relay-script-${nanoid(12)}${options.extension}`);
  // "wx": fail rather than reuse an existing file.
  await fs.writeFile(scriptPath, source, { encoding: "utf8", flag: "wx" });

  try {
    return await use(scriptPath);
  } finally {
    await fs.remove(scriptPath);
  }
}
