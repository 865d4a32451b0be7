import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { getErrorCode } from "../errors.js";

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, text, "utf8");
}

/** Returns `undefined` when the file does not exist. */
export async function readOptionalTextFile(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error: unknown) {
    if (getErrorCode(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}
