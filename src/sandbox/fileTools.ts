import path from "node:path";

import { z } from "zod";

import { tool } from "../llm/llm.js";
import type { LlmToolSet } from "../llm/types.js";

import type { SandboxFilesystem } from "./filesystem.js";

const posix = path.posix;

const DEFAULT_READ_FILE_LINE_LIMIT = 2_000;

export type SandboxFileToolsOptions = {
  readonly filesystem: SandboxFilesystem;
  /** Working directory; every tool path must resolve inside it. */
  readonly cwd: string;
  /** Absolute paths the agent may read but not modify. */
  readonly readOnlyPaths?: readonly string[];
};

const readFileInputSchema = z.object({
  file_path: z.string().min(1),
  offset: z.number().int().min(0).optional(),
  limit: z.number().int().min(1).optional(),
});

const writeFileInputSchema = z.object({
  file_path: z.string().min(1),
  content: z.string(),
});

const replaceInputSchema = z.object({
  file_path: z.string().min(1),
  old_string: z.string(),
  new_string: z.string(),
  expected_replacements: z.number().int().min(1).optional(),
});

const listDirectoryInputSchema = z.object({
  dir_path: z.string().min(1),
});

export function resolveSandboxPath(inputPath: string, cwd: string): string {
  const absolutePath = posix.isAbsolute(inputPath)
    ? posix.resolve(inputPath)
    : posix.resolve(cwd, inputPath);
  const relative = posix.relative(cwd, absolutePath);
  if (relative.startsWith("..") || posix.isAbsolute(relative)) {
    throw new Error(`path "${inputPath}" resolves outside cwd "${cwd}"`);
  }
  return absolutePath;
}

function toDisplayPath(absolutePath: string, cwd: string): string {
  const relative = posix.relative(cwd, absolutePath);
  return relative === "" ? "." : relative;
}

function countOccurrences(text: string, search: string): number {
  if (search.length === 0) {
    return 0;
  }
  return text.split(search).length - 1;
}

function isNoEntError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function createSandboxFileTools(options: SandboxFileToolsOptions): LlmToolSet {
  const { filesystem, cwd } = options;
  const readOnly = new Set((options.readOnlyPaths ?? []).map((entry) => posix.resolve(entry)));

  const resolveWritable = (inputPath: string): string => {
    const filePath = resolveSandboxPath(inputPath, cwd);
    if (readOnly.has(filePath)) {
      throw new Error(`${toDisplayPath(filePath, cwd)} is read-only.`);
    }
    return filePath;
  };

  return {
    read_file: tool({
      description:
        "Reads a text file. Use offset (0-based line) and limit to page through large files.",
      inputSchema: readFileInputSchema,
      execute: async (input) => {
        const filePath = resolveSandboxPath(input.file_path, cwd);
        const content = await filesystem.readTextFile(filePath);
        if (input.offset === undefined && input.limit === undefined) {
          return content;
        }
        const lines = content.replace(/\r\n?/gu, "\n").split("\n");
        const offset = input.offset ?? 0;
        const limit = input.limit ?? DEFAULT_READ_FILE_LINE_LIMIT;
        return lines.slice(offset, offset + limit).join("\n");
      },
    }),
    write_file: tool({
      description: "Writes a text file, creating parent directories and replacing existing content.",
      inputSchema: writeFileInputSchema,
      execute: async (input) => {
        const filePath = resolveWritable(input.file_path);
        await filesystem.ensureDir(posix.dirname(filePath));
        await filesystem.writeTextFile(filePath, input.content);
        return `Successfully wrote file: ${toDisplayPath(filePath, cwd)}`;
      },
    }),
    replace: tool({
      description:
        "Replaces exact text in a file. old_string must occur expected_replacements times (default 1).",
      inputSchema: replaceInputSchema,
      execute: async (input) => {
        const filePath = resolveWritable(input.file_path);
        let original: string;
        try {
          original = await filesystem.readTextFile(filePath);
        } catch (error: unknown) {
          if (isNoEntError(error) && input.old_string.length === 0) {
            await filesystem.ensureDir(posix.dirname(filePath));
            await filesystem.writeTextFile(filePath, input.new_string);
            return `Successfully wrote new file: ${toDisplayPath(filePath, cwd)}`;
          }
          throw error;
        }
        if (input.old_string === input.new_string) {
          throw new Error("No changes to apply. old_string and new_string are identical.");
        }
        const expected = input.expected_replacements ?? 1;
        const occurrences = countOccurrences(original, input.old_string);
        if (occurrences === 0) {
          throw new Error("Failed to edit, could not find old_string in file.");
        }
        if (occurrences !== expected) {
          throw new Error(
            `Failed to edit, expected ${expected} occurrence(s) but found ${occurrences}.`,
          );
        }
        await filesystem.writeTextFile(filePath, original.split(input.old_string).join(input.new_string));
        return `Successfully replaced ${occurrences} occurrence(s) in ${toDisplayPath(filePath, cwd)}.`;
      },
    }),
    list_directory: tool({
      description: "Lists the entries of a directory.",
      inputSchema: listDirectoryInputSchema,
      execute: async (input) => {
        const dirPath = resolveSandboxPath(input.dir_path, cwd);
        if ((await filesystem.exists(dirPath)) !== "directory") {
          throw new Error(`Path is not a directory: ${toDisplayPath(dirPath, cwd)}`);
        }
        const entries = await filesystem.readDir(dirPath);
        if (entries.length === 0) {
          return `Directory ${toDisplayPath(dirPath, cwd)} is empty.`;
        }
        return entries
          .map((entry) => (entry.kind === "directory" ? `[DIR] ${entry.name}` : entry.name))
          .join("\n");
      },
    }),
  };
}
