import path from "node:path";

export type SandboxPathKind = "file" | "directory";

export type SandboxDirectoryEntry = {
  readonly name: string;
  readonly path: string;
  readonly kind: SandboxPathKind;
};

export interface SandboxFilesystem {
  readTextFile(filePath: string): Promise<string>;
  writeTextFile(filePath: string, content: string): Promise<void>;
  deleteFile(filePath: string): Promise<void>;
  ensureDir(directoryPath: string): Promise<void>;
  readDir(directoryPath: string): Promise<readonly SandboxDirectoryEntry[]>;
  exists(entryPath: string): Promise<SandboxPathKind | null>;
}

const posix = path.posix;

function resolveAbsolute(entryPath: string): string {
  return posix.resolve("/", entryPath);
}

export function createNoSuchFileError(syscall: string, filePath: string): Error & { code: string } {
  return Object.assign(new Error(`ENOENT: no such file or directory, ${syscall} '${filePath}'`), {
    code: "ENOENT",
  });
}

/**
 * Isolated virtual filesystem for a single agent episode. Paths are POSIX and rooted at `/`;
 * nothing touches the host disk.
 */
export class InMemorySandboxFilesystem implements SandboxFilesystem {
  readonly #files = new Map<string, string>();
  readonly #dirs = new Set<string>(["/"]);
  #disposed = false;

  constructor(initialFiles: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initialFiles)) {
      const absolutePath = resolveAbsolute(filePath);
      this.#ensureDirSync(posix.dirname(absolutePath));
      this.#files.set(absolutePath, content);
    }
  }

  async readTextFile(filePath: string): Promise<string> {
    this.#assertOpen();
    const absolutePath = resolveAbsolute(filePath);
    const content = this.#files.get(absolutePath);
    if (content === undefined) {
      throw createNoSuchFileError("open", absolutePath);
    }
    return content;
  }

  async writeTextFile(filePath: string, content: string): Promise<void> {
    this.#assertOpen();
    const absolutePath = resolveAbsolute(filePath);
    const parentPath = posix.dirname(absolutePath);
    if (!this.#dirs.has(parentPath)) {
      throw createNoSuchFileError("open", parentPath);
    }
    if (this.#dirs.has(absolutePath)) {
      throw new Error(`EISDIR: illegal operation on a directory, open '${absolutePath}'`);
    }
    this.#files.set(absolutePath, content);
  }

  async deleteFile(filePath: string): Promise<void> {
    this.#assertOpen();
    const absolutePath = resolveAbsolute(filePath);
    if (!this.#files.delete(absolutePath)) {
      throw createNoSuchFileError("unlink", absolutePath);
    }
  }

  async ensureDir(directoryPath: string): Promise<void> {
    this.#assertOpen();
    this.#ensureDirSync(resolveAbsolute(directoryPath));
  }

  async readDir(directoryPath: string): Promise<readonly SandboxDirectoryEntry[]> {
    this.#assertOpen();
    const absolutePath = resolveAbsolute(directoryPath);
    if (!this.#dirs.has(absolutePath)) {
      throw createNoSuchFileError("scandir", absolutePath);
    }
    const entries: SandboxDirectoryEntry[] = [];
    for (const dirPath of this.#dirs) {
      if (dirPath !== absolutePath && posix.dirname(dirPath) === absolutePath) {
        entries.push({ name: posix.basename(dirPath), path: dirPath, kind: "directory" });
      }
    }
    for (const filePath of this.#files.keys()) {
      if (posix.dirname(filePath) === absolutePath) {
        entries.push({ name: posix.basename(filePath), path: filePath, kind: "file" });
      }
    }
    entries.sort((left, right) => left.name.localeCompare(right.name));
    return entries;
  }

  async exists(entryPath: string): Promise<SandboxPathKind | null> {
    this.#assertOpen();
    const absolutePath = resolveAbsolute(entryPath);
    if (this.#files.has(absolutePath)) {
      return "file";
    }
    return this.#dirs.has(absolutePath) ? "directory" : null;
  }

  snapshot(): Record<string, string> {
    const entries = [...this.#files.entries()].sort(([left], [right]) => left.localeCompare(right));
    return Object.fromEntries(entries);
  }

  /** Drops all content; any later access throws. */
  dispose(): void {
    this.#files.clear();
    this.#dirs.clear();
    this.#disposed = true;
  }

  #assertOpen(): void {
    if (this.#disposed) {
      throw new Error("Sandbox filesystem has been disposed.");
    }
  }

  #ensureDirSync(absolutePath: string): void {
    let cursor = absolutePath;
    while (!this.#dirs.has(cursor)) {
      if (this.#files.has(cursor)) {
        throw new Error(`ENOTDIR: not a directory, mkdir '${cursor}'`);
      }
      this.#dirs.add(cursor);
      const parent = posix.dirname(cursor);
      if (parent === cursor) {
        break;
      }
      cursor = parent;
    }
  }
}
