/**
 * @ledgerfold/delta-store — Filesystem abstraction.
 *
 * The engine never touches the disk directly. Callers supply a
 * LedgerFileSystem, which keeps decisions about locking and backups
 * outside the engine.
 *
 * Two implementations:
 * - NodeFileSystem: synchronous node:fs, atomic writes via temp file + rename
 * - InMemoryFileSystem: a Map-backed tree for tests and tooling
 *
 * Directory listings come back in whatever order the backing store
 * yields them. Nothing in the engine depends on that order.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { randomUUID } from "node:crypto";
import { basename, dirname, normalize } from "node:path";

// =============================================================================
// Interface
// =============================================================================

/**
 * One child of a directory.
 */
export interface DirectoryEntry {
  readonly name: string;
  readonly isDirectory: boolean;
}

/**
 * The filesystem operations the engine needs.
 *
 * All operations are synchronous. Errors propagate as thrown
 * exceptions with a Node-style `code` where one applies.
 */
export interface LedgerFileSystem {
  /** Whether a file or directory exists at the path */
  exists(path: string): boolean;

  /** List the immediate children of a directory */
  listDirectory(path: string): readonly DirectoryEntry[];

  /** Read a whole file as UTF-8 */
  readFile(path: string): string;

  /**
   * Write a whole file so readers see either the old content or the new,
   * never a torn write. The parent directory must exist.
   */
  writeFileAtomic(path: string, content: string): void;

  /** Create a directory and any missing parents (no-op if it exists) */
  makeDirectory(path: string): void;

  /** Delete a file */
  removeFile(path: string): void;
}

// =============================================================================
// Node implementation
// =============================================================================

/**
 * LedgerFileSystem over node:fs.
 */
export class NodeFileSystem implements LedgerFileSystem {
  exists(path: string): boolean {
    return existsSync(path);
  }

  listDirectory(path: string): readonly DirectoryEntry[] {
    return readdirSync(path, { withFileTypes: true }).map((dirent) => ({
      name: dirent.name,
      isDirectory: dirent.isDirectory(),
    }));
  }

  readFile(path: string): string {
    return readFileSync(path, "utf-8");
  }

  /**
   * Write to a sibling temp file, fsync, then rename over the target.
   */
  writeFileAtomic(path: string, content: string): void {
    const tempPath = `${path}.${randomUUID()}.tmp`;
    try {
      const fd = openSync(tempPath, "wx");
      try {
        writeSync(fd, content, null, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tempPath, path);
    } catch (err) {
      rmSync(tempPath, { force: true });
      throw err;
    }
  }

  makeDirectory(path: string): void {
    mkdirSync(path, { recursive: true });
  }

  removeFile(path: string): void {
    unlinkSync(path);
  }
}

// =============================================================================
// In-memory implementation
// =============================================================================

/**
 * Error shaped like the ones node:fs throws.
 */
function fsError(code: "ENOENT" | "ENOTDIR" | "EISDIR", path: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`${code}: ${path}`);
  err.code = code;
  err.path = path;
  return err;
}

/**
 * In-memory LedgerFileSystem.
 *
 * Listings preserve creation order, which lets tests control the order
 * in which segments are discovered.
 */
export class InMemoryFileSystem implements LedgerFileSystem {
  private readonly _files = new Map<string, string>();
  private readonly _dirs = new Set<string>(["/"]);

  exists(path: string): boolean {
    const p = normalizePath(path);
    return this._files.has(p) || this._dirs.has(p);
  }

  listDirectory(path: string): readonly DirectoryEntry[] {
    const p = normalizePath(path);
    if (!this._dirs.has(p)) {
      throw fsError(this._files.has(p) ? "ENOTDIR" : "ENOENT", p);
    }

    const entries: DirectoryEntry[] = [];
    for (const dir of this._dirs) {
      if (dir !== p && dirname(dir) === p) {
        entries.push({ name: basename(dir), isDirectory: true });
      }
    }
    for (const file of this._files.keys()) {
      if (dirname(file) === p) {
        entries.push({ name: basename(file), isDirectory: false });
      }
    }
    return entries;
  }

  readFile(path: string): string {
    const p = normalizePath(path);
    const content = this._files.get(p);
    if (content === undefined) {
      throw fsError(this._dirs.has(p) ? "EISDIR" : "ENOENT", p);
    }
    return content;
  }

  writeFileAtomic(path: string, content: string): void {
    const p = normalizePath(path);
    if (!this._dirs.has(dirname(p))) {
      throw fsError("ENOENT", p);
    }
    if (this._dirs.has(p)) {
      throw fsError("EISDIR", p);
    }
    this._files.set(p, content);
  }

  makeDirectory(path: string): void {
    let p = normalizePath(path);
    const missing: string[] = [];
    while (!this._dirs.has(p)) {
      if (this._files.has(p)) {
        throw fsError("ENOTDIR", p);
      }
      missing.push(p);
      const parent = dirname(p);
      if (parent === p) {
        break;
      }
      p = parent;
    }
    for (const dir of missing.reverse()) {
      this._dirs.add(dir);
    }
  }

  removeFile(path: string): void {
    const p = normalizePath(path);
    if (!this._files.delete(p)) {
      throw fsError("ENOENT", p);
    }
  }

  /** Every file path currently stored. Useful for assertions. */
  listFiles(): readonly string[] {
    return [...this._files.keys()];
  }
}

function normalizePath(path: string): string {
  const p = normalize(path);
  return p.length > 1 && p.endsWith("/") ? p.slice(0, -1) : p;
}
