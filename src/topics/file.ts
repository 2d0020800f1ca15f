/**
 * Store file access: read, atomic write, and the cross-process lock.
 *
 * Writes go to a temp file in the same directory which is flushed and then
 * renamed over the store, so a crash leaves either the old file or the new
 * one, never a truncated mix. Several short-lived processes may share the
 * file; read-modify-write cycles hold an advisory lock (`<store>.lock`)
 * managed by proper-lockfile.
 */

import {
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import lockfile from "proper-lockfile";
import { silentLogger, type Logger } from "../logging/index.js";
import { PersistenceError } from "./errors.js";

/** Delay between lock attempts */
const LOCK_RETRY_MS = 50;

/** A lock older than this is treated as abandoned by a crashed process */
const LOCK_STALE_MS = 10_000;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export interface StoreFileOptions {
  /** Milliseconds to keep retrying the lock before failing */
  lockTimeoutMs: number;
  logger?: Logger;
}

export class StoreFile {
  private readonly logger: Logger;

  constructor(
    public readonly path: string,
    private readonly options: StoreFileOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Parsed file contents, or undefined when the file does not exist yet.
   *
   * @throws PersistenceError if the file exists but cannot be read or parsed
   */
  read(): unknown {
    let raw: string;
    try {
      raw = readFileSync(this.path, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return undefined;
      }
      throw new PersistenceError(`Cannot read store ${this.path}: ${describe(err)}`, this.path, {
        cause: err,
      });
    }

    try {
      return JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(
        `Store ${this.path} is corrupt (invalid JSON): ${describe(err)}`,
        this.path,
        { cause: err }
      );
    }
  }

  /**
   * Replace the file with `data` serialized as JSON.
   *
   * @throws PersistenceError on any I/O failure; the previous file is intact
   */
  write(data: unknown): void {
    const dir = dirname(this.path);
    const tmp = join(dir, `.${basename(this.path)}.${process.pid}.${Date.now()}.tmp`);
    const payload = `${JSON.stringify(data, null, 2)}\n`;

    try {
      mkdirSync(dir, { recursive: true });
      const fd = openSync(tmp, "w", 0o600);
      try {
        writeSync(fd, payload);
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tmp, this.path);
    } catch (err) {
      this.removeTemp(tmp);
      throw new PersistenceError(`Cannot write store ${this.path}: ${describe(err)}`, this.path, {
        cause: err,
      });
    }

    this.logger.debug("Store written", { path: this.path, bytes: payload.length });
  }

  /**
   * Run `fn` while holding the exclusive store lock. The lock is released on
   * every exit path, including when `fn` throws.
   *
   * @throws PersistenceError if the lock is not acquired within lockTimeoutMs
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release(release);
    }
  }

  private async acquire(): Promise<() => Promise<void>> {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
    } catch (err) {
      throw new PersistenceError(
        `Cannot create store directory for ${this.path}: ${describe(err)}`,
        this.path,
        { cause: err }
      );
    }

    const retries = Math.ceil(this.options.lockTimeoutMs / LOCK_RETRY_MS);

    try {
      const release = await lockfile.lock(this.path, {
        realpath: false,
        stale: LOCK_STALE_MS,
        retries: {
          retries,
          factor: 1,
          minTimeout: LOCK_RETRY_MS,
          maxTimeout: LOCK_RETRY_MS,
        },
      });
      this.logger.debug("Store lock acquired", { path: this.path });
      return release;
    } catch (err) {
      const message =
        errorCode(err) === "ELOCKED"
          ? `Store ${this.path} is locked by another process (waited ${this.options.lockTimeoutMs}ms)`
          : `Cannot lock store ${this.path}: ${describe(err)}`;
      throw new PersistenceError(message, this.path, { cause: err });
    }
  }

  private async release(release: () => Promise<void>): Promise<void> {
    try {
      await release();
      this.logger.debug("Store lock released", { path: this.path });
    } catch (err) {
      // An unreleased lock expires after LOCK_STALE_MS
      this.logger.warn("Failed to release store lock", { path: this.path, error: describe(err) });
    }
  }

  private removeTemp(tmp: string): void {
    try {
      rmSync(tmp, { force: true });
    } catch (err) {
      this.logger.warn("Failed to remove temp file", { path: tmp, error: describe(err) });
    }
  }
}
