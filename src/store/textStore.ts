import * as fs from "node:fs/promises";
import { safeWriteText } from "../fs/atomic";
import { StoreIoError, errnoCode } from "../errors";

/**
 * A single persisted text value. Implementations report every failure as a
 * StoreIoError so callers can treat file and in-memory stores alike.
 */
export interface TextStore {
  /** Path or label used in diagnostics. */
  readonly location: string;
  exists(): Promise<boolean>;
  /** Create the store with `initial` content. A store that already exists is left alone. */
  create(initial: string): Promise<void>;
  read(): Promise<string>;
  /** Replace the whole content. */
  write(content: string): Promise<void>;
}

export class FileTextStore implements TextStore {
  constructor(public readonly location: string) {}

  async exists(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.location);
      return stat.isFile();
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return false;
      }
      throw new StoreIoError(this.location, "read", err);
    }
  }

  async create(initial: string): Promise<void> {
    try {
      // "wx" fails with EEXIST instead of truncating an existing store
      await fs.writeFile(this.location, initial, { encoding: "utf-8", flag: "wx" });
    } catch (err) {
      if (errnoCode(err) !== "EEXIST") {
        throw new StoreIoError(this.location, "create", err);
      }
    }

    if (!(await this.exists())) {
      throw new StoreIoError(
        this.location,
        "create",
        new Error("file is still missing after creation"),
      );
    }
  }

  async read(): Promise<string> {
    try {
      return await fs.readFile(this.location, "utf-8");
    } catch (err) {
      throw new StoreIoError(this.location, "read", err);
    }
  }

  async write(content: string): Promise<void> {
    try {
      await safeWriteText(this.location, content);
    } catch (err) {
      throw new StoreIoError(this.location, "write", err);
    }
  }
}

/**
 * Store held in process memory. `content` is `undefined` while the store
 * does not exist.
 */
export class MemoryTextStore implements TextStore {
  private writes = 0;

  constructor(
    public readonly location: string,
    public content?: string,
  ) {}

  /** Number of create/write calls that changed the content. */
  get writeCount(): number {
    return this.writes;
  }

  async exists(): Promise<boolean> {
    return this.content !== undefined;
  }

  async create(initial: string): Promise<void> {
    if (this.content === undefined) {
      this.content = initial;
      this.writes++;
    }
  }

  async read(): Promise<string> {
    if (this.content === undefined) {
      throw new StoreIoError(this.location, "read", new Error("store does not exist"));
    }
    return this.content;
  }

  async write(content: string): Promise<void> {
    this.content = content;
    this.writes++;
  }
}
