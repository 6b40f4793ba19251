import { promises as fs } from "node:fs";
import path from "node:path";

/**
 * One JSON file holding `{ [key]: T[] }`. Every read-modify-write goes
 * through `withLock`, which runs callers strictly one after another, so a
 * mutation always sees the result of the previous one.
 */
export class JsonCollection<T> {
  private readonly file: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly dir: string,
    private readonly key: string
  ) {
    this.file = path.join(dir, `${key}.json`);
  }

  private async ensure(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    try {
      await fs.access(this.file);
    } catch {
      await fs.writeFile(this.file, JSON.stringify({ [this.key]: [] }, null, 2), "utf8");
    }
  }

  async readAll(): Promise<T[]> {
    await this.ensure();
    const raw = await fs.readFile(this.file, "utf8");
    const parsed = JSON.parse(raw) as Record<string, T[] | undefined>;
    return parsed[this.key] ?? [];
  }

  private async writeAll(rows: T[]): Promise<void> {
    const tmp = `${this.file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify({ [this.key]: rows }, null, 2), "utf8");
    await fs.rename(tmp, this.file);
  }

  withLock<R>(fn: () => Promise<R>): Promise<R> {
    const run = this.queue.then(fn, fn);
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Reads the rows, lets `fn` change them in place, and writes them back. */
  mutate<R>(fn: (rows: T[]) => R | Promise<R>): Promise<R> {
    return this.withLock(async () => {
      const rows = await this.readAll();
      const result = await fn(rows);
      await this.writeAll(rows);
      return result;
    });
  }
}

/** Append-only JSON lines log. */
export class JsonLinesLog<T> {
  private readonly file: string;

  constructor(
    private readonly dir: string,
    name: string
  ) {
    this.file = path.join(dir, `${name}.jsonl`);
  }

  async append(row: T): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.appendFile(this.file, `${JSON.stringify(row)}\n`, "utf8");
  }

  async readAll(): Promise<T[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    return raw
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => JSON.parse(line) as T);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
