import { FileVerdict, SourceUnit } from "../../../types.js";
import { ContentCache } from "../../cache/content-cache.js";
import { OutputWriter } from "../../output-writer.js";

export class MemoryContentCache implements ContentCache {
  readonly kind = "memory";
  readonly entries = new Map<string, FileVerdict>();
  gets = 0;
  puts = 0;

  async get(hash: string): Promise<FileVerdict | null> {
    this.gets += 1;
    return this.entries.get(hash) ?? null;
  }

  async put(hash: string, verdict: FileVerdict): Promise<void> {
    this.puts += 1;
    this.entries.set(hash, verdict);
  }
}

export class MemoryOutputWriter implements OutputWriter {
  readonly written = new Map<string, string>();

  async write(unit: SourceUnit, finalText: string): Promise<string> {
    this.written.set(unit.id, finalText);
    return `out/${unit.id}`;
  }
}
