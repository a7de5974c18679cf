import path from "node:path";
import { safeResolvePath, writeTextFileAtomic } from "../lib/fs-utils.js";
import { SourceUnit } from "../types.js";

export interface OutputWriter {
  write(unit: SourceUnit, finalText: string): Promise<string>;
}

/** Mirrors each unit's relative path under the output directory. */
export class FileOutputWriter implements OutputWriter {
  readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = path.resolve(outputDir);
  }

  targetPath(unit: Pick<SourceUnit, "id">): string {
    return safeResolvePath(this.outputDir, unit.id);
  }

  async write(unit: SourceUnit, finalText: string): Promise<string> {
    const target = this.targetPath(unit);
    await writeTextFileAtomic(target, finalText);
    return target;
  }
}
