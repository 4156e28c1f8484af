import fs from "node:fs";
import path from "node:path";
import { Snapshot } from "../aggregate";
import { BaseSink } from "./baseSink";

/** Writes the snapshot as one pretty-printed JSON document, replacing any earlier file. */
export class LocalJsonSink extends BaseSink {
  readonly name = "local_json";
  private readonly filePath: string;

  constructor(filePath: string) {
    super();
    this.filePath = path.resolve(filePath);
  }

  get outputPath(): string {
    return this.filePath;
  }

  async publishSnapshot(snapshot: Snapshot): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.promises.writeFile(tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf-8");
    await fs.promises.rename(tempPath, this.filePath);
  }
}
