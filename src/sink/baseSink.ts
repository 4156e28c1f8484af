import { Snapshot } from "../aggregate";
import { ConfigError } from "../core/errors";
import { Sink } from "./types";

export abstract class BaseSink implements Sink {
  abstract readonly name: string;
  abstract publishSnapshot(snapshot: Snapshot): Promise<void>;

  protected ensureConfigured<T>(setting: string, value: T | undefined): T {
    if (value === undefined || value === "") {
      throw new ConfigError(`${this.name} sink is not configured: missing ${setting}`);
    }
    return value;
  }
}
