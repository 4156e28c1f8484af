import { Snapshot } from "../aggregate";

export interface Sink {
  readonly name: string;
  publishSnapshot(snapshot: Snapshot): Promise<void>;
}
