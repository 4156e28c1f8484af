/** Answer of one existence check. `unknown` means the oracle itself failed. */
export type ProbeOutcome = "exists" | "absent" | "unknown";

export interface RoundProbe {
  probe(round: number): Promise<ProbeOutcome>;
}

export interface RoundResolver {
  readonly name: string;
  resolveLatest(): Promise<number>;
}

/** `date` marks a calendar estimate the probe never confirmed. */
export type RoundSource = "probe" | "date";

export interface RoundResolution {
  round: number;
  source: RoundSource;
  hint?: number;
  hintSource?: "previous_run" | "result_page" | "date_estimate";
  dateEstimate: number;
  deviation?: number;
}
