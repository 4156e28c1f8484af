import { ConfigError } from "../core/errors";
import { RoundResolver } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DateRoundOptions {
  anchorRound: number;
  /** YYYY-MM-DD of the anchor draw, local to `utcOffsetMinutes`. */
  anchorDate: string;
  drawWeekday: number;
  publishHour: number;
  utcOffsetMinutes: number;
}

function parseAnchorDate(value: string): number {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    throw new ConfigError(`anchorDate must be YYYY-MM-DD, got "${value}"`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

/**
 * Weekly cadence arithmetic. Counting is done on the source's wall clock
 * from local midnight of the anchor draw day, so every draw day starts a new
 * week; before the publish hour on a draw day that week's round is not out yet.
 */
export function estimateRoundByDate(options: DateRoundOptions, now: Date): number {
  const anchorLocalMs = parseAnchorDate(options.anchorDate);
  const localMs = now.getTime() + options.utcOffsetMinutes * 60 * 1000;
  const elapsedDays = Math.floor((localMs - anchorLocalMs) / DAY_MS);
  let candidate = options.anchorRound + Math.floor(elapsedDays / 7);

  const local = new Date(localMs);
  if (local.getUTCDay() === options.drawWeekday && local.getUTCHours() < options.publishHour) {
    candidate -= 1;
  }

  return Math.max(1, candidate);
}

export class DateRoundResolver implements RoundResolver {
  readonly name = "date";
  private readonly options: DateRoundOptions;
  private readonly now: () => Date;

  constructor(options: DateRoundOptions, now: () => Date = () => new Date()) {
    this.options = options;
    this.now = now;
  }

  estimate(): number {
    return estimateRoundByDate(this.options, this.now());
  }

  async resolveLatest(): Promise<number> {
    return this.estimate();
  }
}
