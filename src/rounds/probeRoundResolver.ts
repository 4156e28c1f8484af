import { RoundProbeError, RoundResolutionError } from "../core/errors";
import { Logger } from "../observability";
import { RoundProbe, RoundResolver } from "./types";

export interface ProbeRoundOptions {
  probe: RoundProbe;
  hint: number;
  /** Sanity ceiling for the exponential expansion. */
  ceiling: number;
  logger: Logger;
}

/**
 * "Round N exists" is monotone in N, so the newest round is the boundary
 * between a run of `exists` and a run of `absent`. Expand from the hint by
 * doubling, then bisect.
 */
export class ProbeRoundResolver implements RoundResolver {
  readonly name = "probe";
  private readonly options: ProbeRoundOptions;
  private readonly known = new Map<number, boolean>();
  private probes = 0;

  constructor(options: ProbeRoundOptions) {
    this.options = options;
  }

  get probeCount(): number {
    return this.probes;
  }

  async resolveLatest(): Promise<number> {
    const ceiling = Math.max(1, Math.floor(this.options.ceiling));
    const hint = Math.min(Math.max(1, Math.floor(this.options.hint)), ceiling);

    if (!(await this.exists(hint))) {
      // lower bound 0 stands for "before the first round", which trivially exists
      const latest = await this.bisect(0, hint);
      if (latest < 1) {
        throw new RoundResolutionError(`no published round found at or below ${hint}`);
      }
      return latest;
    }

    let lo = hint;
    let hi = hint * 2;
    while (hi <= ceiling && (await this.exists(hi))) {
      lo = hi;
      hi *= 2;
    }

    if (hi > ceiling) {
      if (await this.exists(ceiling)) {
        this.options.logger.warn("round_probe_ceiling_reached", { ceiling, probes: this.probes });
        return ceiling;
      }
      hi = ceiling;
    }

    return this.bisect(lo, hi);
  }

  /** `lo` is known to exist and `hi` known to be absent. */
  private async bisect(lo: number, hi: number): Promise<number> {
    let left = lo;
    let right = hi;
    while (left + 1 < right) {
      const mid = Math.floor((left + right) / 2);
      if (await this.exists(mid)) {
        left = mid;
      } else {
        right = mid;
      }
    }
    return left;
  }

  private async exists(round: number): Promise<boolean> {
    const cached = this.known.get(round);
    if (cached !== undefined) {
      return cached;
    }

    this.probes += 1;
    const outcome = await this.options.probe.probe(round);
    if (outcome === "unknown") {
      throw new RoundProbeError(round, "existence oracle gave no usable answer");
    }

    const exists = outcome === "exists";
    this.known.set(round, exists);
    this.options.logger.debug("round_probe", { round, exists });
    return exists;
  }
}
