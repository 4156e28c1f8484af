/** `harvest_<compact UTC timestamp>_<6 random base36 chars>` */
export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  return `harvest_${stamp}_${suffix}`;
}
