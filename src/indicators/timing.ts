/**
 * Time-of-day weighting for the timed scores. Readings taken near the
 * scheduled run times (08:00 and 20:00 UTC) keep their full value; the
 * weight falls linearly to `floor` six hours away.
 */

const MINUTES_PER_DAY = 24 * 60;
const ANCHOR_MINUTES = [8 * 60, 20 * 60];
const FALLOFF_MINUTES = 6 * 60;

export function minutesFromAnchor(epochMs: number): number {
  const date = new Date(epochMs);
  const minutes = date.getUTCHours() * 60 + date.getUTCMinutes();
  return Math.min(
    ...ANCHOR_MINUTES.map((anchor) => {
      const distance = Math.abs(minutes - anchor);
      return Math.min(distance, MINUTES_PER_DAY - distance);
    })
  );
}

export function timeOfDayWeight(epochMs: number, floor: number): number {
  const distance = minutesFromAnchor(epochMs);
  return Math.max(floor, 1 - (distance / FALLOFF_MINUTES) * (1 - floor));
}

/** Weighted mean over the components that produced a value. */
export function weightedComponents(
  components: ReadonlyArray<{ value: number | null; weight: number }>
): number | null {
  let weighted = 0;
  let total = 0;
  for (const { value, weight } of components) {
    if (value === null) continue;
    weighted += value * weight;
    total += weight;
  }
  return total > 0 ? weighted / total : null;
}
