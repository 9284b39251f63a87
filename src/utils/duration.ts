const UNIT_TO_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) {
    return "unknown";
  }

  const units: Array<[string, number]> = [
    ["h", UNIT_TO_MS.h],
    ["m", UNIT_TO_MS.m],
    ["s", UNIT_TO_MS.s],
  ];

  for (const [unit, value] of units) {
    if (ms >= value) {
      return `${Math.round((ms / value) * 10) / 10}${unit}`;
    }
  }

  return `${Math.round(ms)}ms`;
}
