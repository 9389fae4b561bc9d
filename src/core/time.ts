const hasZone = (value: string): boolean => /(Z|[+-]\d{2}:?\d{2})$/i.test(value);

export const parseAsOfDateTime = (asOf?: string): { asOf: string; cycleId: string } => {
  let parsed: Date;
  if (!asOf) {
    parsed = new Date();
  } else if (asOf.includes('T')) {
    parsed = new Date(hasZone(asOf) ? asOf : `${asOf}Z`);
  } else {
    parsed = new Date(`${asOf}T23:59:00Z`);
  }
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid asOf datetime: ${asOf}`);
  }
  // Minute resolution; cycleId swaps colons for dashes so it is safe as a directory name.
  const isoMinute = parsed.toISOString().slice(0, 16);
  const cycleId = isoMinute.replace(/:/g, '-');
  return { asOf: `${isoMinute}:00.000Z`, cycleId };
};

// Date-only strings already parse as UTC; date-times without a zone are read as UTC too.
export const toMillis = (iso: string): number =>
  new Date(iso.includes('T') && !hasZone(iso) ? `${iso}Z` : iso).getTime();

export const addMinutes = (iso: string, minutes: number): string =>
  new Date(toMillis(iso) + minutes * 60 * 1000).toISOString();

export const minutesBetween = (fromISO: string, toISO: string): number => {
  const from = toMillis(fromISO);
  const to = toMillis(toISO);
  if (Number.isNaN(from) || Number.isNaN(to)) return 0;
  return (to - from) / (60 * 1000);
};
