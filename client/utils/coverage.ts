export type FieldCoverage = {
  field: string;
  present: number;
  pct: number;
};

export type CoverageReport = {
  records: number;
  fields: FieldCoverage[];
};

const isPresent = (v: unknown) => v !== null && v !== undefined && !(Array.isArray(v) && v.length === 0);

/**
 * Share of records carrying a value for each top-level field, in first-seen key order.
 * Null and empty lists count as missing, so list-projection gaps show up.
 */
export function fieldCoverage(rows: readonly unknown[]): CoverageReport {
  const counts = new Map<string, number>();
  let records = 0;

  for (const row of rows) {
    if (typeof row !== "object" || row === null || Array.isArray(row)) continue;
    records++;
    for (const [key, value] of Object.entries(row)) {
      counts.set(key, (counts.get(key) ?? 0) + (isPresent(value) ? 1 : 0));
    }
  }

  const fields = [...counts].map(([field, present]) => ({
    field,
    present,
    pct: records ? Number(((present / records) * 100).toFixed(1)) : 0,
  }));
  return { records, fields };
}
