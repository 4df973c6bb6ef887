export const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

/** Ordered: critical > high > medium > low */
export type Severity = (typeof SEVERITIES)[number];

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function compareSeverity(a: Severity, b: Severity): number {
  return severityRank(a) - severityRank(b);
}

/** Highest severity in the list, or undefined for an empty list. */
export function maxSeverity(severities: Iterable<Severity>): Severity | undefined {
  let highest: Severity | undefined;
  for (const severity of severities) {
    if (highest === undefined || compareSeverity(severity, highest) > 0) {
      highest = severity;
    }
  }
  return highest;
}
