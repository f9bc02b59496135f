// Per-step snapshots returned beside a result. Informational only; nothing downstream reads them.
export type Trace = readonly string[];

export function stepLabel(step: number): string {
  return `step=${String(step).padStart(2, '0')}`;
}
