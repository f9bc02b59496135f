export type ArithErrorCode = 'WidthMismatch' | 'InvalidOperationTag';

export class ArithException extends Error {
  constructor(public readonly code: ArithErrorCode, detail: string) {
    super(`${code}: ${detail}`);
    this.name = 'ArithException';
  }
}

export function widthMismatch(label: string, expected: number, actual: number): ArithException {
  return new ArithException('WidthMismatch', `${label} must be ${expected} bits, got ${actual}`);
}

export function invalidOperationTag(unit: string, tag: unknown): ArithException {
  return new ArithException('InvalidOperationTag', `${unit} has no operation ${String(tag)}`);
}

// Resolves a free-form tag name against a unit's closed set of operations.
export function parseTag<T extends string>(unit: string, ops: readonly T[], name: string): T {
  const op = ops.find((o) => o === name);
  if (op === undefined) throw invalidOperationTag(unit, name);
  return op;
}
