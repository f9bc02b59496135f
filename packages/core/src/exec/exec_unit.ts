import { BitVector, requireWidth } from '../bits/bitvec.js';
import { ALU_OPS, alu, resultFlags } from '../alu/alu.js';
import type { AluOp, IntFlags } from '../alu/alu.js';
import { SHIFT_OPS, shift } from '../alu/shifter.js';
import type { ShiftOp } from '../alu/shifter.js';
import { MUL_OPS, mduMul } from '../mdu/mul.js';
import type { MulOp } from '../mdu/mul.js';
import { DIV_OPS, mduDiv } from '../mdu/div.js';
import type { DivOp } from '../mdu/div.js';
import { faddF32, fmulF32, fsubF32 } from '../fpu/f32_arith.js';
import type { FpResult } from '../fpu/f32_arith.js';
import type { FpFlags } from '../fpu/f32.js';
import { fcsrAccumulate, newFcsr, roundingModeName } from '../fpu/fcsr.js';
import type { Fcsr } from '../fpu/fcsr.js';
import { invalidOperationTag, parseTag } from '../exceptions.js';
import type { Trace } from '../types.js';

export const INT_OPS = [...ALU_OPS, ...SHIFT_OPS, ...MUL_OPS, ...DIV_OPS] as const;
export type IntOp = AluOp | ShiftOp | MulOp | DivOp;

export const FP_OPS = ['FADD', 'FSUB', 'FMUL'] as const;
export type FpOp = typeof FP_OPS[number];

export type ExecUnitName = 'alu' | 'shifter' | 'mdu' | 'fpu';

export type ExecUnitOptions = {
  // Drop traces from returned results; onTrace still sees them.
  keepTraces?: boolean;
  warnOnInertRounding?: boolean;
};

export type TraceEvent = { unit: ExecUnitName; op: IntOp | FpOp; trace: Trace };
export type ExecWarning = { kind: string; message: string; details?: Record<string, string> };

export type IntExecResult = { result: BitVector; flags: IntFlags; trace: Trace };
export type FpExecResult = { result: BitVector; flags: FpFlags; trace: Trace };

export function parseIntOp(name: string): IntOp {
  return parseTag('exec', INT_OPS, name);
}

export function parseFpOp(name: string): FpOp {
  return parseTag('fpu', FP_OPS, name);
}

function isOneOf<T extends string>(ops: readonly T[], op: string): op is T {
  return ops.some((o) => o === op);
}

/**
 * Execute stage of one core: dispatches decoded operation tags to the arithmetic units
 * and folds floating-point flags into the core's FCSR.
 */
export class ExecUnit {
  readonly fcsr: Fcsr;

  // Called after every executed operation with that operation's step trace
  onTrace?: (event: TraceEvent) => void;
  // One-shot per unique warning kind
  onWarn?: (warning: ExecWarning) => void;

  private readonly keepTraces: boolean;
  private readonly warnOnInertRounding: boolean;
  private warnedKinds = new Set<string>();

  constructor(fcsr?: Fcsr, opts?: ExecUnitOptions) {
    this.fcsr = fcsr ?? newFcsr();
    this.keepTraces = opts?.keepTraces ?? true;
    this.warnOnInertRounding = opts?.warnOnInertRounding ?? true;
  }

  // Shift ops take their amount from the low five bits of b.
  executeInt(op: IntOp, a: BitVector, b: BitVector): IntExecResult {
    if (isOneOf(ALU_OPS, op)) {
      const r = alu(a, b, op);
      return this.emit('alu', op, { result: r.result, flags: r.flags, trace: [] });
    }
    if (isOneOf(SHIFT_OPS, op)) {
      const result = shift(a, requireWidth(b, 32, 'shift amount'), op);
      return this.emit('shifter', op, { result, flags: resultFlags(result), trace: [] });
    }
    if (isOneOf(MUL_OPS, op)) {
      const r = mduMul(op, a, b);
      return this.emit('mdu', op, { result: r.rdBits, flags: resultFlags(r.rdBits), trace: r.trace });
    }
    if (isOneOf(DIV_OPS, op)) {
      const r = mduDiv(op, a, b);
      const flags: IntFlags = { ...resultFlags(r.rdBits), V: r.overflow ? 1 : 0 };
      return this.emit('mdu', op, { result: r.rdBits, flags, trace: r.trace });
    }
    throw invalidOperationTag('exec', op);
  }

  executeFloat(op: FpOp, a: BitVector, b: BitVector): FpExecResult {
    let r: FpResult;
    switch (op) {
      case 'FADD': r = faddF32(a, b); break;
      case 'FSUB': r = fsubF32(a, b); break;
      case 'FMUL': r = fmulF32(a, b); break;
      default:
        throw invalidOperationTag('fpu', op);
    }
    this.checkRoundingMode();
    fcsrAccumulate(this.fcsr, r.flags);
    return this.emit('fpu', op, { result: r.resBits, flags: r.flags, trace: r.trace });
  }

  private emit<R extends { trace: Trace }>(unit: ExecUnitName, op: IntOp | FpOp, res: R): R {
    if (this.onTrace) this.onTrace({ unit, op, trace: res.trace });
    return this.keepTraces ? res : { ...res, trace: [] };
  }

  // Only round-to-nearest-even is implemented; other encodings stay stored but inert.
  private checkRoundingMode(): void {
    if (!this.warnOnInertRounding) return;
    const mode = roundingModeName(this.fcsr.frm);
    if (mode === 'RNE') return;
    this.warnOnce(`frm_inert_${mode}`, `rounding mode ${mode} is not implemented; using RNE`, { frm: this.fcsr.frm.toString() });
  }

  private warnOnce(kind: string, message: string, details?: Record<string, string>): void {
    if (this.warnedKinds.has(kind)) return;
    this.warnedKinds.add(kind);
    if (this.onWarn) this.onWarn({ kind, message, details });
  }
}
