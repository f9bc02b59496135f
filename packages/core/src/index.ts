export * from './exceptions.js';
export * from './types.js';
export * from './bits/bitvec.js';
export * from './bits/twos_complement.js';
export * from './alu/alu.js';
export * from './alu/shifter.js';
export * from './mdu/mul.js';
export * from './mdu/div.js';
export * from './fpu/f32.js';
export * from './fpu/f32_arith.js';
export * from './fpu/fcsr.js';
export * from './exec/exec_unit.js';
