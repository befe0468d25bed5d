import type { Word } from '@core/cpu/types';

export type Chip8ErrorCode = 'ROM_TOO_LARGE' | 'STACK_OVERFLOW' | 'STACK_UNDERFLOW';

export class Chip8Error extends Error {
  constructor(public readonly code: Chip8ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class RomTooLargeError extends Chip8Error {
  constructor(public readonly limit: number, public readonly actual: number) {
    super('ROM_TOO_LARGE', `ROM too large: maximum allowable size is ${limit} bytes, got ${actual} bytes`);
  }
}

export class StackOverflowError extends Chip8Error {
  constructor(public readonly pc: Word, public readonly depth: number) {
    super('STACK_OVERFLOW', `Stack overflow at $${hex4(pc)} (depth ${depth})`);
  }
}

export class StackUnderflowError extends Chip8Error {
  constructor(public readonly pc: Word) {
    super('STACK_UNDERFLOW', `Stack underflow at $${hex4(pc)}`);
  }
}

export type DiagnosticKind = 'unknown-opcode' | 'stack-overflow' | 'stack-underflow';

export interface Diagnostic {
  kind: DiagnosticKind;
  pc: Word; // address of the offending instruction
  opcode: Word;
  message: string;
}

export function diagnosticFromError(e: StackOverflowError | StackUnderflowError, opcode: Word): Diagnostic {
  const kind: DiagnosticKind = e instanceof StackOverflowError ? 'stack-overflow' : 'stack-underflow';
  return { kind, pc: e.pc, opcode, message: e.message };
}

export function hex4(v: number): string {
  return (v & 0xFFFF).toString(16).toUpperCase().padStart(4, '0');
}
