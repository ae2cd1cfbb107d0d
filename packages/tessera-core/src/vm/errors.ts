/**
 * Engine failures.
 *
 * Recoverable lookups (unbound globals, messages not understood) never throw;
 * they go through the diagnostics sink. These errors cover the cases where the
 * current execution cannot continue.
 */

export class VMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Bytecode violates an invariant the emitter is supposed to guarantee:
 * unknown opcode, truncated operand, inconsistent stack depth.
 */
export class BytecodeError extends VMError {
  constructor(message: string, public readonly offset: number = -1) {
    super(offset >= 0 ? `${message} (at offset ${offset})` : message);
  }
}

/**
 * Operand region of a frame, the stack segment, or the frame vector is full.
 */
export class StackOverflowError extends VMError {}

/**
 * Integer result does not fit the immediate encoding.
 */
export class IntegerOverflowError extends VMError {}
