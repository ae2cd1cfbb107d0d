/**
 * Loading and running source text: parse, compile and execute each top-level
 * form in order against one VM.
 */

import {
  Compiler,
  Runtime,
  VM,
  parse,
  printValue,
  disassemble,
  type Diagnostics,
  type Value,
} from 'tessera-core';

export interface SessionOptions {
  diagnostics?: Diagnostics;
  trace?: boolean;
  maxFrames?: number;
  /** Print each program's bytecode before running it */
  disassemble?: boolean;
  /** Where results and listings go */
  write?: (line: string) => void;
}

/**
 * One runtime plus one VM; definitions persist from one `evaluate` to the next.
 */
export class Session {
  readonly runtime = new Runtime();
  readonly vm: VM;
  private readonly compiler = new Compiler();
  private readonly write: (line: string) => void;

  constructor(private readonly options: SessionOptions = {}) {
    this.vm = new VM(this.runtime, {
      diagnostics: options.diagnostics,
      trace: options.trace,
      maxFrames: options.maxFrames,
    });
    this.write = options.write ?? (line => console.log(line));
  }

  /**
   * Run every form in `source` and return their values in order. Parse and
   * compile errors propagate before anything in `source` runs.
   */
  evaluate(source: string, file: string = '<input>'): Value[] {
    const programs = parse(source, file).map(datum => this.compiler.compileDatum(datum));
    return programs.map(program => {
      if (this.options.disassemble) {
        this.write(disassemble(program));
      }
      return this.vm.executeBytecode(program);
    });
  }

  /**
   * Evaluate and print each result
   */
  evaluateAndPrint(source: string, file?: string): void {
    for (const result of this.evaluate(source, file)) {
      this.write(printValue(result));
    }
  }

  /**
   * Compile only, printing the listing of every form
   */
  listing(source: string, file: string = '<input>'): string[] {
    return parse(source, file).map(datum => disassemble(this.compiler.compileDatum(datum)));
  }
}
