#!/usr/bin/env node
/**
 * Tessera CLI
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { ParseError, CompileError } from 'tessera-core';
import { Session } from './run.js';

interface RunOptions {
  trace?: boolean;
  disassemble?: boolean;
  maxFrames?: number;
}

function parsePositive(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return n;
}

function readSource(file: string): string {
  const resolved = path.resolve(file);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${file}`);
    process.exit(1);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

/**
 * Front-end errors are the user's; anything else is ours
 */
function reportError(error: unknown): void {
  if (error instanceof ParseError || error instanceof CompileError) {
    console.error('Error:', error.message);
    return;
  }
  if (error instanceof Error) {
    console.error('Error:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
    return;
  }
  console.error('Error:', String(error));
}

const program = new Command();

program
  .name('tessera')
  .description('Tagged values, a stack bytecode VM and class-based message dispatch')
  .version('0.1.0');

program
  .command('run')
  .description('Run a source file')
  .argument('<file>', 'Source file')
  .option('--trace', 'Trace every executed instruction')
  .option('--disassemble', 'Print the bytecode of each form before running it')
  .option('--max-frames <n>', 'Deepest call nesting allowed', parsePositive)
  .action((file: string, options: RunOptions) => {
    const source = readSource(file);
    try {
      const session = new Session({
        trace: options.trace,
        disassemble: options.disassemble,
        maxFrames: options.maxFrames,
      });
      session.evaluateAndPrint(source, file);
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  });

program
  .command('disassemble')
  .description('Compile a source file and print its bytecode')
  .argument('<file>', 'Source file')
  .action((file: string) => {
    const source = readSource(file);
    try {
      const session = new Session();
      console.log(session.listing(source, file).join('\n\n'));
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  });

program
  .command('repl')
  .description('Read-eval-print loop')
  .option('--trace', 'Trace every executed instruction')
  .option('--disassemble', 'Print the bytecode of each form before running it')
  .option('--max-frames <n>', 'Deepest call nesting allowed', parsePositive)
  .action((options: RunOptions) => {
    const session = new Session({
      trace: options.trace,
      disassemble: options.disassemble,
      maxFrames: options.maxFrames,
    });
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
    let line = 0;

    rl.on('line', input => {
      line++;
      try {
        session.evaluateAndPrint(input, `<repl:${line}>`);
      } catch (error) {
        // Stay in the loop; the next line starts fresh
        reportError(error);
      }
      rl.prompt();
    });
    rl.on('close', () => {
      process.exit(0);
    });
    rl.prompt();
  });

program.parse();
