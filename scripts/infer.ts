#!/usr/bin/env npx tsx
/**
 * CLI script to run type inference on a JavaScript file
 * Usage: npx tsx scripts/infer.ts <file.js> [options]
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseProgram } from '../src/parser/index.js';
import { inferProgram, createPrelude } from '../src/inference/index.js';
import type { InferOptions } from '../src/inference/index.js';
import { TypeEnv } from '../src/types/index.js';
import { formatReport, formatJSON, formatTraceEvent } from '../src/output/index.js';

function usage(): void {
  console.log('Usage: npx tsx scripts/infer.ts <file.js> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --format=report   Human-readable bindings and types (default)');
  console.log('  --format=json     Machine-readable JSON output');
  console.log('  --no-prelude      Start from an empty environment (no operators)');
  console.log('  --max-depth=N     Maximum expression nesting depth');
  console.log('  --max-steps=N     Maximum number of expression nodes visited');
  console.log('  --verbose         Trace unifications and generalizations');
}

function parsePositiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    console.error(`Error: ${flag} expects a positive integer, got '${value}'`);
    process.exit(1);
  }
  return n;
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    usage();
    process.exit(1);
  }

  // Parse arguments
  let filePath = '';
  let format = 'report';
  let usePrelude = true;
  let verbose = false;
  const options: InferOptions = {};

  for (const arg of args) {
    if (arg.startsWith('--format=')) {
      format = arg.slice('--format='.length);
    } else if (arg === '--no-prelude') {
      usePrelude = false;
    } else if (arg.startsWith('--max-depth=')) {
      options.maxDepth = parsePositiveInt('--max-depth', arg.slice('--max-depth='.length));
    } else if (arg.startsWith('--max-steps=')) {
      options.maxSteps = parsePositiveInt('--max-steps', arg.slice('--max-steps='.length));
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (!arg.startsWith('-')) {
      filePath = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      process.exit(1);
    }
  }

  if (!filePath) {
    console.error('Error: No file path provided');
    process.exit(1);
  }

  if (format !== 'report' && format !== 'json') {
    console.error(`Error: Unknown format '${format}'`);
    process.exit(1);
  }

  // Resolve and read file
  const absolutePath = resolve(process.cwd(), filePath);
  let source: string;

  try {
    source = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`Error: Could not read file '${absolutePath}': ${reason}`);
    process.exit(1);
  }

  // Parse and lower the source
  console.error(`Parsing ${filePath}...`);
  const { program, errors: parseErrors } = parseProgram(source, { filename: filePath });

  if (!program) {
    console.error('Parse errors:');
    for (const err of parseErrors) {
      console.error(`  ${filePath}:${err.line}:${err.column}: ${err.message}`);
    }
    process.exit(1);
  }

  if (verbose) {
    options.trace = event => console.error(`  ${formatTraceEvent(event)}`);
  }

  // Run type inference
  const startTime = Date.now();
  const env = usePrelude ? createPrelude() : TypeEnv.empty();
  const result = inferProgram(program, env, options);
  const elapsed = Date.now() - startTime;

  console.error(`Inference completed in ${elapsed}ms`);
  console.error('');

  console.log(format === 'json' ? formatJSON(result) : formatReport(result));

  if (!result.ok) {
    process.exit(1);
  }
}

main();
