#!/usr/bin/env npx tsx
/**
 * Benchmark script to measure inference performance
 * Usage: npx tsx scripts/bench.ts [file.js]
 *
 * Without a file, a synthetic program of chained polymorphic definitions
 * is generated.
 */

import { readFileSync } from 'node:fs';
import { parseProgram } from '../src/parser/index.js';
import { inferProgram, createPrelude } from '../src/inference/index.js';
import { formatReport } from '../src/output/index.js';

/**
 * f0 = x => x, fN = x => fN-1(fN-1(x)): each definition is used at two
 * types, so every level exercises instantiation
 */
function syntheticProgram(levels: number): string {
  const lines = ['const f0 = x => x;'];
  for (let i = 1; i <= levels; i++) {
    lines.push(`const f${i} = x => f${i - 1}(f${i - 1}(x));`);
  }
  lines.push(`f${levels}(f${levels}(1) === f${levels}(2) ? true : f${levels}(false))`);
  return lines.join('\n');
}

const filePath = process.argv[2];
const source = filePath ? readFileSync(filePath, 'utf-8') : syntheticProgram(200);

console.log(`File: ${filePath ?? '<synthetic>'}`);
console.log(`Size: ${source.length} bytes, ${source.split('\n').length} lines`);
console.log('');

// Warm up
parseProgram(source);

// Benchmark parse
const parseStart = performance.now();
const { program, errors } = parseProgram(source);
const parseEnd = performance.now();
console.log(`Parse time: ${(parseEnd - parseStart).toFixed(2)}ms`);

if (!program) {
  console.error(`Parse failed: ${errors.map(e => e.message).join('; ')}`);
  process.exit(1);
}

// Benchmark inference
const inferStart = performance.now();
const result = inferProgram(program, createPrelude());
const inferEnd = performance.now();
console.log(`Inference time: ${(inferEnd - inferStart).toFixed(2)}ms`);

console.log('');
if (result.ok) {
  console.log(`Bindings: ${result.value.bindings.length}`);
} else {
  console.log(formatReport(result));
}
