#!/usr/bin/env tsx
/**
 * Remove import lines from source text, keeping "import Foundation"
 *
 * Reads the named files in order (stdin when none are given) and writes every line
 * to stdout unless it starts with "import" and doesn't contain "import Foundation".
 * Lines keep their original terminators.
 *
 * Usage:
 *   tsx filter-imports.ts < Client.swift > Client.filtered.swift
 *   tsx filter-imports.ts Client.swift RequestErrorExtension.swift > Combined.swift
 *   cat Header.swift | tsx filter-imports.ts - Client.swift
 *
 * Arguments:
 *   file   Input file; "-" reads stdin at that position
 *
 * Environment Variables:
 *   FILTER_IMPORTS_VERBOSE   Set to "true" to print per-filter stats to stderr
 */

import 'dotenv/config';
import { run } from './src/cli';

async function main() {
  const code = await run(process.argv.slice(2), { stdin: process.stdin, stdout: process.stdout });
  process.exit(code);
}

// Run
main().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
