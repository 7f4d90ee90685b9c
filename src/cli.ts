#!/usr/bin/env node
import { runCli } from './cli/run.js';

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error('Unexpected error:', error);
  process.exitCode = 1;
}
