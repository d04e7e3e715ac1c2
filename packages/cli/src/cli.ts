#!/usr/bin/env -S node --import tsx
// ============================================================================
// @toonbench/cli — Entry Point
// ============================================================================

import 'dotenv/config';
import process from 'node:process';
import { runCli } from './commands.js';

const code = await runCli(process.argv.slice(2), {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  env: process.env,
  isTTY: process.stdout.isTTY === true,
});
process.exitCode = code;
