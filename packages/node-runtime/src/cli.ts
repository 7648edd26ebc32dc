#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2));
