#!/usr/bin/env node
// ============================================================================
// @zxconv/cli — Executable Entry
// ============================================================================

import process from 'node:process';
import { runCli } from './cli.js';

process.exitCode = runCli(process.argv.slice(2));
