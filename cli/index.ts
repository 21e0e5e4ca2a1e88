#!/usr/bin/env node
/**
 * Layer roofline CLI
 *
 * Usage:
 *   npx tsx cli/index.ts <workflow> <command> <scenario.json> --batch N --seq N
 *
 * Examples:
 *   layer-roofline afd simulate scenarios/dense.json --batch 8 --seq 2048
 *   layer-roofline large-ep evaluate scenarios/moe.json -b 4 -s 4096 -o out/result.json
 */

import { runCli } from './simulate.js';

process.exitCode = await runCli(process.argv.slice(2));
