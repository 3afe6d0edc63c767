#!/usr/bin/env tsx
/*
 * Headless simulator: loads a content pack, advances a session in fixed
 * frames with optional auto-play, and prints one JSON summary line to stdout.
 */

import process from 'node:process';

import {
  loadContentPack,
  sampleContent,
  type ContentPack,
} from '@epochs/content-sample';

import { parseArgs, USAGE, UsageError } from './args.js';
import { loadConfigOverrides } from './config-file.js';
import { runSimulation } from './simulate.js';

function loadPack(packPath: string | undefined): ContentPack {
  if (packPath === undefined) {
    return sampleContent;
  }
  const { pack, warnings } = loadContentPack(packPath);
  for (const warning of warnings) {
    console.error(`[${warning.severity}] ${warning.code}: ${warning.message}`);
  }
  return pack;
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  if (args.helpRequested) {
    // Keep stdout clean for JSON consumers.
    console.error(USAGE);
    return;
  }

  const result = runSimulation({
    content: loadPack(args.packPath),
    ...(args.configPath !== undefined ? { config: loadConfigOverrides(args.configPath) } : {}),
    seconds: args.seconds,
    frameMs: args.frameMs,
    ...(args.speed !== undefined ? { speed: args.speed } : {}),
    autoBuy: args.autoBuy,
    autoChoose: args.autoChoose,
  });

  process.stdout.write(JSON.stringify(result) + '\n');
}

try {
  main();
} catch (error) {
  if (error instanceof UsageError) {
    console.error(`Error: ${error.message}\n`);
    console.error(USAGE);
    process.exitCode = 2;
  } else {
    console.error('runtime-sim failed:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
