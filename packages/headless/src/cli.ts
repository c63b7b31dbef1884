#!/usr/bin/env node
import { ConfigError, RomLoadError, readRomFile } from '@ultrasim/core';
import { parseArgs, parseFrames, systemOptionsFromArgs } from './args.js';
import { demoRom, romInfo, runHeadless } from './lib.js';

function printUsage() {
  console.log(`Usage:
  npm run cli -- info <rom.z64>
  npm run cli -- run [rom.z64] [--frames N] [--cycles-per-frame N] [--stages N] [--fetch bus|direct] [--memory-mb N] [--trace]

Without a ROM path, run loads a small built-in demo image.
Set ULTRASIM_TRACE=1 to enable trace output without --trace.

Examples:
  npm run cli -- info game.z64
  npm run cli -- run game.z64 --frames 60 --trace
  npm run cli -- run --stages 1 --fetch direct
`);
}

async function runInfo(args: string[]) {
  const { positional } = parseArgs(args);
  const file = positional[0];
  if (!file) throw new ConfigError('rom', 'info requires a ROM file path');
  const rom = await readRomFile(file);
  console.log(JSON.stringify({ command: 'info', path: file, ...romInfo(rom) }, null, 2));
}

async function runRun(args: string[]) {
  const { positional, opts } = parseArgs(args);
  const file = positional[0];
  const frames = parseFrames(opts['frames']);
  const sysOpts = systemOptionsFromArgs(opts);
  const rom = file ? await readRomFile(file) : demoRom();
  const summary = runHeadless(rom, frames, sysOpts);
  console.log(JSON.stringify({ command: 'run', path: file ?? null, ...summary }, null, 2));
}

async function main() {
  const argv = process.argv.slice(2);
  const cmd = argv[0];
  if (!cmd || cmd === 'help' || cmd === '-h' || cmd === '--help') {
    printUsage();
    return;
  }
  if (cmd === 'info') {
    await runInfo(argv.slice(1));
    return;
  }
  if (cmd === 'run') {
    await runRun(argv.slice(1));
    return;
  }
  printUsage();
  process.exitCode = 1;
}

main().catch((err: unknown) => {
  if (err instanceof RomLoadError || err instanceof ConfigError) {
    console.error(`error: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
