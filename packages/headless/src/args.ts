import { ConfigError, envFlag, type FetchMode, type SystemOptions } from '@ultrasim/core';

// Decimal or 0x-prefixed hex. Anything that does not parse comes back as NaN so
// option validation rejects it instead of silently using a default.
export function parseNum(val: string | undefined, def: number): number {
  if (val === undefined) return def;
  const s = val.trim();
  if (s === '') return NaN;
  const n = Number(s);
  return Number.isFinite(n) ? n : NaN;
}

export function parseFrames(val: string | undefined): number {
  const frames = parseNum(val, 1);
  if (!Number.isSafeInteger(frames) || frames < 1) {
    throw new ConfigError('frames', `expected a positive integer, got ${val ?? ''}`);
  }
  return frames;
}

export type ParsedArgs = {
  positional: string[];
  opts: Record<string, string>;
};

// `--key value` pairs; a bare `--flag` (or one followed by another flag) reads as '1'
export function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const opts: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? '';
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = (i + 1 < args.length) ? args[i + 1] : undefined;
      opts[key] = (next !== undefined && !next.startsWith('--')) ? (args[++i] ?? '1') : '1';
    } else {
      positional.push(a);
    }
  }
  return { positional, opts };
}

function toFetchMode(val: string | undefined): FetchMode | undefined {
  if (val === undefined) return undefined;
  if (val === 'bus' || val === 'direct') return val;
  throw new ConfigError('fetch', `expected 'bus' or 'direct', got ${val}`);
}

export function systemOptionsFromArgs(opts: Record<string, string>, env: NodeJS.ProcessEnv = process.env): Partial<SystemOptions> {
  const out: Partial<SystemOptions> = {};
  if (opts['memory-mb'] !== undefined) out.memoryMB = parseNum(opts['memory-mb'], NaN);
  if (opts['cycles-per-frame'] !== undefined) out.cyclesPerFrame = parseNum(opts['cycles-per-frame'], NaN);
  if (opts['stages'] !== undefined) out.stages = parseNum(opts['stages'], NaN);
  const fetch = toFetchMode(opts['fetch']);
  if (fetch) out.fetch = fetch;
  if (Object.prototype.hasOwnProperty.call(opts, 'trace') || envFlag(env.ULTRASIM_TRACE)) {
    // eslint-disable-next-line no-console
    out.logger = (line) => console.log(line);
  }
  return out;
}
