const DEFAULT_FRAME_MS = 100;
const DEFAULT_SECONDS = 60;

export interface CliArgs {
  packPath?: string;
  configPath?: string;
  seconds: number;
  frameMs: number;
  speed?: number;
  autoBuy: boolean;
  autoChoose: boolean;
  helpRequested: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE =
  `Usage: epochs-sim [options]\n\n` +
  `Options:\n` +
  `  --pack <file>       JSON or JSON5 content pack (default: bundled sample pack)\n` +
  `  --config <file>     JSON or JSON5 engine config overrides\n` +
  `  --seconds <n>       Real seconds to simulate (default: ${DEFAULT_SECONDS})\n` +
  `  --frame-ms <ms>     Frame length in milliseconds (default: ${DEFAULT_FRAME_MS})\n` +
  `  --speed <m>         Time speed multiplier, clamped to the configured bounds\n` +
  `  --auto-buy          Buy the cheapest affordable upgrade every frame\n` +
  `  --auto-choose       Resolve active events with their first available choice\n`;

function readValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} expects a value`);
  }
  return value;
}

function readPositiveNumber(flag: string, value: string | undefined): number {
  const numeric = Number(readValue(flag, value));
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw new UsageError(`${flag} must be a positive number`);
  }
  return numeric;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    seconds: DEFAULT_SECONDS,
    frameMs: DEFAULT_FRAME_MS,
    autoBuy: false,
    autoChoose: false,
    helpRequested: false,
  };

  const iterator = argv[Symbol.iterator]();
  for (let entry = iterator.next(); !entry.done; entry = iterator.next()) {
    const arg = entry.value;
    if (arg === '--pack') {
      args.packPath = readValue(arg, iterator.next().value);
    } else if (arg === '--config') {
      args.configPath = readValue(arg, iterator.next().value);
    } else if (arg === '--seconds') {
      args.seconds = readPositiveNumber(arg, iterator.next().value);
    } else if (arg === '--frame-ms') {
      args.frameMs = readPositiveNumber(arg, iterator.next().value);
    } else if (arg === '--speed') {
      args.speed = readPositiveNumber(arg, iterator.next().value);
    } else if (arg === '--auto-buy') {
      args.autoBuy = true;
    } else if (arg === '--auto-choose') {
      args.autoChoose = true;
    } else if (arg === '--help' || arg === '-h') {
      args.helpRequested = true;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return args;
}
