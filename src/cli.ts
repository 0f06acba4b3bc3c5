import { WritableLineSink } from "./engine/components/LineSink.js";
import { isPairStreamError } from "./engine/errors.js";
import { scopedLogger } from "./logging/index.js";
import { conversionService } from "./services/index.js";

import type { EngineSettings } from "./engine/PairedStreamEngine.js";

const logger = scopedLogger("CLI");

export interface CliOptions {
  profile?: string;
  settings: Partial<EngineSettings>;
  help: boolean;
  list: boolean;
}

export const USAGE = `Usage: pairstream [options] [profile]

Reads an XML measurement feed on stdin and writes one line per matched pair.

Options:
      --unbounded          Growable queues instead of fixed capacity
      --capacity <n>       Unmatched values held per series (bounded queues)
      --list               List available profiles
  -h, --help               Show this help message`;

function parsePositiveInteger(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} expects a positive integer`);
  }
  return parsed;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { settings: {}, help: false, list: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--list":
        options.list = true;
        break;
      case "--unbounded":
        options.settings.queueStrategy = "unbounded";
        break;
      case "--capacity": {
        const capacity = parsePositiveInteger(arg, args[++i]);
        options.settings.firstCapacity = capacity;
        options.settings.secondCapacity = capacity;
        break;
      }
      default:
        if (arg.startsWith("-")) {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (options.profile !== undefined) {
          throw new Error(`Unexpected argument: ${arg}`);
        }
        options.profile = arg;
    }
  }

  return options;
}

/**
 * Run one conversion from `input` to `output`.
 * @returns process exit code
 */
export async function runCli(
  args: string[],
  input: AsyncIterable<string | Buffer>,
  output: NodeJS.WritableStream,
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error: unknown) {
    logger.error(error instanceof Error ? error.message : String(error));
    logger.error(USAGE);
    return 1;
  }

  if (options.help) {
    output.write(USAGE + "\n");
    return 0;
  }

  if (options.list) {
    for (const profile of conversionService.listProfiles()) {
      output.write(`${profile.name}\t${profile.description}\n`);
    }
    return 0;
  }

  try {
    const result = await conversionService.convert(input, new WritableLineSink(output), {
      ...(options.profile !== undefined ? { profile: options.profile } : {}),
      settings: options.settings,
      sourceName: "stdin",
    });
    logger.debug(`${result.profile}: ${result.stats.pairsEmitted} pairs`);
    return 0;
  } catch (error: unknown) {
    if (isPairStreamError(error)) {
      logger.error(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
