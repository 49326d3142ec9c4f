import { parseDurationMs } from './time-parser.js';

export interface CrawlArgs {
  config?: string;
  extractor?: string;
  workers?: number;
  maxRetries?: number;
  requestTimeoutMs?: number;
  localHeaded?: boolean;
  noSave?: boolean;
  logLevel?: string;
  executablePath?: string;
}

export interface ParsedArgs {
  command: string;
  options: CrawlArgs;
}

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * Boolean flags (like --no-save) don't take values.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const command = args[0] ?? 'run';
  const options: CrawlArgs = {};

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);
    const value = (): string => {
      if (inline !== undefined) return inline;
      if (i + 1 >= args.length) {
        throw new Error(`${flag} expects a value`);
      }
      return args[++i];
    };

    switch (flag) {
      case '--config':
        options.config = value();
        break;
      case '--extractor':
        options.extractor = value();
        break;
      case '--workers':
        options.workers = parsePositiveInt(flag, value());
        break;
      case '--max-retries':
        options.maxRetries = parsePositiveInt(flag, value());
        break;
      case '--request-timeout':
        options.requestTimeoutMs = parseDurationMs(value());
        break;
      case '--log-level':
        options.logLevel = value();
        break;
      case '--executable-path':
        options.executablePath = value();
        break;
      case '--local-headed':
        options.localHeaded = true;
        break;
      case '--no-save':
        options.noSave = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return { command, options };
}
