/**
 * Command line and environment options for the pipeline CLI.
 * Flags win over environment variables; numbers are passed through as parsed
 * so the pipeline request schema reports bad values.
 */

/** Sampling interval used when neither --step nor STEP is set */
export const DEFAULT_STEP_SECONDS = 1;

export type ParsedArgs = Record<string, string | boolean | undefined>;

export interface CliOptions {
  videoPath?: string;
  intervalSeconds: number;
  maxFrames?: number;
  endpoint?: string;
  concurrency?: number;
  maxRetries?: number;
  timeoutMs?: number;
  /** Print only the report JSON */
  json: boolean;
  help: boolean;
}

export class CliUsageError extends Error {}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      const key = args[i].slice(2);
      // Check if next arg exists and is not a flag
      if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
        result[key] = args[i + 1];
        i++;
      } else {
        result[key] = true;
      }
    } else if (args[i] === '-h') {
      result['help'] = true;
    } else if (!args[i].startsWith('-')) {
      result['_positional'] = args[i];
    }
  }
  return result;
}

function nonBlank(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function stringOption(parsed: ParsedArgs, flag: string, envValue?: string): string | undefined {
  const value = parsed[flag];
  if (typeof value === 'boolean') {
    throw new CliUsageError(`--${flag} needs a value`);
  }
  return nonBlank(value ?? envValue);
}

function numberOption(parsed: ParsedArgs, flag: string, envValue?: string): number | undefined {
  const value = stringOption(parsed, flag, envValue);
  return value === undefined ? undefined : Number(value);
}

/**
 * Resolve CLI options from argv (without node and script) and the environment
 */
export function resolveCliOptions(argv: string[], env: NodeJS.ProcessEnv): CliOptions {
  const parsed = parseArgs(argv);

  return {
    videoPath: stringOption(parsed, 'video') ?? stringOption(parsed, '_positional') ?? nonBlank(env.INPUT_PATH),
    intervalSeconds: numberOption(parsed, 'step', env.STEP) ?? DEFAULT_STEP_SECONDS,
    maxFrames: numberOption(parsed, 'max-frames', env.MAX_FRAMES),
    endpoint: stringOption(parsed, 'worker', env.WORKER_URL),
    concurrency: numberOption(parsed, 'concurrency'),
    maxRetries: numberOption(parsed, 'retries'),
    timeoutMs: numberOption(parsed, 'timeout'),
    json: parsed['json'] === true,
    help: parsed['help'] === true,
  };
}
