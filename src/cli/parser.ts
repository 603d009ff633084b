export interface CliArgs {
  file?: string | undefined;
  nodes: string[];
  hours?: number | undefined;
  horizon?: number | undefined;
  backtest: boolean;
  backtestHoldout?: number | undefined;
  json: boolean;
  // Minutes between passes; a single pass when unset
  interval?: number | undefined;
  help: boolean;
}

export const USAGE = `Usage: capacity-forecaster [samples-file] [options]

Options:
  -n, --node <name>       Analyze only this node (repeatable)
  --hours <h>             Window length in hours, ending at the newest sample
  --horizon <points>      Forecast horizon in sample intervals
  --backtest [points]     Backtest each forecast, withholding the given number of points
  --json                  Print the raw report as JSON
  --interval <minutes>    Repeat the analysis on a timer until interrupted
  -h, --help              Show this help`;

function parsePositive(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Option ${flag} expects a positive number, got "${value ?? ''}"`);
  }
  return parsed;
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = parsePositive(flag, value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Option ${flag} expects a whole number, got "${value ?? ''}"`);
  }
  return parsed;
}

// Splits "--flag=value" into its parts
function splitInline(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  return eq > 0 && arg.startsWith('--') ? [arg.slice(0, eq), arg.slice(eq + 1)] : [arg, undefined];
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    file: undefined,
    nodes: [],
    hours: undefined,
    horizon: undefined,
    backtest: false,
    backtestHoldout: undefined,
    json: false,
    interval: undefined,
    help: false,
  };

  const positionalArgs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const [flag, inline] = splitInline(args[i] ?? '');
    // Value from "--flag=value", otherwise the next argument
    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      i++;
      return args[i];
    };

    switch (flag) {
      case '--node':
      case '-n': {
        const node = takeValue();
        if (!node) throw new Error(`Option ${flag} expects a node name`);
        result.nodes.push(node);
        break;
      }
      case '--hours':
        result.hours = parsePositive(flag, takeValue());
        break;
      case '--horizon':
        result.horizon = parsePositiveInt(flag, takeValue());
        break;
      case '--backtest': {
        result.backtest = true;
        // The holdout is optional; only consume the next argument when it is a number
        if (inline !== undefined || /^\d+$/.test(args[i + 1] ?? '')) {
          result.backtestHoldout = parsePositiveInt(flag, takeValue());
        }
        break;
      }
      case '--json':
        result.json = true;
        break;
      case '--interval':
        result.interval = parsePositive(flag, takeValue());
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (flag.startsWith('-')) {
          throw new Error(`Unknown option: ${flag}`);
        }
        positionalArgs.push(flag);
    }
    i++;
  }

  // First positional argument is the samples file
  if (positionalArgs.length > 0) {
    result.file = positionalArgs[0];
  }

  return result;
}
