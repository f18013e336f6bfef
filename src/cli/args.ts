import { InvalidArgumentError } from '../errors.js';
import { CUT_MODES, type CutMode } from '../types.js';
import { parseDateTimeArg, safeInt } from '../utils/datetime.js';

export const DEFAULT_DURATION_SECONDS = 60;

export interface RecordArgs {
  config: string | null;
  output: string | null;
  /** --until 指定時は null */
  duration: number | null;
  until: Date | null;
  streams: string[];
  startMode: CutMode | null;
  stopMode: CutMode | null;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: icy-record [options]

  --config <file>        JSON configuration (default: $CONFIG_PATH or config.json)
  --output <dir>         Output directory (default: recording.output)
  --duration <seconds>   How many seconds to record (default: ${DEFAULT_DURATION_SECONDS})
  --until <datetime>     Record until '[YYYY-MM-DD] HH:MM[:SS]'
  --stream <id>          Record only this stream (repeatable, default: all)
  --start-mode <mode>    immediate | defer-to-next-track
  --stop-mode <mode>     immediate | defer-to-next-track
  --verbose              Log debug output
  --help                 Show this help`;

function parseCutMode(option: string, value: string): CutMode {
  const mode = CUT_MODES.find((m) => m === value);
  if (!mode) {
    throw new InvalidArgumentError(`${option} must be one of ${CUT_MODES.join(', ')} (got '${value}')`);
  }
  return mode;
}

export function parseRecordArgs(argv: string[], now: Date = new Date()): RecordArgs {
  const args: RecordArgs = {
    config: null,
    output: null,
    duration: null,
    until: null,
    streams: [],
    startMode: null,
    stopMode: null,
    verbose: false,
    help: false,
  };

  const valueOf = (option: string, index: number): string => {
    const value = argv[index];
    if (value === undefined || value.startsWith('--')) {
      throw new InvalidArgumentError(`${option} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        args.config = valueOf(arg, ++i);
        break;
      case '--output':
        args.output = valueOf(arg, ++i);
        break;
      case '--duration': {
        const duration = safeInt(valueOf(arg, ++i), -1);
        if (duration <= 0) throw new InvalidArgumentError('--duration must be a positive number of seconds');
        args.duration = duration;
        break;
      }
      case '--until':
        args.until = parseDateTimeArg(valueOf(arg, ++i), now);
        break;
      case '--stream':
        args.streams.push(valueOf(arg, ++i));
        break;
      case '--start-mode':
        args.startMode = parseCutMode(arg, valueOf(arg, ++i));
        break;
      case '--stop-mode':
        args.stopMode = parseCutMode(arg, valueOf(arg, ++i));
        break;
      case '--verbose':
        args.verbose = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new InvalidArgumentError(`Unknown argument: ${arg}`);
    }
  }

  if (args.duration !== null && args.until !== null) {
    throw new InvalidArgumentError('--duration and --until are mutually exclusive');
  }
  if (args.duration === null && args.until === null) {
    args.duration = DEFAULT_DURATION_SECONDS;
  }
  return args;
}
