import type { LogLevel, ReportFormat } from '../types/index.js';
import { DEFAULT_READER_OPTIONS, DEFAULT_REPORT_OPTIONS } from '../types/index.js';
import { createLogger, isLogLevel } from '../utils/Logger.js';
import { DiagramReader } from '../core/DiagramReader.js';
import { renderShapeTable } from '../report/ShapeTable.js';

/**
 * Environment variable supplying the default log level.
 */
export const LOG_LEVEL_ENV = 'DRAWIO_SHAPES_LOG_LEVEL';

const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'markdown', 'json'];

/**
 * Output streams of a command-line run. Each call receives one line.
 */
export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const processIo: CliIo = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

/**
 * Parsed command-line arguments.
 */
export interface CliArguments {
  files: string[];
  format: ReportFormat;
  logLevel: LogLevel;
  help: boolean;
}

/**
 * Raised for arguments the command line cannot use.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const USAGE = [
  'Usage: drawio-shapes [options] <file...>',
  '  Prints the id, content and style of every shape in each draw.io file.',
  'Options:',
  '  --format, -f <text|markdown|json>   Output format (default: text)',
  '  --log-level <level>                 debug|info|warn|error|silent (default: warn)',
  `                                      ${LOG_LEVEL_ENV} sets the default`,
  '  --help, -h                          Show this help',
];

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

/**
 * Parses command-line arguments (without the node and script entries).
 */
export function parseArguments(args: readonly string[], env: NodeJS.ProcessEnv = {}): CliArguments {
  const envLevel = env[LOG_LEVEL_ENV];
  const parsed: CliArguments = {
    files: [],
    format: DEFAULT_REPORT_OPTIONS.format,
    logLevel: envLevel !== undefined && isLogLevel(envLevel) ? envLevel : DEFAULT_READER_OPTIONS.logLevel,
    help: false,
  };

  let optionsEnded = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (optionsEnded || !arg.startsWith('-') || arg === '-') {
      parsed.files.push(arg);
      continue;
    }
    if (arg === '--') {
      optionsEnded = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq >= 0 ? arg.slice(0, eq) : arg;
    const takeValue = (): string => {
      if (eq >= 0) {
        return arg.slice(eq + 1);
      }
      const next = args[i + 1];
      if (next === undefined) {
        throw new UsageError(`Option ${name} requires a value`);
      }
      i++;
      return next;
    };

    switch (name) {
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      case '--format':
      case '-f': {
        const value = takeValue();
        if (!isReportFormat(value)) {
          throw new UsageError(`Unknown format '${value}' (expected ${REPORT_FORMATS.join(', ')})`);
        }
        parsed.format = value;
        break;
      }
      case '--log-level': {
        const value = takeValue();
        if (!isLogLevel(value)) {
          throw new UsageError(`Unknown log level '${value}'`);
        }
        parsed.logLevel = value;
        break;
      }
      default:
        throw new UsageError(`Unknown option ${name}`);
    }
  }

  return parsed;
}

/**
 * Runs the command line and returns the exit code.
 *
 * Files are processed in order and the first failure ends the run; tables
 * already printed for earlier files stay printed.
 */
export function runCli(args: readonly string[], io: CliIo = processIo, env: NodeJS.ProcessEnv = process.env): number {
  let parsed: CliArguments;
  try {
    parsed = parseArguments(args, env);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(error.message);
      USAGE.forEach((line) => io.stderr(line));
      return 1;
    }
    throw error;
  }

  if (parsed.help) {
    USAGE.forEach((line) => io.stdout(line));
    return 0;
  }
  if (parsed.files.length === 0) {
    io.stderr('At least one diagram file is required');
    USAGE.forEach((line) => io.stderr(line));
    return 1;
  }

  const logger = createLogger(parsed.logLevel, 'drawio-shapes', io.stderr);
  const reader = new DiagramReader({ logger });

  try {
    for (const file of parsed.files) {
      io.stdout(`== Processing ${file}`);
      const shapes = reader.read(file);
      io.stdout(renderShapeTable(shapes, { format: parsed.format }));
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`Error: ${message}`);
    logger.debug('Run aborted', { stack: error instanceof Error ? error.stack : undefined });
    return 1;
  }

  return 0;
}
