import { ConvertArgsSchema, type ConvertArgs } from './tools/schemas.js';
import { DocxError, DocxErrorCode } from './tools/docx/errors.js';

export const USAGE = `Usage: md-table-docx <input.md> [options]

Convert a Markdown file to a Word document with native tables.

Options:
  -o, --output <path>   Output .docx path (default: alongside input)
  --out-dir <dir>       Directory for the output .docx (overrides -o)
  -f, --force           Overwrite the output if it exists
  -v, --verbose         Log debug details and stack traces
  -h, --help            Show this help`;

export type ParsedCommand =
  | { kind: 'help' }
  | { kind: 'convert'; args: ConvertArgs };

function invalid(message: string, context?: Record<string, unknown>): DocxError {
  return new DocxError(message, DocxErrorCode.INVALID_ARGUMENTS, context);
}

/**
 * Parse command line arguments (without the node and script entries).
 */
export function parseArguments(argv: readonly string[]): ParsedCommand {
  const raw: Record<string, unknown> = {};
  const positionals: string[] = [];

  const takeValue = (i: number, flag: string): string => {
    const value = argv[i + 1];
    if (value === undefined || (value.startsWith('-') && value !== '-')) {
      throw invalid(`Option ${flag} requires a value`, { flag });
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    } else if (arg === '--output' || arg === '-o') {
      raw.output = takeValue(i++, arg);
    } else if (arg === '--out-dir') {
      raw.outDir = takeValue(i++, arg);
    } else if (arg === '--force' || arg === '-f') {
      raw.force = true;
    } else if (arg === '--verbose' || arg === '-v') {
      raw.verbose = true;
    } else if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw invalid(`Unknown option: ${arg}`, { option: arg });
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length > 1) {
    throw invalid(`Expected one input file, got ${positionals.length}`, { positionals });
  }
  raw.input = positionals[0] ?? '';

  const parsed = ConvertArgsSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw invalid(message, { issues: parsed.error.issues });
  }
  return { kind: 'convert', args: parsed.data };
}
