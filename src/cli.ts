import { parseArguments, USAGE } from './cli-args.js';
import {
  convertMarkdownFile,
  describeOutline,
  DocxErrorCode,
  isDocxError,
  type OutlineSummary,
} from './tools/docx/index.js';
import { logger, setLogLevel } from './utils/logger.js';
import { errorMessage } from './utils/type-guards.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatSummary(summary: OutlineSummary): string {
  return [
    plural(summary.headings, 'heading'),
    plural(summary.paragraphs, 'paragraph'),
    plural(summary.listItems, 'list item'),
    plural(summary.tables, 'table'),
  ].join(', ');
}

function reportError(error: unknown, verbose: boolean): number {
  if (isDocxError(error)) {
    logger.error(`${error.code}: ${error.message}`);
    const hint = error.context?.hint;
    if (typeof hint === 'string') logger.error(hint);
    if (verbose && error.stack) logger.debug(error.stack);

    if (error.code === DocxErrorCode.INVALID_ARGUMENTS) {
      process.stderr.write(`${USAGE}\n`);
      return EXIT_USAGE;
    }
    return EXIT_FAILURE;
  }

  logger.error(`Unexpected failure: ${errorMessage(error)}`);
  if (verbose && error instanceof Error && error.stack) logger.debug(error.stack);
  return EXIT_FAILURE;
}

/**
 * Run the converter for the given arguments (without the node and
 * script entries) and return the process exit code.
 */
export async function run(argv: readonly string[]): Promise<number> {
  let verbose = false;
  setLogLevel('info');

  try {
    const command = parseArguments(argv);
    if (command.kind === 'help') {
      process.stdout.write(`${USAGE}\n`);
      return EXIT_SUCCESS;
    }

    verbose = command.args.verbose;
    setLogLevel(verbose ? 'debug' : 'info');

    const { input, output, outDir, force } = command.args;
    const result = await convertMarkdownFile({ input, output, outDir, force });

    process.stdout.write(`Converted ${result.inputPath} -> ${result.outputPath}\n`);
    logger.info(formatSummary(result.summary));
    for (const line of describeOutline(result.outline)) {
      logger.debug(line);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return reportError(error, verbose);
  }
}
