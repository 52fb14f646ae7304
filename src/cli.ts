import { Command } from 'commander';
import * as path from 'node:path';
import { decodeMessage, encodeMessage, printChunks, removeMessage } from './commands.js';
import { config } from './config.js';
import { isPngError } from './errors.js';
import { createLogger, type LogFacility } from './logger.js';
import type { Logger } from './types.js';

export interface CliOptions {
  /** Destination for log lines and command output. Defaults to console. */
  facility?: LogFacility;
  /** Called with 1 when a command fails. Defaults to setting process.exitCode. */
  setExitCode?: (code: number) => void;
}

function describeError(error: unknown): string {
  if (isPngError(error)) {
    return `${error.kind}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build the `pngmsg` command-line program
 */
export function createProgram(options: CliOptions = {}): Command {
  const facility = options.facility ?? console;
  const setExitCode = options.setExitCode ?? ((code: number) => {
    process.exitCode = code;
  });
  const program = new Command();

  const loggerFor = (command: string): Logger => {
    const { verbose } = program.opts<{ verbose?: boolean }>();
    return createLogger(command, facility, verbose ?? config.logging.verbose);
  };

  const run = async (command: string, action: (logger: Logger) => Promise<void>): Promise<void> => {
    const logger = loggerFor(command);
    try {
      await action(logger);
    } catch (error) {
      logger.error(describeError(error));
      setExitCode(1);
    }
  };

  program
    .name(config.program.name)
    .description(config.program.description)
    .version(config.program.version)
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError();

  program
    .command('encode')
    .description('Encode a secret message in a PNG file')
    .argument('<path>', 'The PNG file to encode')
    .argument('<chunk_type>', 'The 4 byte chunk type code')
    .argument('<message>', 'The secret message to encode')
    .action((file: string, chunkType: string, message: string) =>
      run('encode', (logger) => encodeMessage(path.resolve(file), chunkType, message, logger))
    );

  program
    .command('decode')
    .description('Decode a secret message from a PNG file')
    .argument('<path>', 'The PNG file to decode')
    .argument('<chunk_type>', 'The 4 byte chunk type code')
    .action((file: string, chunkType: string) =>
      run('decode', async (logger) => {
        const message = await decodeMessage(path.resolve(file), chunkType, logger);
        facility.log(`Message: ${message}`);
      })
    );

  program
    .command('remove')
    .description('Remove a secret message from a PNG file')
    .argument('<path>', 'The PNG file to modify')
    .argument('<chunk_type>', 'The 4 byte chunk type code')
    .action((file: string, chunkType: string) =>
      run('remove', async (logger) => {
        await removeMessage(path.resolve(file), chunkType, logger);
      })
    );

  program
    .command('print')
    .description('Print the private chunks of a PNG file')
    .argument('<path>', 'The PNG file to inspect')
    .action((file: string) =>
      run('print', async (logger) => {
        const chunks = await printChunks(path.resolve(file), logger);
        for (const chunk of chunks) {
          facility.log(chunk.toString());
        }
      })
    );

  return program;
}
