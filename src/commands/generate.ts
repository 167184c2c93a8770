import { Command } from 'commander';
import { logger, formatPath } from '../ui/index.js';
import { generateKeyFile, type GeneratedKeyFile } from '../lib/crypto/index.js';
import { parseIntegerFlag } from '../lib/config.js';
import type { GenerateCommandOptions } from '../types.js';

export const runGenerateCommand = async (options: GenerateCommandOptions): Promise<GeneratedKeyFile> => {
  const generated = await generateKeyFile(options.output, {
    length: parseIntegerFlag(options.length, '--length'),
    force: options.force,
  });

  logger.success(
    `Generated key file: ${formatPath(generated.path)} (${generated.length} random bytes, ${generated.encodedLength} chars Base64)`
  );
  logger.dim('  Keep this file safe: without it the chunks cannot be decrypted.');
  return generated;
};

export const generateCommand = new Command('generate')
  .description('Generate a random key file')
  .requiredOption('-o, --output <file>', 'Key file path to create')
  .option('-l, --length <bytes>', 'Random bytes before Base64 encoding (default 64)')
  .option('-f, --force', 'Overwrite an existing file')
  .action(async (options: GenerateCommandOptions) => {
    await runGenerateCommand(options);
  });
