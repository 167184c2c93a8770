import { Command } from 'commander';
import { basename } from 'path';
import { logger, withSpinner, formatCount, formatPath } from '../ui/index.js';
import { expandPath, isDirectory } from '../lib/paths.js';
import { loadConfig, requireKeyPath, toUnpackOptions } from '../lib/config.js';
import { loadKeyFile } from '../lib/crypto/index.js';
import { unpackDirectory } from '../lib/unpack.js';
import { formatBytes } from '../lib/files.js';
import { ConfigError } from '../errors.js';
import type { UnpackCommandOptions, UnpackResult } from '../types.js';

const describeResult = (result: UnpackResult): string => {
  const verified = result.verified ? `, MD5 verified ${result.md5}` : ', MD5 not recorded';
  return `${result.groupId} → ${basename(result.output)} (${formatBytes(result.fileSize)}${verified})`;
};

export const runUnpackCommand = async (options: UnpackCommandOptions): Promise<UnpackResult[]> => {
  const dir = expandPath(options.dir);
  if (!(await isDirectory(dir))) {
    throw new ConfigError(`Not a directory: ${dir}`);
  }

  const { config, filepath } = await loadConfig(dir, {
    key: options.key,
    delete: options.delete,
    overwrite: options.overwrite,
  });
  if (filepath) {
    logger.info(`Using configuration from ${formatPath(filepath)}`);
  }

  const password = await loadKeyFile(requireKeyPath(config));
  const unpackOptions = toUnpackOptions(config);

  const results = await unpackDirectory(dir, password, unpackOptions, (label, fn) =>
    withSpinner(label, fn, { successText: describeResult })
  );

  if (results.length === 0) {
    logger.warning(`No .cokacenc files found in ${dir}`);
    return results;
  }

  for (const result of results) {
    result.warnings.forEach((w) => logger.warning(`${basename(result.output)}: ${w}`));
    if (result.deletedChunks) {
      logger.removed(`${result.groupId}_*.cokacenc (${result.chunkCount})`);
    }
  }

  logger.blank();
  logger.success(`Unpacked ${formatCount(results.length, 'file')}`);
  return results;
};

export const unpackCommand = new Command('unpack')
  .description('Decrypt and merge every chunk group in a directory')
  .requiredOption('-d, --dir <dir>', 'Directory containing .cokacenc files')
  .option('-k, --key <file>', 'Key file used for pack')
  .option('--delete', 'Delete .cokacenc files after successful decryption')
  .option('--overwrite', 'Replace existing files with the same name as an original')
  .action(async (options: UnpackCommandOptions) => {
    await runUnpackCommand(options);
  });
