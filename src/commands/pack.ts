import { Command } from 'commander';
import { basename } from 'path';
import { logger, withSpinner, formatCount, formatPath } from '../ui/index.js';
import { expandPath, isDirectory } from '../lib/paths.js';
import { loadConfig, parseIntegerFlag, requireKeyPath, toPackOptions } from '../lib/config.js';
import { loadKeyFile } from '../lib/crypto/index.js';
import { packDirectory } from '../lib/pack.js';
import { formatBytes } from '../lib/files.js';
import { ConfigError } from '../errors.js';
import type { PackCommandOptions, PackResult } from '../types.js';

const describeResult = (result: PackResult): string => {
  const name = basename(result.source);
  const chunks = result.chunks.length === 1 ? '1 chunk' : `${result.chunks.length} chunks`;
  const hash = result.md5 ? `, MD5 ${result.md5.slice(0, 8)}` : '';
  return `${name} → ${result.groupId} (${chunks}, ${formatBytes(result.fileSize)}${hash})`;
};

export const runPackCommand = async (options: PackCommandOptions): Promise<PackResult[]> => {
  const dir = expandPath(options.dir);
  if (!(await isDirectory(dir))) {
    throw new ConfigError(`Not a directory: ${dir}`);
  }

  const { config, filepath } = await loadConfig(dir, {
    key: options.key,
    size: parseIntegerFlag(options.size, '--size'),
    md5: options.md5,
    delete: options.delete,
  });
  if (filepath) {
    logger.info(`Using configuration from ${formatPath(filepath)}`);
  }

  const keyPath = expandPath(requireKeyPath(config));
  const password = await loadKeyFile(keyPath);
  // A key file kept in the target directory must never be packed
  const packOptions = { ...toPackOptions(config), exclude: [keyPath] };

  const results = await packDirectory(dir, password, packOptions, (label, fn) =>
    withSpinner(label, fn, { successText: describeResult })
  );

  if (results.length === 0) {
    logger.warning(`No files to pack in ${dir}`);
    return results;
  }

  if (packOptions.delete) {
    results.filter((r) => r.deletedSource).forEach((r) => logger.removed(basename(r.source)));
  }

  logger.blank();
  logger.success(`Packed ${formatCount(results.length, 'file')}`);
  return results;
};

export const packCommand = new Command('pack')
  .description('Encrypt (and split) every file in a directory')
  .requiredOption('-d, --dir <dir>', 'Directory containing files to encrypt')
  .option('-k, --key <file>', 'Key file (its trimmed contents are the password)')
  .option('-s, --size <MB>', 'Maximum chunk size in MB (0 = never split)')
  .option('--delete', 'Delete original files after successful encryption')
  .option('--md5', 'Compute and embed an MD5 hash for verification on unpack')
  .action(async (options: PackCommandOptions) => {
    await runPackCommand(options);
  });
