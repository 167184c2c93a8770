import { Command } from 'commander';
import chalk from 'chalk';
import { packCommand, unpackCommand, generateCommand } from './commands/index.js';
import { handleError } from './errors.js';
import { VERSION, DESCRIPTION } from './constants.js';

const program = new Command();

program
  .name('cokacenc')
  .description(DESCRIPTION)
  .version(VERSION, '-v, --version', 'Display version number')
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str)),
  })
  .helpOption('-h, --help', 'Display this help message')
  .addHelpText(
    'after',
    `
Chunk file format:
  [8B magic "COKACENC"][4B version LE (=2)][16B PBKDF2 salt][16B AES IV][ciphertext]
  plaintext = [4B metadata length LE][metadata JSON][file data]

Output names:
  <group_id 16hex>_<seq aaaa..zzzz>.cokacenc

Examples:
  $ cokacenc generate --output secret.key
  $ cokacenc pack --dir ./data --key secret.key --size 500 --md5
  $ cokacenc unpack --dir ./data --key secret.key`
  );

// Register commands
program.addCommand(packCommand);
program.addCommand(unpackCommand);
program.addCommand(generateCommand);

// Global error handling
process.on('uncaughtException', handleError);
process.on('unhandledRejection', (reason) => {
  handleError(reason instanceof Error ? reason : new Error(String(reason)));
});

// Parse and execute
program.parseAsync(process.argv).catch(handleError);
