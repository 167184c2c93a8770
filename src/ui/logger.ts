import chalk from 'chalk';

export interface Logger {
  info: (msg: string) => void;
  success: (msg: string) => void;
  warning: (msg: string) => void;
  debug: (msg: string) => void;
  removed: (path: string) => void;
  blank: () => void;
  dim: (msg: string) => void;
}

export const logger: Logger = {
  info: (msg: string) => {
    console.log(chalk.blue('ℹ'), msg);
  },

  success: (msg: string) => {
    console.log(chalk.green('✓'), msg);
  },

  warning: (msg: string) => {
    console.log(chalk.yellow('⚠'), msg);
  },

  debug: (msg: string) => {
    if (process.env.DEBUG) {
      console.log(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  removed: (path: string) => {
    console.log(`  ${chalk.red('-')} ${path}`);
  },

  blank: () => {
    console.log();
  },

  dim: (msg: string) => {
    console.log(chalk.dim(msg));
  },
};

export const formatPath = (path: string): string => {
  return chalk.cyan(path);
};

export const formatCount = (count: number, singular: string, plural?: string): string => {
  const word = count === 1 ? singular : (plural || `${singular}s`);
  return `${chalk.bold(count.toString())} ${word}`;
};
