export { packCommand, runPackCommand } from './pack.js';
export { unpackCommand, runUnpackCommand } from './unpack.js';
export { generateCommand, runGenerateCommand } from './generate.js';
