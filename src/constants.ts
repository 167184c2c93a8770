import { join, dirname } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Read version from package.json at runtime
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJsonPath = join(__dirname, '..', 'package.json');
let VERSION_VALUE = '2.0.0'; // fallback
try {
  const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    VERSION_VALUE = pkg.version;
  }
} catch {
  // Fallback if package.json can't be read (e.g., bundled)
}
export const VERSION = VERSION_VALUE;
export const DESCRIPTION = 'AES-256-CBC file encryption + split tool';
export const APP_NAME = 'cokacenc';

// ============================================================================
// Chunk wire format
// ============================================================================

export const MAGIC = Buffer.from('COKACENC', 'ascii');
export const FORMAT_VERSION = 2;
export const SALT_LENGTH = 16;
export const IV_LENGTH = 16;
export const HEADER_LENGTH = MAGIC.length + 4 + SALT_LENGTH + IV_LENGTH; // 44

export const KEY_LENGTH = 32; // AES-256
export const PBKDF2_ITERATIONS = 100_000;
export const PBKDF2_DIGEST = 'sha512';
export const CIPHER_ALGORITHM = 'aes-256-cbc';

/** Metadata record version embedded in every chunk */
export const METADATA_VERSION = 2;
export const METADATA_LENGTH_BYTES = 4;
export const MAX_METADATA_LENGTH = 1024 * 1024;

// ============================================================================
// Naming
// ============================================================================

export const CHUNK_EXTENSION = '.cokacenc';
export const GROUP_ID_BYTES = 8;
export const GROUP_ID_ATTEMPTS = 16;
export const SEQ_LABEL_LENGTH = 4;
export const MAX_CHUNKS = 26 ** SEQ_LABEL_LENGTH; // 456,976
export const UNPACK_TEMP_SUFFIX = '.unpacking';

// ============================================================================
// I/O and defaults
// ============================================================================

export const READ_BUFFER_SIZE = 64 * 1024;
export const MB = 1024 * 1024;
export const DEFAULT_SPLIT_SIZE_MB = 1800;
export const DEFAULT_KEY_LENGTH = 64;
export const MIN_KEY_LENGTH = 16;
export const MAX_KEY_LENGTH = 4096;

export const CONFIG_SEARCH_PLACES = [
  '.cokacencrc',
  '.cokacencrc.json',
  '.cokacencrc.yaml',
  '.cokacencrc.yml',
];
