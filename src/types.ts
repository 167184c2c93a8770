export interface PackOptions {
  /** Maximum plaintext bytes per chunk; 0 keeps the whole file in one chunk */
  splitSize: number;
  /** Compute and embed the MD5 of the original file */
  md5: boolean;
  /** Remove the original after every chunk is written */
  delete: boolean;
  /** Absolute paths the directory driver skips, such as the key file */
  exclude?: string[];
}

export interface UnpackOptions {
  /** Remove the chunk files after the merged file is committed */
  delete: boolean;
  /** Replace an existing file with the same name as the original */
  overwrite: boolean;
}

export interface PackResult {
  source: string;
  groupId: string;
  fileSize: number;
  md5: string;
  chunks: string[];
  deletedSource: boolean;
}

export interface UnpackResult {
  groupId: string;
  output: string;
  fileSize: number;
  /** Empty when the chunks carry no hash */
  md5: string;
  verified: boolean;
  chunkCount: number;
  deletedChunks: boolean;
  warnings: string[];
}

// CLI option shapes as commander hands them over

export interface PackCommandOptions {
  dir: string;
  key?: string;
  size?: string;
  delete?: boolean;
  md5?: boolean;
}

export interface UnpackCommandOptions {
  dir: string;
  key?: string;
  delete?: boolean;
  overwrite?: boolean;
}

export interface GenerateCommandOptions {
  output: string;
  length?: string;
  force?: boolean;
}
