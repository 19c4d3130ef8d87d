/**
 * Local File Source
 * Reads documentation from text and markdown files on disk
 */

import { readFile, stat } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';

export const TEXT_EXTENSIONS = ['.md', '.markdown', '.txt'];

export interface LocalFileReader {
  /**
   * File contents, or null when the input is not a readable local document
   */
  read(input: string): Promise<string | null>;
}

/**
 * `file://` URLs and plain paths become filesystem paths; anything else is null
 */
export function toLocalPath(input: string): string | null {
  if (input.startsWith('file://')) {
    try {
      return fileURLToPath(input);
    } catch {
      return null;
    }
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(input)) {
    return null;
  }
  return input;
}

export class TextFileReader implements LocalFileReader {
  constructor(private readonly extensions: readonly string[] = TEXT_EXTENSIONS) {}

  supports(filePath: string): boolean {
    return this.extensions.includes(path.extname(filePath).toLowerCase());
  }

  async read(input: string): Promise<string | null> {
    const filePath = toLocalPath(input);
    if (!filePath || !this.supports(filePath)) {
      return null;
    }

    try {
      const info = await stat(filePath);
      if (!info.isFile()) {
        return null;
      }
      const content = await readFile(filePath, 'utf8');
      console.log(`📄 Read local file: ${filePath}`);
      return content;
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT') {
        console.warn(`⚠️  Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
      }
      return null;
    }
  }
}

export const textFileReader = new TextFileReader();
