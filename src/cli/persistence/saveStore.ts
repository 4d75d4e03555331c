import fs from 'fs';
import path from 'path';
import { parseSaveRecord } from '../../shared/engine/saveRecord';
import type { SaveRecord } from '../../shared/validation/schemas';

/**
 * File-backed save slots. One JSON record per file; relative names resolve
 * against the configured save directory.
 */

export const SAVE_FILE_EXTENSION = '.json';

export function resolveSavePath(name: string, directory: string): string {
  const withExtension = path.extname(name) ? name : `${name}${SAVE_FILE_EXTENSION}`;
  return path.resolve(directory, withExtension);
}

export function writeSaveFile(filePath: string, record: SaveRecord): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(record, null, 2)}\n`, 'utf8');
}

/**
 * @throws SaveRecordError when the file content is not a valid record
 */
export function readSaveFile(filePath: string): SaveRecord {
  return parseSaveRecord(fs.readFileSync(filePath, 'utf8'));
}
