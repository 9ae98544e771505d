import fs from 'fs';
import path from 'path';

export interface RotateFileOptions {
  /** Directory where the file resides */
  dir: string;
  /** Base file name to rotate (e.g., app.log) */
  filename: string;
  /** Retention period in days (default: 7) */
  retentionDays?: number;
  /** Optional prefix for rotated files (defaults to filename without extension) */
  prefix?: string;
  /** Reference time, defaults to now */
  now?: Date;
}

export interface RotateFileResult {
  /** Path the file was moved to, if it was rotated */
  rotatedTo?: string;
  /** Rotated files deleted because they were past retention */
  deleted: string[];
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Renames the file with today's date (once per day) and deletes rotated
 * copies older than the retention period.
 */
export function rotateFile({
  dir,
  filename,
  retentionDays = 7,
  prefix,
  now = new Date(),
}: RotateFileOptions): RotateFileResult {
  const result: RotateFileResult = { deleted: [] };
  if (!fs.existsSync(dir)) {
    return result;
  }

  const today = now.toISOString().split('T')[0];
  const ext = path.extname(filename);
  const base = prefix || path.basename(filename, ext);

  const sourcePath = path.join(dir, filename);
  const rotatedPath = path.join(dir, `${base}-${today}${ext}`);

  if (fs.existsSync(sourcePath) && !fs.existsSync(rotatedPath)) {
    fs.renameSync(sourcePath, rotatedPath);
    result.rotatedTo = rotatedPath;
  }

  const pattern = new RegExp(`^${escapeRegExp(base)}-(\\d{4}-\\d{2}-\\d{2})${escapeRegExp(ext)}$`);
  const cutoff = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;

  for (const file of fs.readdirSync(dir)) {
    const match = file.match(pattern);
    if (!match) continue;

    const date = new Date(match[1]);
    if (!isNaN(date.getTime()) && date.getTime() < cutoff) {
      fs.unlinkSync(path.join(dir, file));
      result.deleted.push(file);
    }
  }

  return result;
}
