import fs from 'fs';
import path from 'path';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RotateFileOptions {
  /** Directory where the file resides */
  dir: string;
  /** Base file name to rotate (e.g., app.log) */
  filename: string;
  /** Retention period in days (default: 7) */
  retentionDays?: number;
  /** Optional prefix for rotated files (defaults to filename without extension) */
  prefix?: string;
  /** Reference time for the rotation date and the retention cutoff */
  now?: Date;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Renames the file to <prefix>-YYYY-MM-DD<ext> and deletes rotated copies
 * older than the retention period. Returns the names that were deleted.
 */
export function rotateFile({
  dir,
  filename,
  retentionDays = 7,
  prefix,
  now = new Date(),
}: RotateFileOptions): string[] {
  const today = now.toISOString().slice(0, 10);
  const ext = path.extname(filename);
  const base = prefix || path.basename(filename, ext);

  const sourcePath = path.join(dir, filename);
  const rotatedPath = path.join(dir, `${base}-${today}${ext}`);

  // one rotation per day; a second run appends to the live file
  if (fs.existsSync(sourcePath) && !fs.existsSync(rotatedPath)) {
    fs.renameSync(sourcePath, rotatedPath);
  }

  const pattern = new RegExp(`^${escapeRegExp(base)}-(\\d{4}-\\d{2}-\\d{2})${escapeRegExp(ext)}$`);
  const cutoff = now.getTime() - retentionDays * DAY_MS;
  const deleted: string[] = [];

  for (const file of fs.readdirSync(dir)) {
    const match = pattern.exec(file);
    if (!match) continue;

    const rotatedAt = new Date(match[1]).getTime();
    if (!Number.isNaN(rotatedAt) && rotatedAt < cutoff) {
      fs.unlinkSync(path.join(dir, file));
      deleted.push(file);
    }
  }

  return deleted;
}
