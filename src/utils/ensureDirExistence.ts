import fs from 'fs';
import path from 'node:path';

/**
 * Create the parent directory of `filePath` when missing.
 * Returns true when a directory had to be created.
 */
export function ensureDirExistence(filePath: string): boolean {
    const dir = path.dirname(filePath);
    if (fs.existsSync(dir)) {
        return false;
    }
    fs.mkdirSync(dir, { recursive: true });
    return true;
}
