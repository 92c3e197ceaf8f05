import fs from 'fs';
import path from 'path';

/**
 * Creates the parent directory of a file path when it is missing
 */
export function ensureDirExistence(filePath: string): void {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
        console.warn(`[Warning] folder does not exist at ${dir}, creating it`);
        fs.mkdirSync(dir, { recursive: true });
    }
}
