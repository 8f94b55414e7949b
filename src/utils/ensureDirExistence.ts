import fs from 'fs';
import path from 'node:path';

/**
 * Creates the directory that will hold `filePath`, if it is missing.
 */
export function ensureDirExistence(filePath: string) {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
        console.warn(`[Warning] folder does not exist at ${dir}, creating it`);
        fs.mkdirSync(dir, { recursive: true });
    }
}
