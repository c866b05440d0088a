// src/utils/dataset/tabularFiles.ts
import fs from 'fs';
import path from 'path';

/**
 * Lists every file under `dir` (recursively) whose extension matches `extension`,
 * case-insensitively, sorted by path. A missing directory yields an empty list.
 */
export async function findTabularFiles(dir: string, extension: string): Promise<string[]> {
    const wanted = extension.toLowerCase();
    const found: string[] = [];

    const walk = async (current: string): Promise<void> => {
        let entries: fs.Dirent[];
        try {
            entries = await fs.promises.readdir(current, { withFileTypes: true });
        } catch (error: unknown) {
            if (isErrnoCode(error, 'ENOENT')) return;
            throw error;
        }
        for (const entry of entries) {
            const fullPath = path.join(current, entry.name);
            if (entry.isDirectory()) {
                await walk(fullPath);
            } else if (entry.isFile() && path.extname(entry.name).toLowerCase() === wanted) {
                found.push(fullPath);
            }
        }
    };

    await walk(dir);
    return found.sort();
}

// fs errors may come from another realm (e.g. under Jest), so `instanceof Error` is not reliable here.
const isErrnoCode = (error: unknown, code: string): boolean =>
    typeof error === 'object' && error !== null && 'code' in error && error.code === code;
