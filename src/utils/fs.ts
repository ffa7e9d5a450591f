import { closeSync, fsyncSync, mkdirSync, openSync, renameSync, rmSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Write a file so that readers see either the previous content or the new
 * content, never a partial write: the data goes to a sibling temp file, is
 * flushed, then renamed over the target.
 */
export function writeFileAtomic(filePath: string, content: string): void {
    mkdirSync(dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;

    const fd = openSync(tmpPath, 'w');
    try {
        writeSync(fd, content, null, 'utf-8');
        fsyncSync(fd);
    } catch (error) {
        closeSync(fd);
        rmSync(tmpPath, { force: true });
        throw error;
    }
    closeSync(fd);

    renameSync(tmpPath, filePath);
}
