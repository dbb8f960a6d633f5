import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { randomBytes } from 'crypto';
import { basename, dirname, join } from 'path';

// Write to a temp file beside the target, then rename over it. A crash leaves
// either the old file or the new one, never a truncated mix.
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
    const dir = dirname(filePath);
    await mkdir(dir, { recursive: true });

    const tempPath = join(dir, `.${basename(filePath)}.${randomBytes(6).toString('hex')}.tmp`);
    try {
        await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
        await rename(tempPath, filePath);
    } catch (error) {
        await unlink(tempPath).catch(() => undefined);
        throw error;
    }
}
