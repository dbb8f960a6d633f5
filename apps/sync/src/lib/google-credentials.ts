import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { YouTubeAuthError } from './youtube-errors';

export interface GoogleClientCredentials {
    clientId: string;
    clientSecret: string;
}

const clientBlockSchema = z.object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
});

// Shape of the file the Google Cloud console downloads
const clientSecretsSchema = z.union([
    z.object({ installed: clientBlockSchema }).transform(file => file.installed),
    z.object({ web: clientBlockSchema }).transform(file => file.web),
]);

export const CLIENT_SECRETS_FILE = 'client_secrets.json';

/**
 * Environment first; otherwise `client_secrets.json` in the data directory.
 */
export async function loadGoogleCredentials(
    env: { GOOGLE_CLIENT_ID?: string; GOOGLE_CLIENT_SECRET?: string },
    dataDir: string
): Promise<GoogleClientCredentials> {
    if (env.GOOGLE_CLIENT_ID && env.GOOGLE_CLIENT_SECRET) {
        return { clientId: env.GOOGLE_CLIENT_ID, clientSecret: env.GOOGLE_CLIENT_SECRET };
    }

    const secretsPath = join(dataDir, CLIENT_SECRETS_FILE);
    let raw: string;
    try {
        raw = await readFile(secretsPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new YouTubeAuthError(
                'OAuth credentials not found. Set GOOGLE_CLIENT_ID/GOOGLE_CLIENT_SECRET ' +
                `or provide ${CLIENT_SECRETS_FILE}`
            );
        }
        throw error;
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch {
        throw new YouTubeAuthError(`${CLIENT_SECRETS_FILE} is not valid JSON`);
    }

    const parsed = clientSecretsSchema.safeParse(data);
    if (!parsed.success) {
        throw new YouTubeAuthError(`${CLIENT_SECRETS_FILE} has no installed or web client block`);
    }
    return { clientId: parsed.data.client_id, clientSecret: parsed.data.client_secret };
}
