import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { describeError } from './errors';
import type { SessionStore, SessionTokens } from './session';

const storedTokensSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
});

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Persists session tokens as a JSON file readable only by the current user.
 */
export class FileSessionStore implements SessionStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<SessionTokens | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Session file ${this.filePath} is malformed: ${describeError(error)}`, { cause: error });
    }

    const parsed = storedTokensSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Session file ${this.filePath} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async save(tokens: SessionTokens): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(tokens), { encoding: 'utf8', mode: 0o600 });
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
