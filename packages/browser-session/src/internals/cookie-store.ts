import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  statSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@workspace/logger';
import type { Credentials } from './types.js';

const log = createLogger('CookieStore');

const storedCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string().default('/'),
  expires: z.number().default(-1),
  httpOnly: z.boolean().default(false),
  secure: z.boolean().default(false),
  sameSite: z.enum(['Strict', 'Lax', 'None']).default('Lax'),
});

const cookieBundleSchema = z.object({
  obtainedAt: z.number(),
  cookies: z.array(storedCookieSchema),
});

// A bare cookie list (as dumped by a browser context) is also accepted.
const cookieListSchema = z.array(storedCookieSchema);

/**
 * Persisted credential bundle, rewritten on every refresh.
 */
export class CookieStore {
  private readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  get location(): string {
    return this.path;
  }

  load(): Credentials | undefined {
    if (!existsSync(this.path)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (error) {
      log.warn(`Ignoring unreadable cookie file ${this.path}:`, error);
      return undefined;
    }

    const bundle = cookieBundleSchema.safeParse(raw);
    if (bundle.success) {
      return bundle.data;
    }

    const list = cookieListSchema.safeParse(raw);
    if (list.success) {
      return { cookies: list.data, obtainedAt: statSync(this.path).mtimeMs };
    }

    log.warn(`Ignoring malformed cookie file ${this.path}`);
    return undefined;
  }

  /**
   * Never throws: a write error is logged and `false` returned, so a login
   * that succeeded is still usable for the rest of the run.
   */
  save(credentials: Credentials): boolean {
    const tmpPath = `${this.path}.tmp`;

    try {
      const dir = dirname(this.path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      writeFileSync(tmpPath, JSON.stringify(credentials, null, 2), 'utf-8');
      renameSync(tmpPath, this.path);
    } catch (error) {
      log.error(`Could not save cookies to ${this.path}:`, error);
      return false;
    }

    log.info(`Saved ${credentials.cookies.length} cookies to ${this.path}`);
    return true;
  }
}

export { storedCookieSchema };
