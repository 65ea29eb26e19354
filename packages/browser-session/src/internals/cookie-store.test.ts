import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { CookieStore } from './cookie-store.js';
import type { Credentials } from './types.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-cookie-store');
const COOKIES_PATH = join(TEST_DIR, 'cookies.json');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

const credentials: Credentials = {
  obtainedAt: 1_700_000_000_000,
  cookies: [
    {
      name: 'ezproxy',
      value: 'test-session',
      domain: '.example.org',
      path: '/',
      expires: -1,
      httpOnly: true,
      secure: true,
      sameSite: 'Lax',
    },
  ],
};

describe('CookieStore', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('returns undefined when no file exists', () => {
    const store = new CookieStore(COOKIES_PATH);
    expect(store.load()).toBeUndefined();
  });

  it('save and load round-trip', () => {
    const store = new CookieStore(COOKIES_PATH);
    expect(store.save(credentials)).toBe(true);

    expect(store.load()).toEqual(credentials);
    expect(existsSync(`${COOKIES_PATH}.tmp`)).toBe(false);
  });

  it('creates the parent directory on save', () => {
    const nested = join(TEST_DIR, 'nested', 'cookies.json');
    const store = new CookieStore(nested);
    store.save(credentials);

    expect(existsSync(nested)).toBe(true);
  });

  it('reports a failed save instead of throwing', () => {
    writeFileSync(join(TEST_DIR, 'blocker'), 'not a directory', 'utf-8');
    const store = new CookieStore(join(TEST_DIR, 'blocker', 'cookies.json'));

    expect(store.save(credentials)).toBe(false);
    expect(store.load()).toBeUndefined();
  });

  it('accepts a bare cookie list and fills defaults', () => {
    writeFileSync(
      COOKIES_PATH,
      JSON.stringify([{ name: 'a', value: 'b', domain: 'example.org' }]),
      'utf-8',
    );

    const loaded = new CookieStore(COOKIES_PATH).load();

    expect(loaded?.cookies).toEqual([
      {
        name: 'a',
        value: 'b',
        domain: 'example.org',
        path: '/',
        expires: -1,
        httpOnly: false,
        secure: false,
        sameSite: 'Lax',
      },
    ]);
    expect(loaded?.obtainedAt).toBeTypeOf('number');
  });

  it('treats invalid JSON as absent', () => {
    writeFileSync(COOKIES_PATH, '{not json', 'utf-8');
    expect(new CookieStore(COOKIES_PATH).load()).toBeUndefined();
  });

  it('treats a malformed bundle as absent', () => {
    writeFileSync(COOKIES_PATH, JSON.stringify({ cookies: 'nope' }), 'utf-8');
    expect(new CookieStore(COOKIES_PATH).load()).toBeUndefined();
  });
});
