import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AuthRejectedError } from '@workspace/browser-session';
import { createLogger } from '@workspace/logger';
import { loadConfig } from '../config/config.js';
import { UnexpectedStatusError } from '../errors.js';
import type { ExecutionRequest } from '../executor/types.js';
import { StatusLedger } from '../pipeline/status-ledger.js';
import { FakeSessionProvider, fakeCredentials } from '../testing/fakes.js';
import { routeAdapter, type RouteResponse } from '../testing/http.js';
import {
  HttpContextFactory,
  type HttpExecutionContext,
} from '../web-engine/http-context.js';
import { runStage } from './run-stage.js';
import { TitleFetchExecutor, documentUrl, titlesStage, writeTitlesTable } from './titles.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-titles');
const BASE_URL = 'https://example.org/';

const log = createLogger('TitlesTest');

async function contextAnswering(response: RouteResponse): Promise<HttpExecutionContext> {
  const factory = new HttpContextFactory({ adapter: routeAdapter(() => response) });
  return factory.create(fakeCredentials('initial'));
}

function request(context: HttpExecutionContext): ExecutionRequest<HttpExecutionContext> {
  return {
    context,
    signal: new AbortController().signal,
    stagingPath: TEST_DIR,
    attempt: 1,
    log,
  };
}

const doc = { unitKey: '2-s2.0-1', attributes: {} };

describe('TitleFetchExecutor', () => {
  const executor = new TitleFetchExecutor(BASE_URL);

  it('builds the document-details url', () => {
    expect(documentUrl(BASE_URL, '2-s2.0-1')).toBe(
      'https://example.org/gateway/doc-details/documents/2-s2.0-1',
    );
  });

  it('returns the first title as text', async () => {
    const context = await contextAnswering({
      status: 200,
      body: '{"titles":["  Graph Theory  ","Théorie des graphes"]}',
    });

    await expect(executor.execute(doc, request(context))).resolves.toEqual({
      status: 'success',
      artifact: { kind: 'text', content: 'Graph Theory' },
    });
  });

  it('is empty on 404', async () => {
    const context = await contextAnswering({ status: 404, body: '{}' });

    await expect(executor.execute(doc, request(context))).resolves.toEqual({
      status: 'empty',
      reason: '404 Not Found',
    });
  });

  it('is empty when the document has no title', async () => {
    const context = await contextAnswering({ status: 200, body: '{"titles":[]}' });

    await expect(executor.execute(doc, request(context))).resolves.toEqual({
      status: 'empty',
      reason: 'Title not found',
    });
  });

  it.each([401, 403])('throws AuthRejectedError on %i', async (status) => {
    const context = await contextAnswering({ status, body: '' });

    await expect(executor.execute(doc, request(context))).rejects.toBeInstanceOf(
      AuthRejectedError,
    );
  });

  it('treats a login page served with 200 as an auth rejection', async () => {
    const context = await contextAnswering({ status: 200, body: '<html>Sign in</html>' });

    await expect(executor.execute(doc, request(context))).rejects.toThrow(
      'Document lookup returned a non-JSON page',
    );
  });

  it('fails on an unexpected payload', async () => {
    const context = await contextAnswering({ status: 200, body: '{"titles":"Graph Theory"}' });

    await expect(executor.execute(doc, request(context))).resolves.toEqual({
      status: 'failure',
      reason: 'Unexpected document payload',
    });
  });

  it('raises a retryable error on other statuses', async () => {
    const context = await contextAnswering({ status: 400, body: '{}' });

    const error = await executor.execute(doc, request(context)).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toHaveProperty('message', 'Unexpected HTTP 400');
  });
});

describe('writeTitlesTable', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('adds fetched titles and keeps the other columns', async () => {
    const input = join(TEST_DIR, 'eid.csv');
    const output = join(TEST_DIR, 'eid_with_titles.csv');
    writeFileSync(input, 'EID,Abstract,Year\nE1,"x, y",2020\nE2,z,2021\n');
    const ledger = new StatusLedger({
      root: join(TEST_DIR, 'title_downloads'),
      unitColumn: 'EID',
      artifactExtension: '.txt',
    });
    const fetched = { unitKey: 'E1', attributes: {} };
    ledger.ensureLocation(fetched);
    writeFileSync(ledger.artifactPath(fetched), 'Graph "Theory"\n');
    ledger.markSuccess(fetched);

    const written = await writeTitlesTable(input, output, ledger);

    expect(written).toBe(2);
    expect(readFileSync(output, 'utf-8')).toBe(
      'EID,Abstract,Year,Title\nE1,"x, y",2020,"Graph ""Theory"""\nE2,z,2021,\n',
    );
    expect(existsSync(`${output}.tmp`)).toBe(false);
  });

  it('does nothing without the input table', async () => {
    const ledger = new StatusLedger({
      root: join(TEST_DIR, 'title_downloads'),
      unitColumn: 'EID',
      artifactExtension: '.txt',
    });

    await expect(
      writeTitlesTable(join(TEST_DIR, 'eid.csv'), join(TEST_DIR, 'out.csv'), ledger),
    ).resolves.toBe(0);
    expect(existsSync(join(TEST_DIR, 'out.csv'))).toBe(false);
  });
});

describe('titles stage run', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('fetches titles, refreshes the session once and writes both tables', async () => {
    writeFileSync(
      join(TEST_DIR, 'eid.csv'),
      'EID,Abstract,Year\nE1,one,2020\nE2,two,2021\nE3,three,2022\n',
    );
    const provider = new FakeSessionProvider();
    const contextFactory = new HttpContextFactory({
      adapter: routeAdapter(({ url, cookie }) => {
        if (url.endsWith('/E1')) {
          return { status: 200, body: '{"titles":["First Paper"]}' };
        }
        if (url.endsWith('/E2')) {
          return { status: 404, body: '{}' };
        }
        return cookie === 'session=initial'
          ? { status: 403, body: '' }
          : { status: 200, body: '{"titles":["Third Paper"]}' };
      }),
    });
    const config = loadConfig({}, { dataDir: TEST_DIR });

    const summary = await runStage(titlesStage, config, {
      provider,
      contextFactory,
      scheduler: { handleSignals: false, retryDelayMs: 0 },
    });

    expect(summary).toMatchObject({ total: 3, success: 2, empty: 1, fail: 0 });
    expect(provider.logins).toBe(1);
    expect(provider.refreshes).toBe(1);
    expect(readFileSync(join(TEST_DIR, 'title_downloads', 'status.csv'), 'utf-8')).toBe(
      'EID,Status\nE1,success\nE2,empty\nE3,success\n',
    );
    expect(readFileSync(join(TEST_DIR, 'eid_with_titles.csv'), 'utf-8')).toBe(
      'EID,Abstract,Year,Title\nE1,one,2020,First Paper\nE2,two,2021,\nE3,three,2022,Third Paper\n',
    );
  });

  it('rewrites the titles table even when every unit is already done', async () => {
    writeFileSync(join(TEST_DIR, 'eid.csv'), 'EID\nE1\n');
    const config = loadConfig({}, { dataDir: TEST_DIR });
    const ledger = new StatusLedger(titlesStage.layout(config));
    ledger.ensureLocation({ unitKey: 'E1', attributes: {} });
    ledger.markEmpty({ unitKey: 'E1', attributes: {} });
    const provider = new FakeSessionProvider();

    const summary = await runStage(titlesStage, config, {
      provider,
      scheduler: { handleSignals: false },
    });

    expect(summary.skipped).toBe(1);
    expect(provider.logins).toBe(0);
    expect(readFileSync(join(TEST_DIR, 'eid_with_titles.csv'), 'utf-8')).toBe('EID,Title\nE1,\n');
  });

  it('is a no-op without an input table', async () => {
    const provider = new FakeSessionProvider();
    const config = loadConfig({}, { dataDir: TEST_DIR });

    const summary = await runStage(titlesStage, config, { provider });

    expect(summary.total).toBe(0);
    expect(provider.logins).toBe(0);
    expect(existsSync(join(TEST_DIR, 'title_downloads'))).toBe(false);
    expect(existsSync(join(TEST_DIR, 'eid_with_titles.csv'))).toBe(false);
  });
});
