import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createFetcher, fetchDocument } from '../src/http.js';
import { HttpError, InvalidUrlError, NetworkError } from '../src/errors.js';
import type { Logger } from '../src/logger.js';

const ORIGIN = 'https://stats.example.org';

function recordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  } satisfies Logger;
}

async function catchAsync(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected a rejection');
}

describe('fetchDocument', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('returns the parsed JSON body', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/cube.json', method: 'GET' })
      .reply(200, { version: '2.0', class: 'dataset' }, { headers: { 'content-type': 'application/json' } });

    const doc = await fetchDocument(`${ORIGIN}/cube.json`, { dispatcher: agent });
    expect(doc).toEqual({ version: '2.0', class: 'dataset' });
  });

  it('fails with HttpError on a non-2xx status and logs it', async () => {
    agent.get(ORIGIN).intercept({ path: '/missing.json', method: 'GET' }).reply(404, 'gone');
    const logger = recordingLogger();

    const error = await catchAsync(fetchDocument(`${ORIGIN}/missing.json`, { dispatcher: agent, logger }));
    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 404, url: `${ORIGIN}/missing.json` });
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0][0]).toBe('HTTP error');
  });

  it('fails with NetworkError when the request cannot be made', async () => {
    agent.get(ORIGIN).intercept({ path: '/cube.json', method: 'GET' }).reply(200, {});

    const error = await catchAsync(fetchDocument(`${ORIGIN}/elsewhere.json`, { dispatcher: agent }));
    expect(error).toBeInstanceOf(NetworkError);
  });

  it('fails with NetworkError when the body is not JSON', async () => {
    agent.get(ORIGIN).intercept({ path: '/broken.json', method: 'GET' }).reply(200, 'not json');

    const error = await catchAsync(fetchDocument(`${ORIGIN}/broken.json`, { dispatcher: agent }));
    expect(error).toBeInstanceOf(NetworkError);
  });

  it('fails with InvalidUrlError for a malformed URL', async () => {
    const logger = recordingLogger();
    const error = await catchAsync(fetchDocument('not a url', { logger }));
    expect(error).toBeInstanceOf(InvalidUrlError);
    expect(logger.error.mock.calls[0][0]).toBe('URL error');
  });

  it('fails with InvalidUrlError for schemes it cannot fetch', async () => {
    expect(await catchAsync(fetchDocument('ftp://stats.example.org/cube.json'))).toBeInstanceOf(InvalidUrlError);
  });
});

describe('createFetcher', () => {
  it('binds options to every request', async () => {
    const agent = new MockAgent();
    agent.disableNetConnect();
    agent.get(ORIGIN).intercept({ path: '/a.json', method: 'GET' }).reply(200, [1, 2]);

    const fetcher = createFetcher({ dispatcher: agent });
    expect(await fetcher(`${ORIGIN}/a.json`)).toEqual([1, 2]);
    await agent.close();
  });
});
