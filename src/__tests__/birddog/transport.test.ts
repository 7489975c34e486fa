/**
 * BirdDog HTTPS Transport Tests
 *
 * The default transport: a per-client undici Agent carrying the TLS floor,
 * passed to fetch as the dispatcher and released by close().
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { Response, fetch as undiciFetch } from 'undici';
import { BirdDogClient } from '../../integrations/birddog/index.js';
import type { BirdDogLogger, FetchLike } from '../../integrations/birddog/index.js';

jest.mock('undici', () => {
  const actual = jest.requireActual<typeof import('undici')>('undici');

  class RecordingAgent {
    options: unknown;
    close = jest.fn(async () => undefined);

    constructor(options: unknown) {
      this.options = options;
    }
  }

  return { ...actual, Agent: RecordingAgent, fetch: jest.fn() };
});

const logger: BirdDogLogger = {
  log: jest.fn<BirdDogLogger['log']>(),
  error: jest.fn<BirdDogLogger['error']>(),
};

describe('BirdDogClient transport', () => {
  const fetchMock = jest.mocked(undiciFetch);

  beforeEach(() => {
    fetchMock.mockReset();
    fetchMock.mockImplementation(async () => new Response('{"TalentUsers":[]}', { status: 200 }));
  });

  it('should send requests through an agent with the configured TLS floor', async () => {
    const client = new BirdDogClient({ minTlsVersion: 'TLSv1.3', logger });

    await client.listTalentUsers({ accessToken: 'test-token' });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.birddoghr.com/v2/TalentUsers');
    expect(init?.dispatcher).toMatchObject({ options: { connect: { minVersion: 'TLSv1.3' } } });
  });

  it('should default the TLS floor to 1.2', async () => {
    const client = new BirdDogClient({ logger });

    await client.listTalentUsers({ accessToken: 'test-token' });

    const init = fetchMock.mock.calls[0][1];
    expect(init?.dispatcher).toMatchObject({ options: { connect: { minVersion: 'TLSv1.2' } } });
  });

  it('should give each client its own agent', async () => {
    const first = new BirdDogClient({ logger });
    const second = new BirdDogClient({ minTlsVersion: 'TLSv1.3', logger });

    await first.listTalentUsers({ accessToken: 'test-token' });
    await second.listTalentUsers({ accessToken: 'test-token' });

    expect(fetchMock.mock.calls[0][1]?.dispatcher).not.toBe(fetchMock.mock.calls[1][1]?.dispatcher);
  });

  it('should close the agent on close()', async () => {
    const client = new BirdDogClient({ logger });
    await client.listTalentUsers({ accessToken: 'test-token' });
    const dispatcher = fetchMock.mock.calls[0][1]?.dispatcher;

    await client.close();

    expect(dispatcher?.close).toHaveBeenCalledTimes(1);
  });

  it('should not build an agent when a fetch is injected', async () => {
    const injected = jest.fn<FetchLike>().mockResolvedValue({
      ok: true,
      status: 200,
      statusText: 'OK',
      text: async () => '{"TalentUsers":[]}',
    });
    const client = new BirdDogClient({ fetch: injected, logger });

    await client.listTalentUsers({ accessToken: 'test-token' });
    await client.close();

    expect(injected).toHaveBeenCalledTimes(1);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
