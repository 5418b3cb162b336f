/**
 * Unit tests for the Channel API
 *
 * The API listens on an ephemeral loopback port for the duration of each test.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { ChannelAPI } from '../../src/channel-api';
import { ChannelRegistry } from '../../src/channels/channel-registry';
import { createAgentLogger } from '../../src/logging/agent-logger';

describe('ChannelAPI', () => {
  let registry: ChannelRegistry;
  let api: ChannelAPI;
  let http: AxiosInstance;
  let writes: unknown[];

  beforeEach(async () => {
    writes = [];
    registry = new ChannelRegistry();
    registry.create('SPARC:CONTROL:IOCMNG:IOC_TOTAL', { type: 'int', initial: 3 });
    registry.create('SPARC:CONTROL:IOCMNG:ENABLE', {
      type: 'bool',
      initial: true,
      writable: true,
      onUpdate: (value) => writes.push(value),
    });

    api = new ChannelAPI(registry, createAgentLogger({ silent: true }));
    const port = await api.listen(0, '127.0.0.1');
    http = axios.create({
      baseURL: `http://127.0.0.1:${port}`,
      validateStatus: () => true,
    });
  });

  afterEach(async () => {
    await api.stop();
  });

  it('answers ping', async () => {
    const response = await http.get('/ping');

    expect(response.status).toBe(200);
    expect(response.data).toBe('OK');
  });

  it('lists channels with their values', async () => {
    const response = await http.get('/v1/channels');

    expect(response.status).toBe(200);
    expect(response.data).toEqual([
      { name: 'SPARC:CONTROL:IOCMNG:ENABLE', type: 'bool', value: true, writable: true },
      { name: 'SPARC:CONTROL:IOCMNG:IOC_TOTAL', type: 'int', value: 3, writable: false },
    ]);
  });

  it('reads a single channel', async () => {
    const response = await http.get('/v1/channels/SPARC:CONTROL:IOCMNG:IOC_TOTAL');

    expect(response.status).toBe(200);
    expect(response.data.value).toBe(3);
  });

  it('returns 404 for unknown channels', async () => {
    const response = await http.get('/v1/channels/SPARC:CONTROL:NOPE');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ error: 'Not found', message: 'Channel not found: SPARC:CONTROL:NOPE' });
  });

  it('delivers writes to writable channels', async () => {
    const response = await http.put('/v1/channels/SPARC:CONTROL:IOCMNG:ENABLE', { value: 0 });

    expect(response.status).toBe(200);
    expect(response.data.value).toBe(false);
    expect(registry.get('SPARC:CONTROL:IOCMNG:ENABLE').value).toBe(false);
    expect(writes).toEqual([false]);
  });

  it('refuses writes to read-only channels', async () => {
    const response = await http.put('/v1/channels/SPARC:CONTROL:IOCMNG:IOC_TOTAL', { value: 5 });

    expect(response.status).toBe(403);
    expect(registry.get('SPARC:CONTROL:IOCMNG:IOC_TOTAL').value).toBe(3);
  });

  it('rejects values of the wrong type', async () => {
    const response = await http.put('/v1/channels/SPARC:CONTROL:IOCMNG:ENABLE', { value: 'maybe' });

    expect(response.status).toBe(400);
    expect(response.data.error).toBe('Bad request');
    expect(writes).toEqual([]);
  });

  it('requires a value in the body', async () => {
    const response = await http.put('/v1/channels/SPARC:CONTROL:IOCMNG:ENABLE', { level: 1 });

    expect(response.status).toBe(400);
    expect(response.data.message).toBe('Request body must contain a value');
  });
});
