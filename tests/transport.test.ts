import axios, { type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { createAxiosTransport } from '../src/client/transport';

const respondWith = (status: number) =>
  vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
    data: '',
    status,
    statusText: '',
    headers: {},
    config
  }));

describe('createAxiosTransport', () => {
  it('resolves with non-2xx statuses instead of throwing', async () => {
    const adapter = respondWith(429);
    const transport = createAxiosTransport({ timeoutMs: 1234, instance: axios.create({ adapter }) });

    await expect(transport({
      url: 'https://my-func.example.test/?coldstart',
      headers: { Authorization: 'Bearer test-token' }
    })).resolves.toEqual({ status: 429 });
  });

  it('sends a GET with the auth header and configured timeout', async () => {
    const adapter = respondWith(200);
    const transport = createAxiosTransport({ timeoutMs: 1234, instance: axios.create({ adapter }) });

    await transport({ url: 'https://my-func.example.test/', headers: { Authorization: 'Bearer test-token' } });

    expect(adapter).toHaveBeenCalledTimes(1);
    const [config] = adapter.mock.calls[0];
    expect(config.method).toBe('get');
    expect(config.url).toBe('https://my-func.example.test/');
    expect(config.timeout).toBe(1234);
    expect(config.headers.get('Authorization')).toBe('Bearer test-token');
  });

  it('rejects when no response arrives', async () => {
    const adapter = vi.fn(async (): Promise<AxiosResponse> => {
      throw new Error('socket hang up');
    });
    const transport = createAxiosTransport({ timeoutMs: 0, instance: axios.create({ adapter }) });

    await expect(transport({ url: 'https://my-func.example.test/', headers: {} })).rejects.toThrow('socket hang up');
  });
});
