import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { TransportError } from '../src/errors.js';
import { httpPost } from '../src/http.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

function httpResponse(status: number, body: string) {
  return {
    ok: status >= 200 && status < 300,
    status,
    body: { cancel: vi.fn(() => Promise.resolve()) },
    text: vi.fn(() => Promise.resolve(body)),
  };
}

describe('httpPost', () => {
  it('posts the body with the content type and returns the response text', async () => {
    mockFetch.mockResolvedValueOnce(httpResponse(200, '<methodResponse/>'));

    const body = await httpPost('https://rpc.test/RPCSERV', 'text/xml', '<methodCall/>');

    expect(body).toBe('<methodResponse/>');
    expect(mockFetch).toHaveBeenCalledWith(
      'https://rpc.test/RPCSERV',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'text/xml' },
        body: '<methodCall/>',
      })
    );
    expect(mockFetch.mock.calls[0]![1].signal).toBeInstanceOf(AbortSignal);
  });

  it('throws a TransportError with the status and cancels the body', async () => {
    const res = httpResponse(500, 'Internal Server Error');
    mockFetch.mockResolvedValueOnce(res);

    const result = httpPost('https://rpc.test/RPCSERV', 'text/xml', '');

    await expect(result).rejects.toBeInstanceOf(TransportError);
    await expect(result).rejects.toThrow('Loopia: HTTP POST failed with status 500');
    await expect(result).rejects.toHaveProperty('kind', 'transport');
    await expect(result).rejects.toHaveProperty('status', 500);
    expect(res.body.cancel).toHaveBeenCalledTimes(1);
    expect(res.text).not.toHaveBeenCalled();
  });

  it('keeps the status error when cancelling the body fails', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 503,
      body: { cancel: () => Promise.reject(new Error('stream locked')) },
      text: vi.fn(),
    });

    const result = httpPost('https://rpc.test/RPCSERV', 'text/xml', '');

    await expect(result).rejects.toThrow('Loopia: HTTP POST failed with status 503');
    await expect(result).rejects.toHaveProperty('status', 503);
  });

  it('handles an error response without a body', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 502, body: null, text: vi.fn() });

    await expect(
      httpPost('https://rpc.test/RPCSERV', 'text/xml', '')
    ).rejects.toThrow('Loopia: HTTP POST failed with status 502');
  });

  it('treats other 2xx statuses as failures', async () => {
    mockFetch.mockResolvedValueOnce(httpResponse(204, ''));

    await expect(
      httpPost('https://rpc.test/RPCSERV', 'text/xml', '')
    ).rejects.toThrow('Loopia: HTTP POST failed with status 204');
  });

  it('wraps connection failures', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:443');
    mockFetch.mockRejectedValueOnce(cause);

    const result = httpPost('https://rpc.test/RPCSERV', 'text/xml', '');

    await expect(result).rejects.toBeInstanceOf(TransportError);
    await expect(result).rejects.toThrow(
      'Loopia: HTTP POST failed: connect ECONNREFUSED 127.0.0.1:443'
    );
    await expect(result).rejects.toHaveProperty('status', undefined);
    await expect(result).rejects.toHaveProperty('cause', cause);
  });

  it('wraps body read failures', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      text: () => Promise.reject(new Error('socket hang up')),
    });

    const result = httpPost('https://rpc.test/RPCSERV', 'text/xml', '');

    await expect(result).rejects.toBeInstanceOf(TransportError);
    await expect(result).rejects.toThrow(
      'Loopia: reading response body failed: socket hang up'
    );
    await expect(result).rejects.toHaveProperty('status', 200);
  });

  it('aborts the request after the timeout', async () => {
    mockFetch.mockImplementationOnce(
      (_url: string, init?: RequestInit) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () =>
            reject(new Error('request aborted'))
          );
        })
    );

    await expect(
      httpPost('https://rpc.test/RPCSERV', 'text/xml', '', { timeout: 5 })
    ).rejects.toThrow('Loopia: HTTP POST failed: request aborted');
  });

  it('uses an injected fetch instead of the global one', async () => {
    const customFetch = vi.fn().mockResolvedValueOnce(httpResponse(200, 'ok'));

    const body = await httpPost('https://rpc.test/RPCSERV', 'text/xml', '', {
      fetch: customFetch,
    });

    expect(body).toBe('ok');
    expect(customFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
