import { describe, it, expect } from 'vitest';
import { createLoopiaClient } from '../src/client.js';
import { loadLoopiaConfig } from '../src/config.js';

const credentials = {
  LOOPIA_API_USER: 'user@loopiaapi',
  LOOPIA_API_PASSWORD: 'test-secret',
};

describe('loadLoopiaConfig', () => {
  it('loads credentials and applies defaults', () => {
    expect(loadLoopiaConfig(credentials)).toEqual({
      username: 'user@loopiaapi',
      password: 'test-secret',
      baseUrl: undefined,
      timeout: undefined,
      ttl: 300,
    });
  });

  it('reads the optional settings', () => {
    const config = loadLoopiaConfig({
      ...credentials,
      LOOPIA_API_URL: 'https://rpc.test/RPCSERV',
      LOOPIA_HTTP_TIMEOUT: '2.5',
      LOOPIA_TTL: '600',
    });

    expect(config).toEqual({
      username: 'user@loopiaapi',
      password: 'test-secret',
      baseUrl: 'https://rpc.test/RPCSERV',
      timeout: 2500,
      ttl: 600,
    });
  });

  it('ignores unrelated variables', () => {
    const config = loadLoopiaConfig({ ...credentials, HOME: '/root', PATH: '/usr/bin' });

    expect(config.username).toBe('user@loopiaapi');
  });

  it('lists every missing credential', () => {
    expect(() => loadLoopiaConfig({})).toThrow(
      'Loopia: missing required configuration: LOOPIA_API_USER, LOOPIA_API_PASSWORD'
    );
  });

  it('treats empty variables as unset', () => {
    expect(() =>
      loadLoopiaConfig({ LOOPIA_API_USER: 'user@loopiaapi', LOOPIA_API_PASSWORD: '' })
    ).toThrow('Loopia: missing required configuration: LOOPIA_API_PASSWORD');

    expect(loadLoopiaConfig({ ...credentials, LOOPIA_API_URL: '' }).baseUrl).toBeUndefined();
  });

  it('rejects a ttl below the minimum', () => {
    expect(() => loadLoopiaConfig({ ...credentials, LOOPIA_TTL: '120' })).toThrow(
      'Loopia: invalid configuration: LOOPIA_TTL: must be at least 300'
    );
  });

  it('rejects a timeout that is not a number', () => {
    expect(() => loadLoopiaConfig({ ...credentials, LOOPIA_HTTP_TIMEOUT: 'soon' })).toThrow(
      'Loopia: invalid configuration: LOOPIA_HTTP_TIMEOUT'
    );
  });

  it('produces options accepted by the client', () => {
    const { ttl: _ttl, ...options } = loadLoopiaConfig({
      ...credentials,
      LOOPIA_HTTP_TIMEOUT: '10',
    });

    expect(() => createLoopiaClient(options)).not.toThrow();
  });
});
