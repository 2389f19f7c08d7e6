import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createOAuth2Client, isTokenExpired } from '../src/store/google/auth.js';
import { loadConfig } from '../src/utils/config.js';

describe('loadConfig', () => {
  beforeEach(() => {
    vi.stubEnv('STORE_BACKEND', 'google');
    vi.stubEnv('GOOGLE_CLIENT_ID', 'test-client');
    vi.stubEnv('GOOGLE_CLIENT_SECRET', 'test-secret');
    vi.stubEnv('GOOGLE_ACCESS_TOKEN', '');
    vi.stubEnv('GOOGLE_REFRESH_TOKEN', '');
    vi.stubEnv('GOOGLE_TOKEN_EXPIRY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('keeps a refresh token configured without an access token', () => {
    vi.stubEnv('GOOGLE_REFRESH_TOKEN', 'test-refresh');

    const { store } = loadConfig();
    expect(store.type).toBe('google');
    if (store.type !== 'google') return;
    expect(store.credentials).toEqual({
      accessToken: undefined,
      refreshToken: 'test-refresh',
      tokenExpiry: undefined,
    });

    const client = createOAuth2Client(store);
    expect(client.credentials.refresh_token).toBe('test-refresh');
    expect(isTokenExpired(client)).toBe(true);
  });

  it('leaves credentials unset when neither token is present', () => {
    const { store } = loadConfig();
    expect(store.type === 'google' ? store.credentials : 'not google').toBeUndefined();
  });

  it('selects the memory backend', () => {
    vi.stubEnv('STORE_BACKEND', 'memory');
    expect(loadConfig().store).toEqual({ type: 'memory', id: 'memory', name: 'In-memory store' });
  });
});
