import { describe, expect, it } from 'vitest';
import { ConfigurationError, loadConfig, redactSecrets } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      TAIGA_BASE_URL: undefined,
      TAIGA_USERNAME: undefined,
      TAIGA_PASSWORD: undefined,
      TAIGA_REQUEST_TIMEOUT_MS: 30000,
      ACTION_PROXY_API_KEY: undefined,
      IDEMPOTENCY_TTL_SECONDS: 86400,
      IDEMPOTENCY_MAX_ENTRIES: 10000,
      PORT: 8000,
      HOST: '0.0.0.0',
      ALLOWED_HOSTS: [],
    });
  });

  it('reads explicit values', () => {
    const config = loadConfig({
      TAIGA_BASE_URL: 'https://taiga.test/api/v1',
      TAIGA_USERNAME: 'bot',
      TAIGA_PASSWORD: 'test-secret',
      ACTION_PROXY_API_KEY: 'test-key',
      IDEMPOTENCY_TTL_SECONDS: '60',
      PORT: '9000',
      ALLOWED_HOSTS: 'localhost:9000, gateway.test ,',
    });

    expect(config).toMatchObject({
      TAIGA_BASE_URL: 'https://taiga.test/api/v1',
      TAIGA_USERNAME: 'bot',
      TAIGA_PASSWORD: 'test-secret',
      ACTION_PROXY_API_KEY: 'test-key',
      IDEMPOTENCY_TTL_SECONDS: 60,
      PORT: 9000,
      ALLOWED_HOSTS: ['localhost:9000', 'gateway.test'],
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ TAIGA_BASE_URL: '', ACTION_PROXY_API_KEY: '' });

    expect(config.TAIGA_BASE_URL).toBeUndefined();
    expect(config.ACTION_PROXY_API_KEY).toBeUndefined();
  });

  it('lists every invalid variable', () => {
    let error: unknown;
    try {
      loadConfig({ TAIGA_BASE_URL: 'not a url', PORT: '70000' });
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      problems: [
        '  - TAIGA_BASE_URL: TAIGA_BASE_URL must be a valid URL',
        '  - PORT: PORT must be an integer between 1 and 65535',
      ],
    });
  });
});

describe('redactSecrets', () => {
  it('masks registered secrets and bearer tokens', () => {
    const text = 'login test-secret failed; header Authorization: Bearer abc.def-123';

    expect(redactSecrets(text, ['test-secret'])).toBe(
      'login ***REDACTED*** failed; header Authorization: Bearer ***REDACTED_TOKEN***'
    );
  });

  it('escapes secrets containing regex characters', () => {
    expect(redactSecrets('key=a+b(c)', ['a+b(c)'])).toBe('key=***REDACTED***');
  });

  it('ignores empty secrets', () => {
    expect(redactSecrets('nothing to hide', [''])).toBe('nothing to hide');
  });
});
