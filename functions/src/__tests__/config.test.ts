import {
  loadCorsConfig,
  loadRateLimitConfig,
  loadServerConfig,
  loadStoreConfig,
  loadUpdatePolicyConfig,
} from '../config';

describe('config loaders', () => {
  it('defaults to the Firestore driver', () => {
    expect(loadStoreConfig({})).toEqual({ driver: 'firestore' });
    expect(loadStoreConfig({ STORE_DRIVER: 'sqlite' })).toEqual({ driver: 'firestore' });
    expect(loadStoreConfig({ STORE_DRIVER: ' Memory ' })).toEqual({ driver: 'memory' });
  });

  it('rejects blank references unless told to ignore them', () => {
    expect(loadUpdatePolicyConfig({})).toEqual({ blankReferencePolicy: 'reject' });
    expect(loadUpdatePolicyConfig({ BLANK_REFERENCE_POLICY: 'IGNORE' })).toEqual({
      blankReferencePolicy: 'ignore',
    });
  });

  it('splits and trims allowed origins', () => {
    expect(
      loadCorsConfig({
        ALLOWED_ORIGINS: 'https://sitters.example.com, https://admin.example.com,,',
        NODE_ENV: 'production',
      }),
    ).toEqual({
      allowedOrigins: ['https://sitters.example.com', 'https://admin.example.com'],
      isDevelopment: false,
    });
    expect(loadCorsConfig({})).toEqual({ allowedOrigins: [], isDevelopment: true });
  });

  it('falls back to defaults for missing or invalid numbers', () => {
    expect(loadRateLimitConfig({})).toEqual({ windowMs: 900000, max: 300 });
    expect(loadRateLimitConfig({ RATE_LIMIT_WINDOW_MS: '60000', RATE_LIMIT_MAX: '-3' })).toEqual({
      windowMs: 60000,
      max: 300,
    });
    expect(loadServerConfig({ PORT: 'abc' })).toEqual({ port: 8080 });
    expect(loadServerConfig({ PORT: '3001' })).toEqual({ port: 3001 });
  });
});
