import { envSchema } from './env';

describe('envSchema', () => {
  const base = { AGENT_JWT_SECRET: 'test-secret-for-agent-tokens' };

  it('applies numeric defaults', () => {
    const parsed = envSchema.parse(base);

    expect(parsed.PORT).toBe(3001);
    expect(parsed.AGENT_DISCOVERY_TIMEOUT_MS).toBe(5000);
    expect(parsed.AGENT_TOKEN_CACHE_SIZE).toBe(1000);
    expect(parsed.AGENT_SESSION_TIMEOUT_MINUTES).toBe(30);
  });

  it('coerces numeric strings', () => {
    const parsed = envSchema.parse({ ...base, AGENT_DISCOVERY_TIMEOUT_MS: '250' });

    expect(parsed.AGENT_DISCOVERY_TIMEOUT_MS).toBe(250);
  });

  it('rejects values that are not positive integers', () => {
    const result = envSchema.safeParse({
      ...base,
      AGENT_DISCOVERY_TIMEOUT_MS: 'abc',
      AGENT_TOKEN_CACHE_SIZE: '0',
      PORT: '80.5',
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors.map((err) => err.path.join('.')).sort()).toEqual([
        'AGENT_DISCOVERY_TIMEOUT_MS',
        'AGENT_TOKEN_CACHE_SIZE',
        'PORT',
      ]);
    }
  });
});
