import { NodeEnvironment, validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
  it('converts numeric settings', () => {
    const env = validateEnvironment({
      NODE_ENV: 'test',
      GATEWAY_PORT: '4000',
      ATTEMPT_LOCK_RETRIES: '3',
      REDIS_HOST: 'redis',
    });

    expect(env.NODE_ENV).toBe(NodeEnvironment.TEST);
    expect(env.GATEWAY_PORT).toBe(4000);
    expect(env.ATTEMPT_LOCK_RETRIES).toBe(3);
    expect(env.REDIS_HOST).toBe('redis');
  });

  it('accepts an empty environment', () => {
    expect(() => validateEnvironment({})).not.toThrow();
  });

  it('lists every violated constraint', () => {
    expect(() =>
      validateEnvironment({ NODE_ENV: 'staging', GATEWAY_PORT: '70000' }),
    ).toThrow(
      'Invalid environment: NODE_ENV must be one of the following values: development, production, test; GATEWAY_PORT must not be greater than 65535',
    );
  });
});
