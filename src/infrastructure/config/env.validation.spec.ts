import { Environment, validate } from './env.validation';

describe('validate', () => {
  it('should apply defaults to an empty environment', () => {
    const config = validate({});

    expect(config.NODE_ENV).toBe(Environment.Development);
    expect(config.PORT).toBe(3000);
    expect(config.DATABASE_PATH).toBe('./data/circles.sqlite');
    expect(config.TYPEORM_LOGGING).toBe(true);
    expect(config.RATE_LIMIT_TTL).toBe(60);
    expect(config.RATE_LIMIT_MAX).toBe(100);
  });

  it('should convert string values', () => {
    const config = validate({
      NODE_ENV: 'production',
      PORT: '8080',
      DATABASE_PATH: '/tmp/test.sqlite',
      TYPEORM_LOGGING: 'false',
      RATE_LIMIT_MAX: '5',
    });

    expect(config.NODE_ENV).toBe(Environment.Production);
    expect(config.PORT).toBe(8080);
    expect(config.DATABASE_PATH).toBe('/tmp/test.sqlite');
    expect(config.TYPEORM_LOGGING).toBe(false);
    expect(config.RATE_LIMIT_MAX).toBe(5);
  });

  it('should list every invalid variable', () => {
    expect(() => validate({ NODE_ENV: 'staging', PORT: 'abc' })).toThrow(/NODE_ENV: .*\nPORT: /);
  });

  it('should reject a zero port', () => {
    expect(() => validate({ PORT: '0' })).toThrow('PORT: PORT must not be less than 1');
  });
});
