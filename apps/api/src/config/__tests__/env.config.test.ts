import { describe, it, expect } from 'vitest';
import { validateEnv } from '../env.config';

describe('validateEnv', () => {
  it('applies defaults', () => {
    expect(validateEnv({})).toEqual({
      PORT: 4000,
      NODE_ENV: 'development',
      FRONTEND_URL: 'http://localhost:3000',
      MAX_UPLOAD_SIZE_MB: 50,
      IMPORT_DECIMAL_SEPARATOR: ',',
      IMPORT_DATE_FORMAT: 'dd/MM/yyyy',
    });
  });

  it('coerces numeric variables', () => {
    const env = validateEnv({ PORT: '8080', MAX_UPLOAD_SIZE_MB: '10', IMPORT_DECIMAL_SEPARATOR: '.' });
    expect(env.PORT).toBe(8080);
    expect(env.MAX_UPLOAD_SIZE_MB).toBe(10);
    expect(env.IMPORT_DECIMAL_SEPARATOR).toBe('.');
  });

  it('lists every invalid variable', () => {
    expect(() => validateEnv({ NODE_ENV: 'staging', MAX_UPLOAD_SIZE_MB: '500' })).toThrow(
      /Environment validation failed:\n {2}NODE_ENV: .+\n {2}MAX_UPLOAD_SIZE_MB: .+/,
    );
  });
});
