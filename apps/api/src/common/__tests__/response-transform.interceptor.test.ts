import { describe, it, expect } from 'vitest';
import { toEnvelope } from '../interceptors/response-transform.interceptor';

describe('toEnvelope', () => {
  it('wraps JSON results', () => {
    expect(toEnvelope({ fileName: 'people.xlsx', records: [] }, false)).toEqual({
      success: true,
      data: { fileName: 'people.xlsx', records: [] },
    });
  });

  it('leaves replies the handler already sent alone', () => {
    expect(toEnvelope(undefined, true)).toBeUndefined();
  });
});
