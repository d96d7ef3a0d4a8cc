import { corsOptions, parseOrigins } from './cors';

describe('parseOrigins', () => {
  it('defaults to the local dev front end', () => {
    expect(parseOrigins(undefined)).toEqual(['http://localhost:5173']);
    expect(parseOrigins('   ')).toEqual(['http://localhost:5173']);
  });

  it('allows every origin with *', () => {
    expect(parseOrigins('*')).toBe(true);
    expect(parseOrigins('http://a.test, *')).toBe(true);
  });

  it('splits, trims and pairs localhost with 127.0.0.1', () => {
    expect(parseOrigins(' http://localhost:3001 , https://shop.test ,')).toEqual([
      'http://localhost:3001',
      'http://127.0.0.1:3001',
      'https://shop.test',
    ]);
    expect(parseOrigins('http://127.0.0.1')).toEqual(['http://127.0.0.1', 'http://localhost']);
  });

  it('removes duplicates and keeps unparseable entries as given', () => {
    expect(parseOrigins('http://localhost:5173,http://127.0.0.1:5173,not a url')).toEqual([
      'http://localhost:5173',
      'http://127.0.0.1:5173',
      'not a url',
    ]);
  });
});

describe('corsOptions', () => {
  it('passes the origins through with credentials and a day of preflight cache', () => {
    const opts = corsOptions(['https://shop.test']);
    expect(opts.origin).toEqual(['https://shop.test']);
    expect(opts.credentials).toBe(true);
    expect(opts.maxAge).toBe(86400);
    expect(opts.methods).toContain('PATCH');
  });
});
