import { describe, expect, it } from 'vitest';
import { extractToken, isPlaceholderToken } from '../token-extractor.js';

const fixedNow = () => new Date('2026-01-05T09:00:00.000Z');

describe('token extraction', () => {
  it('prefers session storage over cookies when persistent storage has no match', () => {
    const result = extractToken(
      { persistent: {}, session: { auth_token: 'S1' }, cookie: { access: 'C1' } },
      undefined,
      { now: fixedNow }
    );

    expect(result).toEqual({
      ok: true,
      token: {
        value: 'S1',
        sourceTier: 'session',
        sourceKey: 'auth_token',
        extractedAt: new Date('2026-01-05T09:00:00.000Z')
      }
    });
  });

  it('lets persistent storage win over every other tier', () => {
    const result = extractToken({
      persistent: { theme: 'dark', AccessToken: 'P1' },
      session: { auth_token: 'S1' },
      cookie: { access: 'C1' }
    });

    expect(result.ok && result.token.value).toBe('P1');
    expect(result.ok && result.token.sourceKey).toBe('AccessToken');
  });

  it('reports TokenNotFound when no key looks like a credential', () => {
    const result = extractToken({
      persistent: { theme: 'dark' },
      session: { lastPage: '/home' },
      cookie: { locale: 'en-IN' }
    });

    expect(result).toEqual({ ok: false, kind: 'TokenNotFound', inspectedKeys: 3 });
  });

  it('skips placeholder values and keeps searching', () => {
    const result = extractToken({
      persistent: { token: 'null' },
      session: { authState: '' },
      cookie: { jwt: 'C2' }
    });

    expect(result.ok && result.token.sourceTier).toBe('cookie');
    expect(result.ok && result.token.value).toBe('C2');
  });

  it('unwraps JSON-quoted string values', () => {
    const result = extractToken({ persistent: { accessToken: '"eyJ.abc.def"' }, session: {}, cookie: {} });
    expect(result.ok && result.token.value).toBe('eyJ.abc.def');
  });

  it('accepts custom markers', () => {
    const result = extractToken(
      { persistent: { token: 'P1' }, session: { RequestKey: 'S9' }, cookie: {} },
      ['requestkey']
    );
    expect(result.ok && result.token.value).toBe('S9');
  });
});

describe('token extraction beyond storage', () => {
  const emptyStorage = { persistent: {}, session: {}, cookie: {} };

  it('reads the request token from the landing url query', () => {
    const result = extractToken(emptyStorage, undefined, {
      url: 'https://vendor.test/callback?state=x&RequestToken=eyJ.url.token',
      now: fixedNow
    });

    expect(result).toEqual({
      ok: true,
      token: {
        value: 'eyJ.url.token',
        sourceTier: 'url',
        sourceKey: 'RequestToken',
        extractedAt: new Date('2026-01-05T09:00:00.000Z')
      }
    });
  });

  it('falls back to the url fragment', () => {
    const result = extractToken(emptyStorage, undefined, {
      url: 'https://vendor.test/callback?state=x#access_token=F1&expires=3600'
    });

    expect(result.ok && result.token.sourceKey).toBe('access_token');
    expect(result.ok && result.token.value).toBe('F1');
  });

  it('reads the access token announced in the callback response body', () => {
    const result = extractToken(emptyStorage, undefined, {
      responseBodies: ['<p>pending</p>', 'AccessToken Generated : eyJ.body.token\n'],
      url: 'https://vendor.test/callback?RequestToken=R1'
    });

    expect(result.ok && result.token.sourceTier).toBe('response');
    expect(result.ok && result.token.sourceKey).toBe('AccessToken Generated');
    expect(result.ok && result.token.value).toBe('eyJ.body.token');
  });

  it('keeps storage ahead of the url', () => {
    const result = extractToken(
      { persistent: {}, session: {}, cookie: { jwt: 'C1' } },
      undefined,
      { url: 'https://vendor.test/callback?RequestToken=R1' }
    );

    expect(result.ok && result.token.value).toBe('C1');
  });

  it('counts url parameters and response bodies among the inspected keys', () => {
    const result = extractToken({ persistent: { theme: 'dark' }, session: {}, cookie: {} }, undefined, {
      url: 'https://vendor.test/callback?RequestToken=&state=x',
      responseBodies: ['ok']
    });

    expect(result).toEqual({ ok: false, kind: 'TokenNotFound', inspectedKeys: 4 });
  });

  it('ignores an address that does not parse', () => {
    const result = extractToken(emptyStorage, undefined, { url: 'not a url' });

    expect(result).toEqual({ ok: false, kind: 'TokenNotFound', inspectedKeys: 0 });
  });
});

describe('placeholder detection', () => {
  it('treats blank and sentinel strings as placeholders', () => {
    expect(isPlaceholderToken('   ')).toBe(true);
    expect(isPlaceholderToken('undefined')).toBe(true);
    expect(isPlaceholderToken('NULL')).toBe(true);
    expect(isPlaceholderToken('abc123')).toBe(false);
  });
});
