import {describe, expect, it} from 'vitest';

import {err, HeaderMap, ok} from '../index';

describe('result helpers', () => {
  it('builds tagged success and failure values', () => {
    expect(ok(42)).toEqual({ok: true, value: 42});
    expect(err({code: 'boom'})).toEqual({ok: false, error: {code: 'boom'}});
  });
});

describe('HeaderMap', () => {
  it('looks up names case-insensitively', () => {
    const headers = new HeaderMap().set('Content-Type', 'application/json');

    expect(headers.get('content-type')).toBe('application/json');
    expect(headers.get('CONTENT-TYPE')).toBe('application/json');
    expect(headers.has('Content-type')).toBe(true);
  });

  it('keeps a single entry when names differ only in case', () => {
    const headers = new HeaderMap()
      .set('Authorization', 'Basic first')
      .set('AUTHORIZATION', 'Basic second');

    expect(headers.size).toBe(1);
    expect(headers.toRecord()).toEqual({authorization: 'Basic second'});
  });

  it('builds from node-style header records, joining repeated values and skipping undefined', () => {
    const headers = HeaderMap.from({
      Accept: ['application/json', 'text/plain'],
      'X-Empty': undefined,
      'Content-Length': 12
    });

    expect(headers.toRecord()).toEqual({
      accept: 'application/json, text/plain',
      'content-length': '12'
    });
  });

  it('drops entries with invalid names or control characters when building', () => {
    const headers = HeaderMap.from([
      ['bad name', 'x'],
      ['x-ok', 'fine'],
      ['x-injected', 'a\r\nb']
    ]);

    expect(headers.toRecord()).toEqual({'x-ok': 'fine'});
  });

  it('rejects control characters when setting values directly', () => {
    expect(() => new HeaderMap().set('x-user', 'alice\r\nx-admin: yes')).toThrow(TypeError);
    expect(() => new HeaderMap().set('bad name', 'x')).toThrow(TypeError);
  });

  it('clones without sharing state', () => {
    const original = new HeaderMap().set('accept', 'application/json');
    const copy = original.clone().set('x-extra', '1');

    expect(original.has('x-extra')).toBe(false);
    expect(copy.get('accept')).toBe('application/json');
    expect(copy.delete('accept')).toBe(true);
    expect(original.get('accept')).toBe('application/json');
  });
});
