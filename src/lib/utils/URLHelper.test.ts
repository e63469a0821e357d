import { describe, it, expect } from 'vitest';
import URLHelper from './URLHelper.js';

describe('URLHelper', () => {
  it('builds endpoint URLs under the API host', () => {
    expect(URLHelper.getBoardListURL('https://a.4cdn.org')).toBe('https://a.4cdn.org/boards.json');
    expect(URLHelper.getCatalogURL('https://a.4cdn.org', 'g')).toBe('https://a.4cdn.org/g/catalog.json');
    expect(URLHelper.getThreadURL('https://a.4cdn.org', 'g', 99)).toBe('https://a.4cdn.org/g/thread/99.json');
  });

  it('keeps a path prefix on the base URL', () => {
    expect(URLHelper.getCatalogURL('http://localhost:8080/api', 'po')).toBe('http://localhost:8080/api/po/catalog.json');
    expect(URLHelper.getCatalogURL('http://localhost:8080/api/', 'po')).toBe('http://localhost:8080/api/po/catalog.json');
  });

  it('rejects a malformed base URL', () => {
    expect(() => URLHelper.getCatalogURL('not a url', 'g')).toThrow('Invalid API base URL "not a url"');
  });
});
