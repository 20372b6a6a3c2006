/**
 * Content Hasher Tests
 */

import { ContentHasher, dedupKey, fingerprint, isDedupKeyMode } from '../content-hasher';

describe('fingerprint', () => {
  it('should produce a hex SHA-256 digest', () => {
    expect(fingerprint('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(fingerprint('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('dedupKey', () => {
  it('should use the text alone in content mode', () => {
    expect(dedupKey('https://docs.example.test/a', 'body', 'content')).toBe('body');
  });

  it('should prefix the URL and a newline in url+content mode', () => {
    expect(dedupKey('https://docs.example.test/a', 'body', 'url+content')).toBe('https://docs.example.test/a\nbody');
  });
});

describe('ContentHasher', () => {
  it('should give identical text the same hash across URLs in content mode', () => {
    const hasher = new ContentHasher('content');
    expect(hasher.hash('https://docs.example.test/a', 'same text')).toBe(
      hasher.hash('https://docs.example.test/b', 'same text')
    );
    expect(hasher.hash('https://docs.example.test/a', 'same text')).toBe(fingerprint('same text'));
  });

  it('should separate identical text on different URLs in url+content mode', () => {
    const hasher = new ContentHasher('url+content');
    expect(hasher.hash('https://docs.example.test/a', 'same text')).not.toBe(
      hasher.hash('https://docs.example.test/b', 'same text')
    );
    expect(hasher.getMode()).toBe('url+content');
  });

  it('should default to content mode', () => {
    expect(new ContentHasher().getMode()).toBe('content');
  });
});

describe('isDedupKeyMode', () => {
  it('should accept the two key modes only', () => {
    expect(isDedupKeyMode('content')).toBe(true);
    expect(isDedupKeyMode('url+content')).toBe(true);
    expect(isDedupKeyMode('url')).toBe(false);
  });
});
