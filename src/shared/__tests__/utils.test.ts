import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { resolvePath, sha256, hostnameOf, sleep, getPackageRoot, sliceCodeUnits } from '../utils.js';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    expect(resolvePath('~/test')).toBe(path.join(homedir(), 'test'));
  });

  it('resolves relative paths', () => {
    expect(path.isAbsolute(resolvePath('./foo/bar'))).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    expect(resolvePath('/absolute/path')).toBe('/absolute/path');
  });
});

describe('sha256', () => {
  it('produces a known 64-char hex digest', () => {
    expect(sha256('hello')).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
    );
  });
});

describe('sliceCodeUnits', () => {
  it('returns text within the limit unchanged', () => {
    expect(sliceCodeUnits('abc', 3)).toBe('abc');
  });

  it('backs off one unit instead of leaving a lone high surrogate', () => {
    expect(sliceCodeUnits('ab\u{1F600}', 3)).toBe('ab');
    expect(sliceCodeUnits('ab\u{1F600}c', 4)).toBe('ab\u{1F600}');
  });

  it('handles a pair at the very start', () => {
    expect(sliceCodeUnits('\u{1F600}x', 1)).toBe('');
  });
});

describe('hostnameOf', () => {
  it('lowercases the hostname', () => {
    expect(hostnameOf('https://Example.COM/a')).toBe('example.com');
  });

  it('returns null for garbage', () => {
    expect(hostnameOf('not a url')).toBeNull();
  });
});

describe('sleep', () => {
  it('resolves immediately for zero', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });
});

describe('getPackageRoot', () => {
  it('finds the directory holding package.json', () => {
    expect(fs.existsSync(path.join(getPackageRoot(), 'package.json'))).toBe(true);
  });
});
