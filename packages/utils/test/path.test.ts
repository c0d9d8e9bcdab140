import { describe, expect, it } from 'vitest';
import { getEntryExtension, isDirectoryEntryName, joinEntryPath } from '../src/path.js';

describe('archive entry paths', () => {
  it('joins segments with forward slashes', () => {
    expect(joinEntryPath('lib', 'a.jar')).toBe('lib/a.jar');
  });

  it('takes the extension of the last segment', () => {
    expect(getEntryExtension('lib/a.jar')).toBe('.jar');
    expect(getEntryExtension('binlib/libfoo.so')).toBe('.so');
    expect(getEntryExtension('lib.d/LICENSE')).toBe('');
    expect(getEntryExtension('.hidden')).toBe('');
    expect(getEntryExtension('boot/')).toBe('');
  });

  it('recognises directory entries by their trailing slash', () => {
    expect(isDirectoryEntryName('boot/')).toBe(true);
    expect(isDirectoryEntryName('boot/Loader.class')).toBe(false);
  });
});
