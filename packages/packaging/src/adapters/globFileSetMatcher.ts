/**
 * Glob File-Set Matcher
 * 
 * Expands a native library file-set with fast-glob. Results are regular files
 * only, sorted by their path relative to the file-set directory.
 */

import { isAbsolute, join, resolve } from 'node:path';
import fg from 'fast-glob';
import { ConfigurationError, type FileSetMatcher, type NativeLibrarySpec } from '@jarsmith/core';
import { isDirectory } from '@jarsmith/utils';

const DEFAULT_INCLUDES = ['**/*'];

const CLOSING_BRACKETS: Record<string, string> = {
  '[': ']',
  '{': '}',
  '(': ')',
};

/**
 * Describe what is wrong with a glob pattern, or null when it is usable
 */
export function findPatternProblem(pattern: string): string | null {
  if (pattern.trim() === '') {
    return 'pattern is empty';
  }
  if (pattern.includes('\0')) {
    return 'pattern contains a NUL character';
  }
  if (isAbsolute(pattern) || pattern.startsWith('/')) {
    return 'pattern must be relative to the file-set directory';
  }
  if (pattern.split('/').includes('..')) {
    return 'pattern must not leave the file-set directory';
  }

  const expected: string[] = [];
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);
    if (char === '\\') {
      i++;
      continue;
    }
    const closing = CLOSING_BRACKETS[char];
    if (closing !== undefined) {
      expected.push(closing);
    } else if (char === ']' || char === '}' || char === ')') {
      if (expected.pop() !== char) {
        return `unbalanced "${char}"`;
      }
    }
  }
  if (expected.length > 0) {
    return `unclosed "${expected[expected.length - 1]}"`;
  }

  return null;
}

export class GlobFileSetMatcher implements FileSetMatcher {
  async match(spec: NativeLibrarySpec): Promise<string[]> {
    const directory = resolve(spec.directory);
    if (!(await isDirectory(directory))) {
      throw new ConfigurationError(`File-set directory does not exist: ${directory}`, { directory });
    }

    const includes = spec.includes.length > 0 ? spec.includes : DEFAULT_INCLUDES;
    for (const pattern of [...includes, ...spec.excludes]) {
      const problem = findPatternProblem(pattern);
      if (problem) {
        throw new ConfigurationError(`Malformed file-set pattern "${pattern}": ${problem}`, {
          directory,
          pattern,
        });
      }
    }

    const matches = await fg(includes, {
      cwd: directory,
      ignore: spec.excludes,
      onlyFiles: true,
      dot: true,
      unique: true,
    });

    return [...matches].sort().map((relativePath) => join(directory, relativePath));
  }
}
