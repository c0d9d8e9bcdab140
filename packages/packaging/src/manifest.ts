/**
 * Manifest
 * 
 * Parsing and serialization of archive manifests (META-INF/MANIFEST.MF).
 * 
 * Format:
 * - `Name: value` header lines, continuation lines start with one space
 * - A main section, then named sections each opened by a `Name:` header
 * - Sections are separated by blank lines
 * - Written lines end in CRLF and never exceed 72 bytes
 */

import { ConfigurationError } from '@jarsmith/core';
import { MANIFEST_VERSION_ATTRIBUTE } from './constants.js';

const ATTRIBUTE_NAME_PATTERN = /^[A-Za-z0-9_-]{1,70}$/;
const FORBIDDEN_VALUE_CHARACTERS = /[\r\n\0]/;
const MAX_LINE_BYTES = 72;
const SECTION_NAME_HEADER = 'Name';

/**
 * Ordered attribute map with case-insensitive names.
 * The first spelling of a name is kept when its value is replaced.
 */
export class Attributes implements Iterable<[string, string]> {
  private readonly values = new Map<string, { name: string; value: string }>();

  constructor(initial?: Iterable<[string, string]>) {
    if (initial) {
      for (const [name, value] of initial) {
        this.set(name, value);
      }
    }
  }

  get size(): number {
    return this.values.size;
  }

  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase())?.value;
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  set(name: string, value: string): this {
    if (!ATTRIBUTE_NAME_PATTERN.test(name)) {
      throw new ConfigurationError(`Invalid manifest attribute name: "${name}"`, { name });
    }
    if (FORBIDDEN_VALUE_CHARACTERS.test(value)) {
      throw new ConfigurationError(`Invalid value for manifest attribute ${name}`, { name });
    }

    const key = name.toLowerCase();
    const existing = this.values.get(key);
    this.values.set(key, { name: existing?.name ?? name, value });
    return this;
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const { name, value } of this.values.values()) {
      yield [name, value];
    }
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this);
  }
}

export class Manifest {
  readonly mainAttributes = new Attributes();
  readonly sections = new Map<string, Attributes>();

  getOrCreateSection(name: string): Attributes {
    let section = this.sections.get(name);
    if (!section) {
      section = new Attributes();
      this.sections.set(name, section);
    }
    return section;
  }
}

interface RawHeader {
  name: string;
  value: string;
  line: number;
}

function malformed(line: number, reason: string): ConfigurationError {
  return new ConfigurationError(`Malformed manifest at line ${line}: ${reason}`, { line });
}

/**
 * Split manifest text into sections of headers, folding continuation lines
 */
function readSections(text: string): RawHeader[][] {
  let current: RawHeader[] = [];
  const sections: RawHeader[][] = [current];
  let mainClosed = false;

  text.split(/\r\n|\r|\n/).forEach((line, index) => {
    const lineNumber = index + 1;

    if (line === '') {
      if (!mainClosed || current.length > 0) {
        mainClosed = true;
        current = [];
        sections.push(current);
      }
      return;
    }

    if (line.startsWith(' ')) {
      const previous = current[current.length - 1];
      if (!previous) {
        throw malformed(lineNumber, 'continuation line without a header');
      }
      previous.value += line.slice(1);
      return;
    }

    const separator = line.indexOf(': ');
    if (separator <= 0) {
      throw malformed(lineNumber, 'expected "Name: value"');
    }
    const name = line.slice(0, separator);
    if (!ATTRIBUTE_NAME_PATTERN.test(name)) {
      throw malformed(lineNumber, `invalid attribute name "${name}"`);
    }
    current.push({ name, value: line.slice(separator + 2), line: lineNumber });
  });

  return sections;
}

export function parseManifest(input: Uint8Array | string): Manifest {
  const text = typeof input === 'string' ? input : Buffer.from(input).toString('utf8');
  const [main = [], ...named] = readSections(text);
  const manifest = new Manifest();

  for (const header of main) {
    manifest.mainAttributes.set(header.name, header.value);
  }

  for (const headers of named) {
    const [first, ...rest] = headers;
    if (!first) {
      continue;
    }
    if (first.name.toLowerCase() !== SECTION_NAME_HEADER.toLowerCase()) {
      throw malformed(first.line, `section must start with a ${SECTION_NAME_HEADER} header`);
    }
    const section = manifest.getOrCreateSection(first.value);
    for (const header of rest) {
      section.set(header.name, header.value);
    }
  }

  return manifest;
}

/**
 * Break a header line into 72-byte lines without splitting a character
 */
function wrapLine(line: string): string[] {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_BYTES) {
    return [line];
  }

  const lines: string[] = [];
  let current = '';
  let currentBytes = 0;

  for (const char of line) {
    const charBytes = Buffer.byteLength(char, 'utf8');
    if (currentBytes + charBytes > MAX_LINE_BYTES) {
      lines.push(current);
      current = ' ';
      currentBytes = 1;
    }
    current += char;
    currentBytes += charBytes;
  }
  lines.push(current);

  return lines;
}

function writeHeader(lines: string[], name: string, value: string): void {
  lines.push(...wrapLine(`${name}: ${value}`));
}

export function serializeManifest(manifest: Manifest): Buffer {
  const lines: string[] = [];
  const { mainAttributes } = manifest;

  const version = mainAttributes.get(MANIFEST_VERSION_ATTRIBUTE);
  if (version !== undefined) {
    writeHeader(lines, MANIFEST_VERSION_ATTRIBUTE, version);
  }
  for (const [name, value] of mainAttributes) {
    if (name.toLowerCase() !== MANIFEST_VERSION_ATTRIBUTE.toLowerCase()) {
      writeHeader(lines, name, value);
    }
  }
  lines.push('');

  for (const [sectionName, attributes] of manifest.sections) {
    writeHeader(lines, SECTION_NAME_HEADER, sectionName);
    for (const [name, value] of attributes) {
      writeHeader(lines, name, value);
    }
    lines.push('');
  }

  return Buffer.from(lines.map((line) => `${line}\r\n`).join(''), 'utf8');
}
