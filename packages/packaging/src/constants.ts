/**
 * Archive layout constants shared by the writer, the synthesizer and the merger.
 */

export const MANIFEST_NAME = 'META-INF/MANIFEST.MF';

export const MANIFEST_VERSION_ATTRIBUTE = 'Manifest-Version';
export const MAIN_CLASS_ATTRIBUTE = 'One-Jar-Main-Class';
export const IMPLEMENTATION_VERSION_ATTRIBUTE = 'Implementation-Version';

// Renamed duplicates: <name><marker><counter><suffix>
export const COLLISION_MARKER = '-DUPLICATE-FILENAME-';
export const LEGACY_COLLISION_SUFFIX = '.jar';

export const DEFLATE_LEVEL = 6;

// Every entry carries this timestamp so identical inputs give identical bytes.
// Zip dates are local DOS time and must fall in 1980..2107.
export const ENTRY_MTIME = new Date('2000-01-01T00:00:00Z');

// Bootstrap templates are looked up as <prefix><version><suffix>
export const TEMPLATE_PREFIX = 'one-jar-boot-';
export const TEMPLATE_SUFFIX = '.jar';
export const DEFAULT_BOOT_VERSION = '0.97';

export const DEFAULT_CLASSIFIER = 'onejar';
export const OUTPUT_FILE_SUFFIX = '.one-jar.jar';
export const ATTACHMENT_RECORD_NAME = 'attached-artifacts.json';
