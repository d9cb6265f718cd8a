import * as fs from 'node:fs';

/**
 * Encodings a source file is read and written back with. `utf8-bom` is
 * UTF-8 behind a byte-order mark, which is stripped on read and restored
 * on write.
 */
export type SourceEncoding = 'utf8' | 'utf8-bom' | 'latin1';

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

// PEP 263: a comment on line 1 or 2 naming the encoding
const CODING_COOKIE_REGEX = /^[ \t\f]*#.*?coding[:=][ \t]*([-\w.]+)/;

const LATIN1_ALIASES = new Set([
  'latin-1', 'latin1', 'iso-8859-1', 'iso8859-1', 'iso-latin-1', 'l1', 'cp819',
]);

/**
 * The encoding named by a coding cookie in the first two lines, lower-cased
 */
export function findCodingCookie(buffer: Buffer): string | undefined {
  const head = stripBom(buffer)
    .subarray(0, 1024).toString('latin1').split('\n').slice(0, 2);

  for (const line of head) {
    const match = CODING_COOKIE_REGEX.exec(line);
    if (match) return match[1].toLowerCase().replace(/_/g, '-');
    // The cookie may only follow a blank or comment line
    if (!/^[ \t\f]*(#.*)?\r?$/.test(line)) break;
  }

  return undefined;
}

function hasBom(buffer: Buffer): boolean {
  return buffer.subarray(0, UTF8_BOM.length).equals(UTF8_BOM);
}

function stripBom(buffer: Buffer): Buffer {
  return hasBom(buffer) ? buffer.subarray(UTF8_BOM.length) : buffer;
}

function isValidUtf8(buffer: Buffer): boolean {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pick the encoding to read a file with: UTF-8 behind a byte-order mark
 * when there is one, Latin-1 when the cookie says so or the bytes are not
 * valid UTF-8, UTF-8 otherwise
 */
export function detectEncoding(buffer: Buffer): SourceEncoding {
  if (hasBom(buffer)) return 'utf8-bom';

  const cookie = findCodingCookie(buffer);

  if (cookie !== undefined && LATIN1_ALIASES.has(cookie)) return 'latin1';
  return isValidUtf8(buffer) ? 'utf8' : 'latin1';
}

export interface SourceFile {
  text: string;
  encoding: SourceEncoding;
}

export function readSourceFile(filePath: string): SourceFile {
  const buffer = fs.readFileSync(filePath);
  const encoding = detectEncoding(buffer);

  if (encoding === 'utf8-bom') {
    return { text: stripBom(buffer).toString('utf8'), encoding };
  }
  return { text: buffer.toString(encoding), encoding };
}

export function writeSourceFile(filePath: string, text: string, encoding: SourceEncoding): void {
  if (encoding === 'utf8-bom') {
    fs.writeFileSync(filePath, Buffer.concat([UTF8_BOM, Buffer.from(text, 'utf8')]));
    return;
  }
  fs.writeFileSync(filePath, Buffer.from(text, encoding));
}
