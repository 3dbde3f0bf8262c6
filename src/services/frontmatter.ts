import fs from 'fs';
import { parse as parseYaml } from 'yaml';

/**
 * Reads the metadata header of a candidate element file and returns its key/value mapping,
 * or null when the file carries no usable header. Filesystem errors propagate so the
 * scanner can tell "unreadable" apart from "no metadata".
 */
export type MetadataHeaderParser = (filePath: string) => Record<string, unknown> | null;

// Headers live at the top of the file; anything past this is body text.
const HEADER_PEEK_BYTES = 64 * 1024;

const HEADER_RE = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Extract the raw YAML between the leading `---` fences, if any. */
export function extractHeaderBlock(content: string): string | null {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const match = HEADER_RE.exec(text);
  if(!match) return null;
  return match[1].trim().length ? match[1] : null;
}

export function parseMetadataHeader(content: string): Record<string, unknown> | null {
  const block = extractHeaderBlock(content);
  if(block === null) return null;
  let parsed: unknown;
  try {
    parsed = parseYaml(block);
  } catch {
    // malformed YAML is reported as "no metadata" by the caller
    return null;
  }
  return isPlainObject(parsed) && Object.keys(parsed).length ? parsed : null;
}

function readHead(filePath: string): string {
  const fd = fs.openSync(filePath, 'r');
  try {
    const buf = Buffer.alloc(HEADER_PEEK_BYTES);
    const bytes = fs.readSync(fd, buf, 0, HEADER_PEEK_BYTES, 0);
    return buf.subarray(0, bytes).toString('utf8');
  } finally {
    fs.closeSync(fd);
  }
}

export const readMetadataHeader: MetadataHeaderParser = (filePath) => parseMetadataHeader(readHead(filePath));
