import { describe, it, expect } from 'vitest';
import path from 'path';
import { extractHeaderBlock, parseMetadataHeader, readMetadataHeader } from '../services/frontmatter';
import { makeTempDir, writeFile } from './testUtils';

describe('metadata header parsing', () => {
  it('parses a YAML header into a mapping', () => {
    const doc = '---\nname: reviewer\ntags:\n  - a\n  - b\n---\n\nBody text\n';
    expect(parseMetadataHeader(doc)).toEqual({ name: 'reviewer', tags: ['a', 'b'] });
  });

  it('accepts CRLF line endings and a byte order mark', () => {
    expect(parseMetadataHeader('\uFEFF---\r\nname: x\r\n---\r\nbody')).toEqual({ name: 'x' });
  });

  it('returns null without a leading fence', () => {
    expect(parseMetadataHeader('# Title\n---\nname: x\n---\n')).toBeNull();
    expect(extractHeaderBlock('no header at all')).toBeNull();
  });

  it('returns null for empty, scalar or malformed headers', () => {
    expect(parseMetadataHeader('---\n\n---\n')).toBeNull();
    expect(parseMetadataHeader('---\njust a string\n---\n')).toBeNull();
    expect(parseMetadataHeader('---\n- a\n- b\n---\n')).toBeNull();
    expect(parseMetadataHeader('---\nname: [unclosed\n---\n')).toBeNull();
  });

  it('reads the header from disk and propagates missing files', () => {
    const dir = makeTempDir('frontmatter-');
    const file = path.join(dir, 'a.md');
    writeFile(file, '---\ndescription: Deploys things\n---\n');
    expect(readMetadataHeader(file)).toEqual({ description: 'Deploys things' });
    expect(() => readMetadataHeader(path.join(dir, 'missing.md'))).toThrow(/ENOENT/);
  });
});
