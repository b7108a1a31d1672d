import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { join } from 'node:path';
import { createFixture, removeFixture } from '../test-utils/fixtures.js';
import { isBinarySample, isTextFile } from './detector.js';

describe('isBinarySample', () => {
  it('treats a zero byte as binary', () => {
    expect(isBinarySample(Uint8Array.from([0x61, 0x00, 0x62]))).toBe(true);
  });

  it('treats invalid UTF-8 as binary', () => {
    expect(isBinarySample(Uint8Array.from([0xff, 0xfe, 0x41]))).toBe(true);
  });

  it('accepts valid multi-byte UTF-8', () => {
    expect(isBinarySample(Buffer.from('héllo wörld ✓', 'utf-8'))).toBe(false);
  });

  it('accepts an empty sample', () => {
    expect(isBinarySample(new Uint8Array(0))).toBe(false);
  });

  it('accepts a multi-byte character cut at the end of the sample', () => {
    const check = Buffer.from('✓', 'utf-8');
    expect(isBinarySample(Buffer.concat([Buffer.from('ok '), check.subarray(0, 2)]), true)).toBe(false);
  });

  it('rejects a lone lead byte when the sample is the whole file', () => {
    expect(isBinarySample(Uint8Array.from([0x63, 0x61, 0x66, 0xe9]))).toBe(true);
  });
});

describe('isTextFile', () => {
  let root: string;

  beforeEach(() => {
    root = createFixture({
      'plain.txt': 'just text\n',
      'empty.txt': '',
      'image.dat': Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x01]),
      'late-zero.txt': Buffer.concat([Buffer.alloc(2000, 0x61), Buffer.from([0x00])]),
      'latin.txt': Uint8Array.from([0x63, 0x61, 0x66, 0xe9]),
      'cut.txt': Buffer.concat([Buffer.alloc(1023, 0x61), Buffer.from('✓', 'utf-8')]),
    });
  });

  afterEach(() => {
    removeFixture(root);
  });

  it('classifies text and empty files as text', () => {
    expect(isTextFile(join(root, 'plain.txt'))).toBe(true);
    expect(isTextFile(join(root, 'empty.txt'))).toBe(true);
  });

  it('classifies a file with a zero byte in its first 1024 bytes as binary', () => {
    expect(isTextFile(join(root, 'image.dat'))).toBe(false);
  });

  it('only samples the first 1024 bytes', () => {
    expect(isTextFile(join(root, 'late-zero.txt'))).toBe(true);
  });

  it('classifies a short file ending in a Latin-1 byte as binary', () => {
    expect(isTextFile(join(root, 'latin.txt'))).toBe(false);
  });

  it('accepts a file whose multi-byte character straddles the sample boundary', () => {
    expect(isTextFile(join(root, 'cut.txt'))).toBe(true);
  });

  it('returns false instead of throwing for a missing file', () => {
    expect(isTextFile(join(root, 'missing.txt'))).toBe(false);
  });

  it('returns false for a directory', () => {
    expect(isTextFile(root)).toBe(false);
  });
});
