import { closeSync, openSync, readSync } from 'node:fs';
import { TextDecoder } from 'node:util';
import { Defaults } from '../constants/defaults.js';

/**
 * `truncated` marks a sample that stops short of the end of the file; only
 * then may it end in the middle of a multi-byte sequence.
 */
export function isBinarySample(sample: Uint8Array, truncated = false): boolean {
  if (sample.includes(0)) {
    return true;
  }
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(sample, { stream: truncated });
    return false;
  } catch {
    return true;
  }
}

/**
 * Classifies a file from its first 1024 bytes. Never throws: a file that
 * cannot be opened or read counts as binary.
 */
export function isTextFile(absPath: string): boolean {
  let fd: number;
  try {
    fd = openSync(absPath, 'r');
  } catch {
    return false;
  }

  try {
    const buffer = Buffer.alloc(Defaults.SAMPLE_BYTES);
    const bytesRead = readSync(fd, buffer, 0, Defaults.SAMPLE_BYTES, 0);
    return !isBinarySample(buffer.subarray(0, bytesRead), bytesRead === Defaults.SAMPLE_BYTES);
  } catch {
    return false;
  } finally {
    closeSync(fd);
  }
}
