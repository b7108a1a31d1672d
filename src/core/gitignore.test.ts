import { afterEach, describe, expect, it } from 'vitest';
import { createFixture, removeFixture } from '../test-utils/fixtures.js';
import { createGitignoreMatcher, loadGitignore, parseGitignore } from './gitignore.js';

describe('parseGitignore', () => {
  it('drops blank lines and comments', () => {
    const content = '# build output\ndist/\n\n  *.log  \r\n!keep.log\n';
    expect(parseGitignore(content)).toEqual(['dist/', '*.log', '!keep.log']);
  });
});

describe('createGitignoreMatcher', () => {
  it('matches slash-free patterns at any depth', () => {
    const matcher = createGitignoreMatcher(['*.log']);
    expect(matcher.ignores('debug.log')).toBe(true);
    expect(matcher.ignores('deep/nested/debug.log')).toBe(true);
    expect(matcher.ignores('debug.txt')).toBe(false);
  });

  it('honours negation', () => {
    const matcher = createGitignoreMatcher(['*.log', '!keep.log']);
    expect(matcher.ignores('keep.log')).toBe(false);
    expect(matcher.ignores('other.log')).toBe(true);
  });

  it('applies directory-only patterns to directories', () => {
    const matcher = createGitignoreMatcher(['cache/']);
    expect(matcher.ignores('cache', true)).toBe(true);
    expect(matcher.ignores('pkg/cache', true)).toBe(true);
    expect(matcher.ignores('cache', false)).toBe(false);
  });

  it('falls back to **/pattern for patterns containing a slash', () => {
    const matcher = createGitignoreMatcher(['generated/api.ts']);
    expect(matcher.ignores('generated/api.ts')).toBe(true);
    expect(matcher.ignores('packages/web/generated/api.ts')).toBe(true);
    expect(matcher.ignores('generated/other.ts')).toBe(false);
  });

  it('keeps a leading slash anchored to the root', () => {
    const matcher = createGitignoreMatcher(['/docs/draft.md']);
    expect(matcher.ignores('docs/draft.md')).toBe(true);
    expect(matcher.ignores('site/docs/draft.md')).toBe(false);
  });

  it('never ignores the root itself', () => {
    expect(createGitignoreMatcher(['*']).ignores('', true)).toBe(false);
  });
});

describe('loadGitignore', () => {
  let root = '';

  afterEach(() => {
    if (root) removeFixture(root);
  });

  it('returns null when the root has no .gitignore', () => {
    root = createFixture({ 'a.txt': 'a' });
    expect(loadGitignore(root)).toBeNull();
  });

  it('loads the rules from the root .gitignore', () => {
    root = createFixture({ '.gitignore': 'secrets.txt\n' });
    const matcher = loadGitignore(root);
    expect(matcher?.ignores('secrets.txt')).toBe(true);
    expect(matcher?.ignores('public.txt')).toBe(false);
  });
});
