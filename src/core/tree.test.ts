import { describe, expect, it } from 'vitest';
import { buildTree, numberTree } from './tree.js';

describe('buildTree', () => {
  it('nests files under directory nodes sorted by name', () => {
    const tree = buildTree(['src/b.ts', 'README.md', 'src/a.ts']);

    expect(tree).toEqual({
      kind: 'directory',
      name: '',
      path: '',
      children: [
        { kind: 'file', name: 'README.md', path: 'README.md' },
        {
          kind: 'directory',
          name: 'src',
          path: 'src',
          children: [
            { kind: 'file', name: 'a.ts', path: 'src/a.ts' },
            { kind: 'file', name: 'b.ts', path: 'src/b.ts' },
          ],
        },
      ],
    });
  });

  it('returns an empty root for no paths', () => {
    expect(buildTree([]).children).toEqual([]);
  });
});

describe('numberTree', () => {
  it('numbers nodes in pre-order with dotted prefixes', () => {
    const numbered = numberTree(buildTree(['a/x.ts', 'a/b/y.ts', 'z.ts']));

    expect(numbered.map(({ number, depth, node }) => [number, depth, node.path])).toEqual([
      ['1', 0, 'a'],
      ['1.1', 1, 'a/b'],
      ['1.1.1', 2, 'a/b/y.ts'],
      ['1.2', 1, 'a/x.ts'],
      ['2', 0, 'z.ts'],
    ]);
  });
});
