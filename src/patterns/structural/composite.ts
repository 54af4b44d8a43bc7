/**
 * Composite: files and folders treated uniformly through a tagged node type.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { requireSetup } from '../shared.js';

type FsNode =
  | { kind: 'file'; name: string; size: number }
  | { kind: 'folder'; name: string; children: FsNode[] };

function totalSize(node: FsNode): number {
  switch (node.kind) {
    case 'file':
      return node.size;
    case 'folder':
      return node.children.reduce((sum, child) => sum + totalSize(child), 0);
  }
}

function renderTree(node: FsNode, depth = 0): string[] {
  const line = `${'  '.repeat(depth)}${node.name} (${totalSize(node)})`;
  if (node.kind === 'file') {
    return [line];
  }
  return [line, ...node.children.flatMap((child) => renderTree(child, depth + 1))];
}

export const COMPOSITE_OUTCOME = [
  'project (20)',
  '  README.md (4)',
  '  src (16)',
  '    index.ts (10)',
  '    util.ts (6)',
];

export class CompositeExample implements PatternExample {
  private root?: FsNode;

  setup(): void {
    this.root ??= {
      kind: 'folder',
      name: 'project',
      children: [
        { kind: 'file', name: 'README.md', size: 4 },
        {
          kind: 'folder',
          name: 'src',
          children: [
            { kind: 'file', name: 'index.ts', size: 10 },
            { kind: 'file', name: 'util.ts', size: 6 },
          ],
        },
      ],
    };
  }

  run(): readonly string[] {
    return renderTree(requireSetup(this.root, 'Composite'));
  }

  describe(): ExampleDescription {
    return {
      name: 'Composite',
      intent: 'Compose objects into trees and treat individual objects and compositions uniformly',
    };
  }
}
