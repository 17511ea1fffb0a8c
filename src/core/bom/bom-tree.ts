import type { BomNode } from './bom-node';
import { BomChild } from './bom.models';

const BRANCH = '├── ';
const LAST_BRANCH = '└── ';
const PIPE = '│   ';
const GAP = '    ';

export function renderTree(root: BomNode): string {
  const lines = [formatLabel(root.partNumber, root.name)];

  const walk = (children: readonly BomChild[], prefix: string): void => {
    children.forEach((child, index) => {
      const isLast = index === children.length - 1;
      lines.push(
        `${prefix}${isLast ? LAST_BRANCH : BRANCH}${describe(child)}`,
      );

      if (child.kind === 'assembly') {
        walk(child.children, prefix + (isLast ? GAP : PIPE));
      }
    });
  };

  walk(root.children, '');
  return lines.join('\n');
}

function describe(child: BomChild): string {
  if (child.kind === 'part') {
    return formatLabel(child.item.partNumber, child.item.name, child.quantity);
  }

  return formatLabel(child.partNumber, child.name, child.quantityFromParent);
}

function formatLabel(
  partNumber: string,
  name: string,
  quantity?: number,
): string {
  const label = name ? `${partNumber} ${name}` : partNumber;
  return quantity === undefined ? label : `${label} (x${quantity})`;
}
