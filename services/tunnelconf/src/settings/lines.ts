export type LineStyle = {
  indent: string;
  fieldPrefix: string;
  lastFieldPrefix: string;
};

export const DEFAULT_LINE_STYLE: Readonly<LineStyle> = Object.freeze({
  indent: "    ",
  fieldPrefix: "├── ",
  lastFieldPrefix: "└── ",
});

export type TreeNode = {
  label: string;
  children: TreeNode[];
};

/** Returns a complete style; the argument is left untouched. */
export function withLineStyleDefaults(style: Partial<LineStyle> = {}): LineStyle {
  return {
    indent: style.indent ?? DEFAULT_LINE_STYLE.indent,
    fieldPrefix: style.fieldPrefix ?? DEFAULT_LINE_STYLE.fieldPrefix,
    lastFieldPrefix: style.lastFieldPrefix ?? DEFAULT_LINE_STYLE.lastFieldPrefix,
  };
}

export function treeNode(label: string, children: TreeNode[] = []): TreeNode {
  return { label, children };
}

function renderNodes(nodes: readonly TreeNode[], style: LineStyle, depth: number, out: string[]): void {
  const indent = style.indent.repeat(depth);
  nodes.forEach((node, index) => {
    const prefix = index === nodes.length - 1 ? style.lastFieldPrefix : style.fieldPrefix;
    out.push(`${indent}${prefix}${node.label}`);
    renderNodes(node.children, style, depth + 1, out);
  });
}

export function renderTree(nodes: readonly TreeNode[], style: Partial<LineStyle> = {}): string[] {
  const lines: string[] = [];
  renderNodes(nodes, withLineStyleDefaults(style), 0, lines);
  return lines;
}

/** A root label followed by its children, as printed in settings summaries. */
export function renderTitledTree(root: TreeNode, style: Partial<LineStyle> = {}): string[] {
  return [root.label, ...renderTree(root.children, style)];
}

export function secretState(value: string | undefined): string {
  return value === undefined || value === "" ? "not set" : "set";
}

export function enabledState(value: boolean | undefined): string {
  if (value === undefined) {
    return "not set";
  }
  return value ? "enabled" : "disabled";
}
