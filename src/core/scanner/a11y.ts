/** The subset of puppeteer's SerializedAXNode the renderer reads. */
export interface AccessibilityNode {
    role: string;
    name?: string;
    value?: string | number;
    level?: number;
    checked?: boolean | 'mixed';
    disabled?: boolean;
    children?: AccessibilityNode[];
}

// Wrapper roles that add nothing to the outline; their children are lifted.
const TRANSPARENT_ROLES = ['RootWebArea', 'generic', 'none'];

function describe(node: AccessibilityNode): string {
    let line = node.role;
    if (node.name) line += ` "${node.name.replace(/"/g, '\\"')}"`;

    const attrs: string[] = [];
    if (node.level !== undefined) attrs.push(`level=${node.level}`);
    if (node.checked !== undefined) attrs.push(`checked=${node.checked}`);
    if (node.disabled) attrs.push('disabled');
    if (attrs.length > 0) line += ` [${attrs.join('] [')}]`;

    if (node.value !== undefined && node.value !== '') line += `: ${node.value}`;
    return line;
}

function render(node: AccessibilityNode, depth: number, lines: string[]) {
    const children = node.children ?? [];

    if (TRANSPARENT_ROLES.includes(node.role) && !node.name) {
        children.forEach(child => render(child, depth, lines));
        return;
    }

    lines.push(`${'  '.repeat(depth)}- ${describe(node)}`);
    children.forEach(child => render(child, depth + 1, lines));
}

/**
 * Renders an accessibility snapshot as indented YAML-like text:
 *
 *   - navigation "Main"
 *     - link "Home"
 *   - heading "Welcome" [level=1]
 */
export function renderAccessibilityTree(root: AccessibilityNode | null): string {
    if (!root) return '';
    const lines: string[] = [];
    render(root, 0, lines);
    return lines.join('\n');
}
