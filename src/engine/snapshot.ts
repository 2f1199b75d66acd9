/**
 * One element of the on-screen tree as exposed by the platform's UI-introspection
 * layer. Children may be `null` when a node went stale between reads.
 */
export interface SnapshotNode {
  text?: string | null;
  /** Accessible description (content description on Android). */
  description?: string | null;
  className?: string | null;
  editable?: boolean;
  clickable?: boolean;
  focused?: boolean;
  children?: ReadonlyArray<SnapshotNode | null>;
}

export type Snapshot = SnapshotNode;

/** Depth-first, pre-order walk. Stops early when `visit` returns true. */
export function walk(node: SnapshotNode | null | undefined, visit: (node: SnapshotNode) => boolean | void): boolean {
  if (!node) return false;
  if (visit(node) === true) return true;
  for (const child of node.children ?? []) {
    if (walk(child, visit)) return true;
  }
  return false;
}

/** Visible texts in traversal order. Text fields are skipped: their content is what we typed. */
export function collectTexts(root: SnapshotNode | null | undefined): string[] {
  const texts: string[] = [];
  walk(root, (node) => {
    if (isInputNode(node)) return;
    if (typeof node.text === "string" && node.text.trim() !== "") {
      texts.push(node.text);
    }
  });
  return texts;
}

export function isInputNode(node: SnapshotNode): boolean {
  return node.editable === true || (node.className ?? "").includes("EditText");
}

export function findInputNode(root: SnapshotNode | null | undefined): SnapshotNode | null {
  let found: SnapshotNode | null = null;
  walk(root, (node) => {
    if (isInputNode(node)) {
      found = node;
      return true;
    }
  });
  return found;
}

/** First clickable node whose text or description equals one of `labels`, ignoring case. */
export function findNodeByLabel(
  root: SnapshotNode | null | undefined,
  labels: readonly string[],
): SnapshotNode | null {
  const wanted = labels.map((l) => l.toLowerCase());
  let found: SnapshotNode | null = null;
  walk(root, (node) => {
    if (!node.clickable) return;
    const text = (node.text ?? "").toLowerCase();
    const description = (node.description ?? "").toLowerCase();
    if (wanted.some((label) => label === text || label === description)) {
      found = node;
      return true;
    }
  });
  return found;
}
