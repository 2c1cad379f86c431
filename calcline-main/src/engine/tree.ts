/**
 * Ordered tree whose nodes exclusively own their successors.
 * There are no parent links, so a subtree can be detached or copied freely.
 */
export class TreeNode<T> {
  readonly successors: TreeNode<T>[];

  constructor(
    public readonly value: T,
    successors: TreeNode<T>[] = [],
  ) {
    this.successors = successors;
  }

  get isLeaf(): boolean {
    return this.successors.length === 0;
  }

  clone(): TreeNode<T> {
    return new TreeNode(this.value, this.successors.map((s) => s.clone()));
  }

  /**
   * Deep copy in which every node for which `replace` returns a subtree is
   * swapped for that subtree. Replacements are not visited again.
   */
  cloneWith(replace: (node: TreeNode<T>) => TreeNode<T> | undefined): TreeNode<T> {
    const replacement = replace(this);
    if (replacement) return replacement;
    return new TreeNode(this.value, this.successors.map((s) => s.cloneWith(replace)));
  }

  /** Pre-order walk. */
  *walk(): Generator<TreeNode<T>> {
    yield this;
    for (const s of this.successors) {
      yield* s.walk();
    }
  }

  depth(): number {
    let max = 0;
    for (const s of this.successors) {
      max = Math.max(max, s.depth());
    }
    return max + 1;
  }
}
