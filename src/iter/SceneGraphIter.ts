/**
 * Read-only depth-first traversal
 * 只读深度优先遍历
 *
 * Yields `[parentValue, nodeValue]` in pre-order: a node comes before its descendants, siblings
 * come in insertion order, and a subtree is exhausted before the next sibling. The walk keeps an
 * explicit stack, so call depth does not grow with tree depth.
 * 以先序产出 `[父值, 节点值]`。使用显式栈，调用深度不随树深度增长。
 */

import type { Arena } from '../core/Arena';
import { expectNode } from '../core/SceneNode';
import type { Children, SceneNode } from '../core/SceneNode';

interface StackFrame<T> {
  parentValue: T;
  node: SceneNode<T>;
}

export class SceneGraphIter<T> implements IterableIterator<[T, T]> {
  private readonly stack: StackFrame<T>[] = [];

  /**
   * @param guard called before every step; throws when the graph changed underneath
   */
  constructor(
    private readonly arena: Arena<SceneNode<T>>,
    parentValue: T,
    children: Children | undefined,
    private readonly guard?: () => void
  ) {
    if (children) {
      this.stack.push({ parentValue, node: expectNode(arena, children.first, 'iter') });
    }
  }

  next(): IteratorResult<[T, T]> {
    if (this.stack.length === 0) return { done: true, value: undefined };
    this.guard?.();

    const frame = this.stack.pop();
    if (!frame) return { done: true, value: undefined };
    const { parentValue, node } = frame;

    // Sibling goes in first so the child is popped before it
    // 先压入兄弟，使子节点先出栈
    if (node.nextSibling !== undefined) {
      this.stack.push({ parentValue, node: expectNode(this.arena, node.nextSibling, 'iter') });
    }
    if (node.children) {
      this.stack.push({ parentValue: node.value, node: expectNode(this.arena, node.children.first, 'iter') });
    }

    return { done: false, value: [parentValue, node.value] };
  }

  [Symbol.iterator](): this {
    return this;
  }
}
