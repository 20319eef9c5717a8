/**
 * Iterator over the direct children of one node only
 * 仅遍历某节点直接子节点的迭代器
 */

import type { Arena } from '../core/Arena';
import { expectNode } from '../core/SceneNode';
import type { Children, SceneNode } from '../core/SceneNode';
import type { Handle } from '../utils/Types';

export class SceneGraphChildIter<T> implements IterableIterator<T> {
  private current: Handle | undefined;

  constructor(
    private readonly arena: Arena<SceneNode<T>>,
    children: Children | undefined,
    private readonly guard?: () => void
  ) {
    this.current = children?.first;
  }

  next(): IteratorResult<T> {
    if (this.current === undefined) return { done: true, value: undefined };
    this.guard?.();

    const node = expectNode(this.arena, this.current, 'iterDirectChildren');
    this.current = node.nextSibling;

    return { done: false, value: node.value };
  }

  [Symbol.iterator](): this {
    return this;
  }
}
