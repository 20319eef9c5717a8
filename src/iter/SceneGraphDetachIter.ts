/**
 * Detaching depth-first traversal
 * 分离式深度优先遍历
 *
 * Every step removes the next node from the arena and hands back its value along with the
 * indices it had before removal. The order is the same pre-order as SceneGraphIter.
 * 每一步都会从竞技场移除下一个节点，并返回其值和移除前的索引。顺序与 SceneGraphIter 相同。
 *
 * A subtree handed to this iterator is always removed in full: `return()` (called by `for...of`
 * on `break`) and `drain()` consume whatever is left. When the graph has to finish the subtree
 * itself (see `interrupt`), later `next()` calls throw instead of reporting a normal end.
 * 交给此迭代器的子树总会被完整移除：`return()` 与 `drain()` 会消费剩余节点。
 * 若由图代为完成移除（见 `interrupt`），之后的 `next()` 会抛出异常而不是正常结束。
 */

import type { Arena } from '../core/Arena';
import type { GraphModifiedError } from '../core/Errors';
import { takeNode } from '../core/SceneNode';
import type { Children, SceneNode } from '../core/SceneNode';
import type { Handle, NodeIndex } from '../utils/Types';

/**
 * A node removed by a detaching traversal
 * 分离遍历移除的节点
 */
export interface DetachedNode<T> {
  /** Index of the parent before removal 移除前父节点的索引 */
  parentIndex: NodeIndex;
  /** Index of the node before removal 移除前节点的索引 */
  nodeIndex: NodeIndex;
  value: T;
}

interface StackFrame<T> {
  parent: NodeIndex;
  index: Handle;
  node: SceneNode<T>;
}

export class SceneGraphDetachIter<T> implements IterableIterator<DetachedNode<T>> {
  private readonly stack: StackFrame<T>[] = [];
  private interruption: GraphModifiedError | undefined = undefined;

  /**
   * @param head index whose child list is being consumed; yielded as the parent of its direct children
   * @param children child list to consume, already unlinked from `head` by the caller
   */
  constructor(
    private readonly arena: Arena<SceneNode<T>>,
    head: NodeIndex,
    children: Children | undefined
  ) {
    if (children) {
      this.push(head, children.first);
    }
  }

  /**
   * True once every node of the subtree has been removed
   * 子树所有节点均已移除时为 true
   */
  get exhausted(): boolean {
    return this.stack.length === 0;
  }

  next(): IteratorResult<DetachedNode<T>> {
    if (this.interruption) throw this.interruption;
    return this.step();
  }

  /**
   * Remove every remaining node, returning how many were removed
   * 移除所有剩余节点并返回移除数量
   */
  drain(): number {
    let removed = 0;
    while (!this.step().done) removed++;
    return removed;
  }

  /**
   * Drain on the graph's behalf; a consumer still looping gets `error` from its next step
   * 代表图执行排空；仍在循环的消费者将在下一步收到 `error`
   *
   * @internal
   */
  interrupt(error: GraphModifiedError): number {
    this.interruption = error;
    return this.drain();
  }

  private step(): IteratorResult<DetachedNode<T>> {
    const frame = this.stack.pop();
    if (!frame) return { done: true, value: undefined };
    const { parent, index, node } = frame;

    if (node.nextSibling !== undefined) {
      this.push(parent, node.nextSibling);
    }
    if (node.children) {
      this.push(index, node.children.first);
    }
    node.unlink();

    return { done: false, value: { parentIndex: parent, nodeIndex: index, value: node.value } };
  }

  /**
   * Called when a consumer stops early; removes the rest of the subtree
   * 消费者提前结束时调用；移除子树剩余部分
   */
  return(): IteratorResult<DetachedNode<T>> {
    this.drain();
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  private push(parent: NodeIndex, index: Handle): void {
    this.stack.push({ parent, index, node: takeNode(this.arena, index, 'iterDetach') });
  }
}
