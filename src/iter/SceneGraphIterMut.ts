/**
 * Mutable depth-first traversal
 * 可变深度优先遍历
 *
 * Same order as SceneGraphIter, but yields writable `[parentSlot, childSlot]` pairs. Branch slots
 * are NodeViews, so values can be replaced while the links stay read-only.
 * Node records are fetched through Arena.getPair, which refuses to hand out one slot twice;
 * together with the walk never yielding a node twice, parent and child never alias.
 * 顺序与 SceneGraphIter 相同，但产出可写的 `[父槽, 子槽]`。分支槽为 NodeView，值可替换而链接只读。
 * 通过 Arena.getPair 获取节点记录，父子槽位永不重叠。
 */

import type { Arena } from '../core/Arena';
import { GraphCorruptionError } from '../core/Errors';
import { NodeView } from '../core/NodeView';
import type { GuardFactory } from '../core/NodeView';
import type { Children, SceneNode, ValueSlot } from '../core/SceneNode';
import { ROOT, formatIndex } from '../utils/Types';
import type { Handle, NodeIndex } from '../utils/Types';

interface StackFrame {
  parent: NodeIndex;
  current: Handle;
}

export class SceneGraphIterMut<T> implements IterableIterator<[ValueSlot<T>, ValueSlot<T>]> {
  private readonly stack: StackFrame[] = [];
  private readonly guard: (() => void) | undefined;

  constructor(
    private readonly arena: Arena<SceneNode<T>>,
    private readonly rootSlot: ValueSlot<T>,
    start: NodeIndex,
    children: Children | undefined,
    private readonly guardFor?: GuardFactory
  ) {
    this.guard = guardFor?.('iterMut');
    if (children) {
      this.stack.push({ parent: start, current: children.first });
    }
  }

  next(): IteratorResult<[ValueSlot<T>, ValueSlot<T>]> {
    if (this.stack.length === 0) return { done: true, value: undefined };
    this.guard?.();

    const frame = this.stack.pop();
    if (!frame) return { done: true, value: undefined };

    const [parentSlot, node] = this.resolve(frame);

    if (node.nextSibling !== undefined) {
      this.stack.push({ parent: frame.parent, current: node.nextSibling });
    }
    if (node.children) {
      this.stack.push({ parent: frame.current, current: node.children.first });
    }

    return { done: false, value: [parentSlot, this.view(node)] };
  }

  [Symbol.iterator](): this {
    return this;
  }

  private view(record: SceneNode<T>): NodeView<T> {
    return new NodeView(record, this.arena, this.guardFor);
  }

  private resolve(frame: StackFrame): [ValueSlot<T>, SceneNode<T>] {
    if (frame.parent === ROOT) {
      const node = this.arena.get(frame.current);
      if (node) return [this.rootSlot, node];
    } else {
      const [parent, node] = this.arena.getPair(frame.parent, frame.current);
      if (parent && node) return [this.view(parent), node];
    }
    throw new GraphCorruptionError(
      'iterMut',
      `frame ${formatIndex(frame.parent)} -> ${formatIndex(frame.current)} points outside the arena`
    );
  }
}
