/**
 * Caller-facing view of a stored node
 * 面向调用方的存储节点视图
 *
 * The value can be read and replaced; the links are read-only, so only SceneGraph changes them.
 * 值可读可替换；链接只读，仅由 SceneGraph 修改。
 */

import type { Arena } from './Arena';
import type { NodeMut, SceneNode } from './SceneNode';
import { SceneGraphChildIter } from '../iter/SceneGraphChildIter';
import type { Handle, NodeIndex } from '../utils/Types';

/**
 * Creates the epoch check for an iterator started by `operation`
 * 为 `operation` 启动的迭代器创建纪元校验
 */
export type GuardFactory = (operation: string) => () => void;

export class NodeView<T> implements NodeMut<T> {
  constructor(
    private readonly record: SceneNode<T>,
    private readonly arena: Arena<SceneNode<T>>,
    private readonly guardFor?: GuardFactory
  ) {}

  get value(): T {
    return this.record.value;
  }

  set value(value: T) {
    this.record.value = value;
  }

  get parent(): NodeIndex {
    return this.record.parentIndex;
  }

  get hasChildren(): boolean {
    return this.record.children !== undefined;
  }

  get firstChild(): Handle | undefined {
    return this.record.children?.first;
  }

  get lastChild(): Handle | undefined {
    return this.record.children?.last;
  }

  get prevSibling(): Handle | undefined {
    return this.record.prevSibling;
  }

  get nextSibling(): Handle | undefined {
    return this.record.nextSibling;
  }

  /**
   * Values of this node's direct children, in order. Grandchildren are not visited.
   * 按顺序返回此节点直接子节点的值，不访问孙节点。
   */
  iterChildren(): SceneGraphChildIter<T> {
    return new SceneGraphChildIter(this.arena, this.record.children, this.guardFor?.('iterChildren'));
  }
}
