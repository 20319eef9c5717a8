/**
 * Node record stored in the arena
 * 存放在竞技场中的节点记录
 */

import { formatIndex } from '../utils/Types';
import type { Handle, NodeIndex } from '../utils/Types';
import type { Arena } from './Arena';
import { GraphCorruptionError } from './Errors';

/**
 * Head and tail of a child list; absent when there are no children
 * 子节点链表的头和尾；无子节点时不存在
 */
export interface Children {
  first: Handle;
  last: Handle;
}

/**
 * Writable value holder, used for the root and yielded by mutable iteration
 * 可写的值容器，用于根节点并由可变迭代产出
 */
export interface ValueSlot<T> {
  value: T;
}

/**
 * Read-only view of a node. Link fields are handles into the same graph.
 * 节点的只读视图。链接字段为同一图中的句柄。
 */
export interface NodeRef<T> {
  readonly value: T;
  readonly parent: NodeIndex;
  readonly hasChildren: boolean;
  readonly firstChild: Handle | undefined;
  readonly lastChild: Handle | undefined;
  readonly prevSibling: Handle | undefined;
  readonly nextSibling: Handle | undefined;
  /** Values of the direct children, in order 按顺序返回直接子节点的值 */
  iterChildren(): IterableIterator<T>;
}

/**
 * Node view whose value may be replaced
 * 可替换值的节点视图
 */
export interface NodeMut<T> extends NodeRef<T> {
  value: T;
}

/**
 * A value plus its links to parent, children and siblings.
 * Only SceneGraph and the iterators hold these records; callers get a NodeView.
 * 值及其与父、子、兄弟节点的链接。仅 SceneGraph 与迭代器持有该记录；调用方拿到的是 NodeView。
 */
export class SceneNode<T> {
  children: Children | undefined = undefined;
  prevSibling: Handle | undefined = undefined;
  nextSibling: Handle | undefined = undefined;

  constructor(public value: T, public parentIndex: NodeIndex) {}

  unlink(): void {
    this.children = undefined;
    this.prevSibling = undefined;
    this.nextSibling = undefined;
  }
}

/**
 * Resolve a handle that the linkage says must be live
 * 解析链接结构声明必须存活的句柄
 */
export function expectNode<T>(arena: Arena<SceneNode<T>>, handle: Handle, operation: string): SceneNode<T> {
  const node = arena.get(handle);
  if (!node) {
    throw new GraphCorruptionError(operation, `linked handle ${formatIndex(handle)} is not in the arena`);
  }
  return node;
}

/**
 * Remove a handle that the linkage says must be live, returning its record
 * 移除链接结构声明必须存活的句柄并返回其记录
 */
export function takeNode<T>(arena: Arena<SceneNode<T>>, handle: Handle, operation: string): SceneNode<T> {
  const node = arena.remove(handle);
  if (!node) {
    throw new GraphCorruptionError(operation, `linked handle ${formatIndex(handle)} is not in the arena`);
  }
  return node;
}
