/**
 * Scene graph - an ordered rose tree over a generational arena
 * 场景图 - 基于世代竞技场的有序多叉树
 *
 * A single implicit root owns an ordered list of children, each of which may own children of its
 * own. Children are kept in a doubly linked sibling list, so attach, detach and move are O(1)
 * apart from the subtree walk that frees removed nodes.
 * 单一隐式根拥有有序子节点列表，每个子节点又可拥有子节点。子节点保存在双向兄弟链表中，
 * 因此附加、分离和移动均为O(1)（释放子树时的遍历除外）。
 *
 * @example
 * ```typescript
 * const graph = new SceneGraph('Root');
 * const arm = graph.attachAtRoot('Arm');
 * graph.attach(arm, 'Hand');
 *
 * for (const [parent, node] of graph) {
 *   console.log(`${parent} -> ${node}`);
 * }
 * ```
 */

import { Arena } from './Arena';
import { resolveConfig } from './Config';
import type { SceneGraphConfig } from './Config';
import {
  CycleError,
  GraphCorruptionError,
  GraphModifiedError,
  NodeNotFoundError,
  ParentNotFoundError,
  RootNodeError,
} from './Errors';
import { NodeView } from './NodeView';
import type { GuardFactory } from './NodeView';
import { SceneNode, expectNode } from './SceneNode';
import type { Children, NodeMut, NodeRef, ValueSlot } from './SceneNode';
import { SceneGraphChildIter } from '../iter/SceneGraphChildIter';
import { SceneGraphDetachIter } from '../iter/SceneGraphDetachIter';
import { SceneGraphIter } from '../iter/SceneGraphIter';
import { SceneGraphIterMut } from '../iter/SceneGraphIterMut';
import { ROOT, formatIndex } from '../utils/Types';
import type { Handle, NodeIndex } from '../utils/Types';

export class SceneGraph<T> implements Iterable<[T, T]> {
  private readonly arena: Arena<SceneNode<T>>;
  private readonly rootSlot: ValueSlot<T>;
  private rootChildren: Children | undefined = undefined;
  private readonly config: SceneGraphConfig;

  // Bumped by every structural change; live iterators compare against it
  // 每次结构变更时递增；存活的迭代器据此校验
  private _epoch = 0;

  // Detaching iterator handed to a caller that may not have finished it yet, and the epoch it began at
  // 交给调用方、可能尚未消费完的分离迭代器及其开始时的纪元
  private pendingDetach: SceneGraphDetachIter<T> | undefined = undefined;
  private pendingEpoch = 0;

  private readonly guardFactory: GuardFactory = operation => this.guardFor(operation);

  /**
   * Create a new scene graph holding only its root
   * 创建仅包含根节点的新场景图
   */
  constructor(root: T, config?: Partial<SceneGraphConfig>) {
    this.config = resolveConfig(config);
    this.arena = new Arena<SceneNode<T>>(this.config.initialCapacity);
    this.rootSlot = { value: root };
  }

  /**
   * Structural version; changes whenever nodes are attached, moved or removed
   * 结构版本号；附加、移动或移除节点时变化
   */
  get epoch(): number {
    return this._epoch;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // 变更
  // ---------------------------------------------------------------------------

  /**
   * Remove every node except the root. Arena capacity is kept for later attaches.
   * 移除除根以外的所有节点。保留竞技场容量以供后续附加。
   */
  clear(): void {
    this.settle();
    this.arena.clear();
    this.rootChildren = undefined;
    this.bump();
  }

  /**
   * Attach a value as the last child of `parent`
   * 将值附加为 `parent` 的最后一个子节点
   *
   * @throws ParentNotFoundError when `parent` is a stale handle; nothing is modified
   */
  attach(parent: NodeIndex, value: T): NodeIndex {
    this.settle();
    if (!this.contains(parent)) {
      throw new ParentNotFoundError('attach', parent);
    }

    const node = new SceneNode(value, parent);
    const handle = this.arena.insert(node);
    this.place(parent, handle, node);
    this.bump();

    return handle;
  }

  /**
   * Attach a value directly under the root. Never fails.
   * 将值直接附加到根下。永不失败。
   */
  attachAtRoot(value: T): NodeIndex {
    return this.attach(ROOT, value);
  }

  /**
   * Splice another graph under `parent`. The other graph's root becomes the returned node and
   * its descendants follow in the same shape. `other` is left holding only its root.
   * 将另一个图拼接到 `parent` 下。对方的根成为返回的节点，其后代保持原有结构。`other` 仅保留其根。
   */
  attachGraph(parent: NodeIndex, other: SceneGraph<T>): NodeIndex {
    if (other === this) {
      throw new CycleError('attachGraph', ROOT, parent);
    }
    this.settle();
    if (!this.contains(parent)) {
      throw new ParentNotFoundError('attachGraph', parent);
    }

    const newRoot = this.attach(parent, other.root());
    const remap = new Map<NodeIndex, NodeIndex>([[ROOT, newRoot]]);

    for (const detached of other.iterDetachFromRoot()) {
      const target = this.remapped(remap, detached.parentIndex, 'attachGraph');
      remap.set(detached.nodeIndex, this.attach(target, detached.value));
    }

    return newRoot;
  }

  /**
   * Remove `node` and its subtree, returning them as a new graph rooted at `node`'s value.
   * Returns undefined for ROOT or a stale handle.
   * 移除 `node` 及其子树，并以 `node` 的值为根返回新图。ROOT 或过期句柄返回 undefined。
   */
  detach(node: NodeIndex): SceneGraph<T> | undefined {
    this.settle();
    if (node === ROOT) return undefined;

    const removed = this.arena.remove(node);
    if (!removed) {
      this.warnStale('detach', node);
      return undefined;
    }

    const graph = new SceneGraph<T>(removed.value, this.config);
    const remap = new Map<NodeIndex, NodeIndex>([[node, ROOT]]);

    for (const detached of new SceneGraphDetachIter(this.arena, node, removed.children)) {
      const target = graph.remapped(remap, detached.parentIndex, 'detach');
      remap.set(detached.nodeIndex, graph.attach(target, detached.value));
    }

    this.heal(node, removed, 'detach');
    removed.unlink();
    this.bump();

    return graph;
  }

  /**
   * Move `node` (with its subtree) to become the last child of `newParent`.
   * Values are not copied and handles stay valid.
   * 将 `node`（连同其子树）移动为 `newParent` 的最后一个子节点。值不复制，句柄保持有效。
   *
   * @throws NodeNotFoundError when `node` is ROOT or either index is stale
   * @throws CycleError when `newParent` lies inside `node`'s subtree
   */
  moveNode(node: NodeIndex, newParent: NodeIndex): void {
    this.settle();
    const moving = node === ROOT ? undefined : this.arena.get(node);
    if (!moving) {
      throw new NodeNotFoundError('moveNode', node);
    }
    if (!this.contains(newParent)) {
      throw new NodeNotFoundError('moveNode', newParent);
    }
    if (newParent === node || this.isAncestor(node, newParent)) {
      throw new CycleError('moveNode', node, newParent);
    }

    this.heal(node, moving, 'moveNode');
    moving.prevSibling = undefined;
    moving.nextSibling = undefined;
    moving.parentIndex = newParent;
    this.place(newParent, node, moving);
    this.bump();
  }

  /**
   * Remove `node` and its whole subtree, discarding the values.
   * Stale handles are ignored. Runs without recursion, so arbitrarily deep subtrees are fine.
   * 移除 `node` 及其整个子树并丢弃值。忽略过期句柄。无递归，任意深度的子树均可。
   *
   * @throws RootNodeError for ROOT
   */
  remove(node: NodeIndex): void {
    if (node === ROOT) {
      throw new RootNodeError('remove');
    }
    this.settle();

    const removed = this.arena.remove(node);
    if (!removed) {
      this.warnStale('remove', node);
      return;
    }

    new SceneGraphDetachIter(this.arena, node, removed.children).drain();

    this.heal(node, removed, 'remove');
    removed.unlink();
    this.bump();
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // 查询
  // ---------------------------------------------------------------------------

  /**
   * Check if index refers to a live node. ROOT is always contained.
   * Nodes a live detaching iterator has not reached yet are still contained.
   * 检查索引是否指向存活节点。ROOT 总是存在。存活的分离迭代器尚未到达的节点仍视为存在。
   */
  contains(node: NodeIndex): boolean {
    return node === ROOT || this.arena.contains(node);
  }

  /**
   * Read-only view of a node. ROOT is not a stored node and gives undefined; see `root()`.
   * 节点的只读视图。ROOT 不是存储节点，返回 undefined；请使用 `root()`。
   */
  get(node: NodeIndex): NodeRef<T> | undefined {
    return this.getMut(node);
  }

  /**
   * View of a node whose value may be replaced; its links stay read-only
   * 可替换值的节点视图；链接保持只读
   */
  getMut(node: NodeIndex): NodeMut<T> | undefined {
    const record = node === ROOT ? undefined : this.arena.get(node);
    return record ? new NodeView(record, this.arena, this.guardFactory) : undefined;
  }

  root(): T {
    return this.rootSlot.value;
  }

  /**
   * Writable slot holding the root value
   * 存放根值的可写槽
   */
  rootMut(): ValueSlot<T> {
    return this.rootSlot;
  }

  /**
   * Parent of a node; undefined for ROOT and stale handles
   * 节点的父节点；ROOT 与过期句柄返回 undefined
   */
  parent(node: NodeIndex): NodeIndex | undefined {
    return node === ROOT ? undefined : this.arena.get(node)?.parentIndex;
  }

  /**
   * Number of non-root nodes, counting those a live detaching iterator has not reached yet
   * 非根节点数量，包括存活的分离迭代器尚未到达的节点
   */
  size(): number {
    return this.arena.size;
  }

  /**
   * True when the graph holds only its root
   * 图中仅有根节点时为 true
   */
  isEmpty(): boolean {
    return this.rootChildren === undefined;
  }

  /**
   * Parent chain of a node, nearest first, ending with ROOT. Empty for ROOT and stale handles.
   * 节点的父链，由近及远，以 ROOT 结尾。ROOT 与过期句柄返回空数组。
   */
  ancestors(node: NodeIndex): NodeIndex[] {
    this.settleFor(node);
    const chain: NodeIndex[] = [];
    let current = this.parent(node);
    while (current !== undefined) {
      chain.push(current);
      if (current === ROOT) break;
      current = expectNode(this.arena, current, 'ancestors').parentIndex;
    }
    return chain;
  }

  /**
   * Distance from the root: 0 for ROOT, 1 for its children. Undefined for stale handles.
   * 到根的距离：ROOT 为0，其子节点为1。过期句柄返回 undefined。
   */
  depth(node: NodeIndex): number | undefined {
    if (node === ROOT) return 0;
    this.settle();
    if (!this.contains(node)) return undefined;
    return this.ancestors(node).length;
  }

  /**
   * Check whether `ancestor` lies strictly above `node`
   * 检查 `ancestor` 是否严格位于 `node` 之上
   */
  isAncestor(ancestor: NodeIndex, node: NodeIndex): boolean {
    if (ancestor === node) return false;
    this.settleFor(node);
    let current = this.parent(node);
    while (current !== undefined) {
      if (current === ancestor) return true;
      if (current === ROOT) return false;
      current = expectNode(this.arena, current, 'isAncestor').parentIndex;
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Traversal
  // 遍历
  // ---------------------------------------------------------------------------

  /**
   * Depth-first traversal of every node below the root, yielding `[parentValue, value]`
   * 深度优先遍历根以下所有节点，产出 `[父值, 值]`
   */
  iter(): SceneGraphIter<T> {
    return this.iterFromNode(ROOT);
  }

  [Symbol.iterator](): SceneGraphIter<T> {
    return this.iter();
  }

  /**
   * Depth-first traversal of the subtree below `node` (not including `node` itself)
   * 深度优先遍历 `node` 以下的子树（不含 `node` 本身）
   *
   * @throws NodeNotFoundError for a stale handle
   */
  iterFromNode(node: NodeIndex): SceneGraphIter<T> {
    this.settleFor(node);
    if (node === ROOT) {
      return new SceneGraphIter(this.arena, this.rootSlot.value, this.rootChildren, this.guardFor('iter'));
    }
    const start = this.arena.get(node);
    if (!start) {
      throw new NodeNotFoundError('iterFromNode', node);
    }
    return new SceneGraphIter(this.arena, start.value, start.children, this.guardFor('iter'));
  }

  iterMut(): SceneGraphIterMut<T> {
    return this.iterMutFromNode(ROOT);
  }

  /**
   * Mutable depth-first traversal of the subtree below `node`, yielding writable slots
   * 可变深度优先遍历 `node` 以下的子树，产出可写槽
   *
   * @throws NodeNotFoundError for a stale handle
   */
  iterMutFromNode(node: NodeIndex): SceneGraphIterMut<T> {
    this.settleFor(node);
    return new SceneGraphIterMut(
      this.arena,
      this.rootSlot,
      node,
      this.childrenOf(node, 'iterMutFromNode'),
      this.guardFactory
    );
  }

  /**
   * Values of the direct children of `parent`, in order; grandchildren are not visited
   * 按顺序返回 `parent` 直接子节点的值；不访问孙节点
   *
   * @throws NodeNotFoundError for a stale handle
   */
  iterDirectChildren(parent: NodeIndex): SceneGraphChildIter<T> {
    this.settleFor(parent);
    return new SceneGraphChildIter(
      this.arena,
      this.childrenOf(parent, 'iterDirectChildren'),
      this.guardFor('iterDirectChildren')
    );
  }

  /**
   * Remove every non-root node while iterating over them
   * 边遍历边移除所有非根节点
   */
  iterDetachFromRoot(): SceneGraphDetachIter<T> {
    return this.iterDetach(ROOT);
  }

  /**
   * Remove every descendant of `node` while iterating over them; `node` itself stays.
   * Lookups may be made inside the loop. A structural change (or a walk started from a branch)
   * finishes the removal first, and the iterator then throws GraphModifiedError.
   * 边遍历边移除 `node` 的所有后代；`node` 本身保留。循环中可进行查询；
   * 结构变更（或从分支开始的遍历）会先完成移除，随后迭代器抛出 GraphModifiedError。
   *
   * @throws NodeNotFoundError for a stale handle
   */
  iterDetach(node: NodeIndex): SceneGraphDetachIter<T> {
    this.settle();
    const children = this.childrenOf(node, 'iterDetach');
    this.setChildren(node, undefined);
    this.bump();

    const iter = new SceneGraphDetachIter(this.arena, node, children);
    this.pendingDetach = iter;
    this.pendingEpoch = this._epoch;
    return iter;
  }

  /**
   * Every node in arena order rather than tree order
   * 按竞技场顺序（而非树顺序）遍历所有节点
   */
  *iterOutOfOrder(): IterableIterator<[NodeIndex, T]> {
    this.settle();
    const guard = this.guardFor('iterOutOfOrder');
    for (const [handle, node] of this.arena.entries()) {
      guard();
      yield [handle, node.value];
    }
  }

  // ---------------------------------------------------------------------------
  // Linkage
  // 链接维护
  // ---------------------------------------------------------------------------

  /**
   * Link `handle` as the last child of `parent`
   * 将 `handle` 链接为 `parent` 的最后一个子节点
   */
  private place(parent: NodeIndex, handle: Handle, node: SceneNode<T>): void {
    const children = this.childrenOf(parent, 'place');
    if (!children) {
      this.setChildren(parent, { first: handle, last: handle });
      return;
    }

    const oldLast = expectNode(this.arena, children.last, 'place');
    oldLast.nextSibling = handle;
    node.prevSibling = children.last;
    children.last = handle;
  }

  /**
   * Splice a removed or moving node out of its parent's child list
   * 将被移除或移动的节点从其父节点的子链表中摘除
   */
  private heal(handle: Handle, node: SceneNode<T>, operation: string): void {
    const { parentIndex: parent, prevSibling: prev, nextSibling: next } = node;
    const children = this.childrenOf(parent, operation);
    if (!children) {
      throw new GraphCorruptionError(operation, `${formatIndex(parent)} has no child list`);
    }

    if (children.first === handle && children.last === handle) {
      this.setChildren(parent, undefined);
      return;
    }

    if (children.first === handle) {
      if (next === undefined) {
        throw new GraphCorruptionError(operation, `first child ${formatIndex(handle)} has no next sibling`);
      }
      children.first = next;
    }
    if (children.last === handle) {
      if (prev === undefined) {
        throw new GraphCorruptionError(operation, `last child ${formatIndex(handle)} has no previous sibling`);
      }
      children.last = prev;
    }

    if (prev !== undefined) {
      expectNode(this.arena, prev, operation).nextSibling = next;
    }
    if (next !== undefined) {
      expectNode(this.arena, next, operation).prevSibling = prev;
    }
  }

  /**
   * Child list of ROOT or of a live node
   * ROOT 或存活节点的子链表
   *
   * @throws NodeNotFoundError for a stale handle
   */
  private childrenOf(node: NodeIndex, operation: string): Children | undefined {
    if (node === ROOT) return this.rootChildren;
    const record = this.arena.get(node);
    if (!record) {
      throw new NodeNotFoundError(operation, node);
    }
    return record.children;
  }

  private setChildren(node: NodeIndex, children: Children | undefined): void {
    if (node === ROOT) {
      this.rootChildren = children;
    } else {
      expectNode(this.arena, node, 'setChildren').children = children;
    }
  }

  private remapped(remap: Map<NodeIndex, NodeIndex>, oldParent: NodeIndex, operation: string): NodeIndex {
    const target = remap.get(oldParent);
    if (target === undefined) {
      throw new GraphCorruptionError(operation, `parent ${formatIndex(oldParent)} was yielded after its child`);
    }
    return target;
  }

  // ---------------------------------------------------------------------------
  // Bookkeeping
  // 内部簿记
  // ---------------------------------------------------------------------------

  private bump(): void {
    this._epoch++;
  }

  private guardFor(operation: string): () => void {
    const expected = this._epoch;
    return () => {
      if (this._epoch !== expected) {
        throw new GraphModifiedError(operation, expected, this._epoch);
      }
    };
  }

  /**
   * Finish a detaching iterator the caller walked away from or is still inside of.
   * Runs before anything that could reach the nodes it has not removed yet.
   * 完成调用方放弃或仍在使用的分离迭代器。在可能触及其尚未移除节点的操作之前执行。
   */
  private settle(): void {
    const pending = this.pendingDetach;
    if (!pending) return;
    this.pendingDetach = undefined;
    if (pending.exhausted) return;

    this.bump();
    pending.interrupt(new GraphModifiedError('iterDetach', this.pendingEpoch, this._epoch));
  }

  // Walks from ROOT never reach a pending subtree; walks from a branch might
  private settleFor(node: NodeIndex): void {
    if (node !== ROOT) this.settle();
  }

  private warnStale(operation: string, node: NodeIndex): void {
    if (this.config.warnOnStaleHandles) {
      console.warn(`[SceneGraph] ${operation}: ${formatIndex(node)} is not in the graph, ignoring`);
    }
  }
}
