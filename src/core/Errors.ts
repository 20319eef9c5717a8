/**
 * Error types raised by scene graph operations
 * 场景图操作抛出的错误类型
 */

import { formatIndex } from '../utils/Types';
import type { NodeIndex } from '../utils/Types';

/**
 * Base class for every scene graph error
 * 所有场景图错误的基类
 */
export abstract class SceneGraphError extends Error {
  /**
   * Operation being performed when the error occurred
   * 发生错误时正在执行的操作
   */
  public readonly operation: string;

  /**
   * Additional context information
   * 附加上下文信息
   */
  public readonly context: Record<string, unknown>;

  constructor(message: string, operation: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.operation = operation;
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      operation: this.operation,
      context: this.context,
    };
  }
}

/**
 * The parent requested for an attach does not exist
 * 附加操作请求的父节点不存在
 */
export class ParentNotFoundError extends SceneGraphError {
  constructor(operation: string, public readonly parent: NodeIndex) {
    super(`parent node ${formatIndex(parent)} not found`, operation, { parent });
  }
}

/**
 * The node does not exist, or ROOT was given where a branch is required
 * 节点不存在，或在需要分支的地方传入了ROOT
 */
export class NodeNotFoundError extends SceneGraphError {
  constructor(operation: string, public readonly node: NodeIndex) {
    super(`node ${formatIndex(node)} does not exist`, operation, { node });
  }
}

/**
 * The root cannot be removed
 * 根节点不可移除
 */
export class RootNodeError extends SceneGraphError {
  constructor(operation: string) {
    super('the root node cannot be removed', operation);
  }
}

/**
 * The operation would make a node its own ancestor
 * 该操作会使节点成为自己的祖先
 */
export class CycleError extends SceneGraphError {
  constructor(operation: string, node: NodeIndex, target: NodeIndex) {
    super(
      `cannot place ${formatIndex(node)} under ${formatIndex(target)}: target is inside its subtree`,
      operation,
      { node, target }
    );
  }
}

/**
 * The graph was structurally changed while an iterator over it was live
 * 迭代器存活期间图结构被修改
 */
export class GraphModifiedError extends SceneGraphError {
  constructor(operation: string, expectedEpoch: number, actualEpoch: number) {
    super('scene graph was modified during iteration', operation, { expectedEpoch, actualEpoch });
  }
}

/**
 * Internal linkage was found inconsistent
 * 内部链接不一致
 */
export class GraphCorruptionError extends SceneGraphError {
  constructor(operation: string, detail: string) {
    super(`scene graph linkage is corrupt: ${detail}`, operation);
  }
}
