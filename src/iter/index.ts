/**
 * Traversal engine exports
 * 遍历引擎导出
 */

export { SceneGraphIter } from './SceneGraphIter';
export { SceneGraphIterMut } from './SceneGraphIterMut';
export { SceneGraphChildIter } from './SceneGraphChildIter';
export { SceneGraphDetachIter } from './SceneGraphDetachIter';
export type { DetachedNode } from './SceneGraphDetachIter';
