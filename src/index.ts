/**
 * scene-graph-ts - Ordered rose tree with stable handles and O(1) relinking
 * 具有稳定句柄和O(1)重链接的有序多叉树
 *
 * @packageDocumentation
 */

// Handles and indices
export type { Handle, NodeIndex } from './utils/Types';
export {
  ROOT,
  isRoot,
  makeHandle,
  indexOf,
  genOf,
  formatIndex,
  MAX_SLOTS,
  MAX_GENERATION
} from './utils/Types';

// Storage
export { Arena } from './core/Arena';
export { NodeView } from './core/NodeView';
export type { GuardFactory } from './core/NodeView';
export type { NodeRef, NodeMut, ValueSlot } from './core/SceneNode';

// Scene graph
export { SceneGraph } from './core/SceneGraph';
export { DEFAULT_SCENE_GRAPH_CONFIG } from './core/Config';
export type { SceneGraphConfig } from './core/Config';

// Errors
export {
  SceneGraphError,
  ParentNotFoundError,
  NodeNotFoundError,
  RootNodeError,
  CycleError,
  GraphModifiedError,
  GraphCorruptionError
} from './core/Errors';

// Traversal
export {
  SceneGraphIter,
  SceneGraphIterMut,
  SceneGraphChildIter,
  SceneGraphDetachIter
} from './iter';
export type { DetachedNode } from './iter';

// Benchmarks
export { SceneGraphBenchmark, BENCHMARK_CASES } from './performance/SceneGraphBenchmark';
export type { BenchmarkCase, BenchmarkConfig, BenchmarkResult } from './performance/SceneGraphBenchmark';
