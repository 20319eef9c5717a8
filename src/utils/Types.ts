/**
 * Common type definitions for the scene graph
 * 场景图通用类型定义
 */

/**
 * Arena handle - pure numeric handle with generation
 * 竞技场句柄 - 带世代号的纯数字句柄
 *
 * Format: 28 bits index + 20 bits generation = 48 bits (< 2^53 safe)
 * 格式：28位索引 + 20位世代号 = 48位（< 2^53安全）
 */
export type Handle = number;

/**
 * Index of a node in a scene graph: either ROOT or a branch handle
 * 场景图节点索引：ROOT 或分支句柄
 */
export type NodeIndex = number;

// Handle manipulation constants and functions
// 句柄操作常量和函数
const INDEX_BITS = 28;
const GENERATION_BITS = 20;
const INDEX_MASK = (1 << INDEX_BITS) - 1;
const INDEX_BASE = 1 << INDEX_BITS;

/** Largest slot index an arena can hand out 竞技场可分配的最大槽位索引 */
export const MAX_SLOTS = INDEX_MASK;

/** Generations wrap after this value 世代号超过此值后回绕 */
export const MAX_GENERATION = (1 << GENERATION_BITS) - 1;

/**
 * The implicit root of every scene graph. Slot 0 is never allocated, so no branch handle equals it.
 * 每个场景图的隐式根。槽位0永不分配，因此任何分支句柄都不等于它。
 */
export const ROOT: NodeIndex = 0;

/**
 * Create handle from index and generation
 * 从索引和世代号创建句柄
 */
export function makeHandle(index: number, generation: number): Handle {
  return generation * INDEX_BASE + index;
}

/**
 * Extract slot index from handle
 * 从句柄提取槽位索引
 */
export function indexOf(handle: Handle): number {
  return handle & INDEX_MASK;
}

/**
 * Extract generation from handle
 * 从句柄提取世代号
 */
export function genOf(handle: Handle): number {
  return (handle / INDEX_BASE) | 0;
}

/**
 * Check whether a node index refers to the root
 * 检查节点索引是否指向根
 */
export function isRoot(index: NodeIndex): boolean {
  return index === ROOT;
}

/**
 * Human readable form for logs and error messages, e.g. `Branch(3v1)` or `Root`
 * 用于日志和错误信息的可读形式
 */
export function formatIndex(index: NodeIndex): string {
  if (index === ROOT) return 'Root';
  return `Branch(${indexOf(index)}v${genOf(index)})`;
}
