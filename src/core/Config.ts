/**
 * Scene graph configuration
 * 场景图配置
 */

export interface SceneGraphConfig {
  /** Initial arena slot capacity 竞技场初始槽位容量 */
  initialCapacity: number;
  /** Log a warning when a stale handle is removed or detached 移除或分离过期句柄时输出警告 */
  warnOnStaleHandles: boolean;
}

export const DEFAULT_SCENE_GRAPH_CONFIG: Readonly<SceneGraphConfig> = {
  initialCapacity: 64,
  warnOnStaleHandles: false,
};

/**
 * Merge user overrides over the defaults
 * 将用户覆盖项合并到默认配置
 */
export function resolveConfig(config?: Partial<SceneGraphConfig>): SceneGraphConfig {
  const resolved = { ...DEFAULT_SCENE_GRAPH_CONFIG, ...config };
  if (!Number.isInteger(resolved.initialCapacity) || resolved.initialCapacity < 1) {
    throw new RangeError(`[SceneGraph] initialCapacity must be a positive integer, got ${resolved.initialCapacity}`);
  }
  return resolved;
}
