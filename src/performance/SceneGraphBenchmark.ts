/**
 * Performance benchmark for scene graph operations
 * 场景图操作性能基准测试
 */

import { SceneGraph } from '../core/SceneGraph';
import type { NodeIndex } from '../utils/Types';

export type BenchmarkCase =
  | 'attach-remove-single'
  | 'attach-remove-wide'
  | 'iter-wide'
  | 'iter-small'
  | 'detach-deep';

export const BENCHMARK_CASES: readonly BenchmarkCase[] = [
  'attach-remove-single',
  'attach-remove-wide',
  'iter-wide',
  'iter-small',
  'detach-deep',
];

export interface BenchmarkResult {
  name: BenchmarkCase;
  nodeCount: number;
  iterations: number;
  totalMs: number;
  meanMs: number;
  opsPerSecond: number;
}

export interface BenchmarkConfig {
  iterations: number;
  warmupIterations: number;
  /** Node count used by the wide and deep cases 宽/深用例使用的节点数 */
  nodeCount: number;
  cases: readonly BenchmarkCase[];
}

const SMALL_NODE_COUNT = 64;

/**
 * Times scene graph operations with warmup
 * 带预热的场景图操作计时
 */
export class SceneGraphBenchmark {
  private config: BenchmarkConfig;

  constructor(config?: Partial<BenchmarkConfig>) {
    this.config = {
      iterations: 1000,
      warmupIterations: 100,
      nodeCount: 50_000,
      cases: BENCHMARK_CASES,
      ...config
    };
  }

  run(): BenchmarkResult[] {
    return this.config.cases.map(name => this.runCase(name));
  }

  runCase(name: BenchmarkCase): BenchmarkResult {
    switch (name) {
      case 'attach-remove-single':
        return this.measure(name, 0, attachRemove(new SceneGraph('Root')));
      case 'attach-remove-wide':
        return this.measure(name, this.config.nodeCount, attachRemove(wideGraph(this.config.nodeCount)));
      case 'iter-wide':
        return this.measure(name, this.config.nodeCount, iterate(wideGraph(this.config.nodeCount)));
      case 'iter-small':
        return this.measure(name, SMALL_NODE_COUNT, iterate(wideGraph(SMALL_NODE_COUNT)));
      case 'detach-deep':
        // Each run rebuilds its chain, so the deep case uses fewer repetitions
        // 每次运行都会重建链，因此深度用例重复次数更少
        return this.measure(name, this.config.nodeCount, buildAndRemoveChain(this.config.nodeCount), 10);
    }
  }

  private measure(name: BenchmarkCase, nodeCount: number, op: () => void, divisor = 1): BenchmarkResult {
    const iterations = Math.max(1, Math.floor(this.config.iterations / divisor));
    const warmup = Math.floor(this.config.warmupIterations / divisor);

    for (let i = 0; i < warmup; i++) op();

    const start = performance.now();
    for (let i = 0; i < iterations; i++) op();
    const totalMs = performance.now() - start;

    const meanMs = totalMs / iterations;
    return {
      name,
      nodeCount,
      iterations,
      totalMs,
      meanMs,
      opsPerSecond: meanMs > 0 ? 1000 / meanMs : Infinity,
    };
  }
}

function wideGraph(count: number): SceneGraph<string> {
  const graph = new SceneGraph('Root', { initialCapacity: count + 1 });
  for (let i = 0; i < count; i++) {
    graph.attachAtRoot(`Node_${i}`);
  }
  return graph;
}

function attachRemove(graph: SceneGraph<string>): () => void {
  return () => {
    graph.remove(graph.attachAtRoot('Finality'));
  };
}

function iterate(graph: SceneGraph<string>): () => void {
  return () => {
    let visited = 0;
    for (const _pair of graph) visited++;
    if (visited !== graph.size()) {
      throw new Error(`[SceneGraphBenchmark] visited ${visited} of ${graph.size()} nodes`);
    }
  };
}

function buildAndRemoveChain(depth: number): () => void {
  const graph = new SceneGraph('Root', { initialCapacity: depth + 1 });
  return () => {
    let parent: NodeIndex = graph.attachAtRoot('Link_0');
    const top = parent;
    for (let i = 1; i < depth; i++) {
      parent = graph.attach(parent, `Link_${i}`);
    }
    graph.remove(top);
  };
}
