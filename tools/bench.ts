#!/usr/bin/env node

/**
 * CLI tool for benchmarking scene graph operations
 * 场景图操作基准测试的CLI工具
 */

import { pathToFileURL } from 'node:url';
import { program } from 'commander';
import chalk from 'chalk';
import {
  BENCHMARK_CASES,
  SceneGraphBenchmark,
  type BenchmarkCase,
  type BenchmarkResult
} from '../src/performance/SceneGraphBenchmark';

function isBenchmarkCase(name: string): name is BenchmarkCase {
  return BENCHMARK_CASES.some(c => c === name);
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function printResult(result: BenchmarkResult): void {
  console.log(chalk.yellow(`⚙️  ${result.name}`) + chalk.gray(` (${result.nodeCount} nodes)`));
  console.log(chalk.gray(`   ├── ${result.iterations} iterations in ${result.totalMs.toFixed(2)}ms`));
  console.log(chalk.gray(`   └── `) + chalk.green(`${result.meanMs.toFixed(4)}ms/op, ${Math.round(result.opsPerSecond)} ops/s`));
}

/**
 * Main program entry point
 * 主程序入口点
 */
async function main(): Promise<void> {
  program
    .name('bench')
    .description('Benchmark scene graph attach, remove and traversal')
    .version('1.0.0')
    .option('-n, --nodes <count>', 'Node count for the wide and deep cases', '50000')
    .option('-i, --iterations <count>', 'Timed iterations per case', '1000')
    .option('-w, --warmup <count>', 'Warmup iterations per case', '100')
    .option('--only <cases>', `Comma-separated subset of: ${BENCHMARK_CASES.join(', ')}`)
    .action((options: { nodes: string; iterations: string; warmup: string; only?: string }) => {
      const cases = options.only
        ? options.only.split(',').map(s => s.trim())
        : [...BENCHMARK_CASES];

      const unknown = cases.filter(c => !isBenchmarkCase(c));
      if (unknown.length > 0) {
        throw new Error(`Unknown benchmark case(s): ${unknown.join(', ')}`);
      }

      const benchmark = new SceneGraphBenchmark({
        nodeCount: parsePositiveInt(options.nodes, '--nodes'),
        iterations: parsePositiveInt(options.iterations, '--iterations'),
        warmupIterations: Number.parseInt(options.warmup, 10) || 0,
        cases: cases.filter(isBenchmarkCase)
      });

      console.log(chalk.blue(`📊 Running ${cases.length} benchmark case(s)...`));
      for (const result of benchmark.run()) {
        printResult(result);
      }
    });

  await program.parseAsync();
}

// Run the CLI tool 运行CLI工具
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch(error => {
    console.error(chalk.red('❌ Fatal error:'), error);
    process.exit(1);
  });
}
