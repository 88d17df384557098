#!/usr/bin/env tsx
/**
 * Load a graph document and execute it
 *
 * Usage: npm run run-graph -- [graph.json] [timeoutMs]
 */

import 'dotenv/config';

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import { Engine } from '../src/engine/index.js';
import { formatDuration } from '../src/utils/timer.js';

const DEFAULT_GRAPH = new URL('../graphs/counter-sum.json', import.meta.url);

async function main(): Promise<number> {
  const [graphArg, timeoutArg] = process.argv.slice(2);
  const graphPath = graphArg ?? DEFAULT_GRAPH;
  const timeoutMs = timeoutArg === undefined ? undefined : Number(timeoutArg);
  if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs < 0)) {
    console.error(chalk.red(`Invalid timeout '${timeoutArg}'`));
    return 2;
  }

  const document: unknown = JSON.parse(await readFile(graphPath, 'utf8'));
  const engine = new Engine();
  engine.load(document);

  console.log(chalk.cyan(`Running ${String(graphPath)}`));
  const result = await engine.execute({ timeoutMs });
  engine.dispose();

  if (result.success) {
    console.log(chalk.green(`✓ Finished in ${formatDuration(result.durationMs)}`));
    for (const operation of result.summary.operationTotals) {
      console.log(chalk.dim(`  ${operation.name}: ${operation.count} steps, ${formatDuration(operation.totalMs)}`));
    }
    return 0;
  }

  console.error(chalk.red(`✗ ${result.operation} failed: ${result.message}`));
  return 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  });
