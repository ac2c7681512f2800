/**
 * inspect command - List the nodes one checkout declares
 */

import chalk from 'chalk';
import { loadWithSpinner } from './check.js';
import { formatTypes, formatWarning } from '../utils/report-formatter.js';
import type { LoadResult, NodeDeclaration } from '../types/node-registry.js';
import type { InspectOptions } from '../types.js';

export async function inspect(directory: string, options: InspectOptions = {}): Promise<LoadResult> {
  const result = await loadWithSpinner('repository', directory, {
    source: options.source,
    manifestFile: options.manifest,
  });

  const nodes = [...result.registry.values()].sort(byIdentifier);

  if (options.json) {
    console.log(
      JSON.stringify(
        { root: result.root, source: result.source, nodes, warnings: result.warnings },
        null,
        2
      )
    );
    return result;
  }

  console.log(chalk.blue.bold(`\n📦 Custom Nodes (${result.source})\n`));
  console.log(chalk.gray('  Repository:'), result.root);
  console.log(chalk.gray('  Nodes:'), nodes.length);
  console.log();

  nodes.forEach((node) => {
    const origin = node.className ? `${node.className} in ${node.sourceFile}` : node.sourceFile;
    console.log(`  ${chalk.cyan(node.identifier)}: ${formatTypes(node.returnTypes)}`, chalk.gray(origin));
  });

  if (result.warnings.length > 0) {
    console.log(chalk.yellow('\n⚠️  Warnings:'));
    result.warnings.forEach((warning) => console.log(chalk.yellow(`  • ${formatWarning(warning)}`)));
  }

  console.log();
  return result;
}

function byIdentifier(a: NodeDeclaration, b: NodeDeclaration): number {
  return a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0;
}
