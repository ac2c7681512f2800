/**
 * check command - Compare the nodes of a base checkout with a proposed change
 */

import chalk from 'chalk';
import ora from 'ora';
import { loadRegistry } from '../utils/registry-loader.js';
import type { LoadOptions } from '../utils/registry-loader.js';
import { diffRegistries } from '../utils/compatibility-differ.js';
import { formatReport, formatReportJson } from '../utils/report-formatter.js';
import type { ReportLine, ReportTone } from '../utils/report-formatter.js';
import type { CompatibilityReport, LoadResult } from '../types/node-registry.js';
import type { CheckOptions } from '../types.js';

const TONE_STYLES: Record<ReportTone, (text: string) => string> = {
  ok: chalk.green,
  breaking: chalk.red,
  added: chalk.cyan,
  removed: chalk.yellow,
  warning: chalk.yellow,
  summary: chalk.bold,
};

export async function check(
  basePath: string,
  prPath: string,
  options: CheckOptions = {}
): Promise<CompatibilityReport> {
  const loadOptions: LoadOptions = {
    source: options.source,
    manifestFile: options.manifest,
  };

  const base = await loadWithSpinner('base', basePath, loadOptions);
  const candidate = await loadWithSpinner('candidate', prPath, loadOptions);

  const report = diffRegistries(base.registry, candidate.registry, {
    failOnRemoved: options.failOnRemoved,
    allowAppendedReturnTypes: options.allowAppended,
  });
  const warnings = { base: base.warnings, candidate: candidate.warnings };

  if (options.json) {
    console.log(formatReportJson(report, warnings));
  } else {
    console.log(chalk.blue.bold('\n🔍 Node Compatibility Report\n'));
    formatReport(report, warnings).forEach((line) => console.log(styleLine(line)));
    console.log();
  }

  return report;
}

/**
 * Process exit code for a finished comparison
 */
export function exitCodeFor(report: CompatibilityReport): number {
  return report.breaking ? 1 : 0;
}

/**
 * Load one checkout's registry behind a spinner
 */
export async function loadWithSpinner(
  label: string,
  repoPath: string,
  options: LoadOptions
): Promise<LoadResult> {
  const spinner = ora(`Loading ${label} nodes from ${repoPath}...`).start();

  try {
    const result = await loadRegistry(repoPath, options);
    const count = result.registry.size;
    const summary = `Loaded ${count} ${count === 1 ? 'node' : 'nodes'} from ${label} (${result.source})`;

    if (result.warnings.length > 0) {
      spinner.warn(`${summary} with ${result.warnings.length} warning(s)`);
    } else {
      spinner.succeed(summary);
    }

    return result;
  } catch (error) {
    spinner.fail(`Failed to load ${label} nodes from ${repoPath}`);
    throw error;
  }
}

function styleLine(line: ReportLine): string {
  return TONE_STYLES[line.tone](line.text);
}
