/**
 * Report Formatter
 *
 * Renders a compatibility report as summary lines for the terminal, or as
 * JSON. Output depends only on the report, so identical inputs always print
 * identical text.
 */

import type {
  CompatibilityFinding,
  CompatibilityReport,
  ParseWarning,
} from '../types/node-registry.js';

export type ReportTone = 'ok' | 'breaking' | 'added' | 'removed' | 'warning' | 'summary';

export interface ReportLine {
  tone: ReportTone;
  text: string;
}

/**
 * Loader warnings for each side of the comparison
 */
export interface ReportWarnings {
  base: ParseWarning[];
  candidate: ParseWarning[];
}

export function formatTypes(types: readonly string[]): string {
  return `(${types.join(', ')})`;
}

export function formatWarning(warning: ParseWarning): string {
  const location = warning.line !== undefined ? `${warning.file}:${warning.line}` : warning.file;
  return `${location}: ${warning.message}`;
}

/**
 * Format a report for display
 */
export function formatReport(
  report: CompatibilityReport,
  warnings: ReportWarnings = { base: [], candidate: [] }
): ReportLine[] {
  const lines: ReportLine[] = [];

  for (const finding of report.findings) {
    lines.push(...formatFinding(finding));
  }

  for (const id of report.added) {
    lines.push({ tone: 'added', text: `+ ${id} (added)` });
  }

  for (const id of report.removed) {
    lines.push({ tone: 'removed', text: `- ${id} (removed)` });
  }

  for (const [side, list] of [['base', warnings.base], ['candidate', warnings.candidate]] as const) {
    for (const warning of list) {
      lines.push({ tone: 'warning', text: `⚠ ${side} ${formatWarning(warning)}` });
    }
  }

  lines.push({ tone: 'summary', text: formatSummary(report) });

  return lines;
}

function formatFinding(finding: CompatibilityFinding): ReportLine[] {
  const before = formatTypes(finding.baseReturnTypes);
  const after = formatTypes(finding.candidateReturnTypes);

  if (!finding.isBreaking) {
    const text = finding.mismatches.length === 0
      ? `✓ ${finding.identifier}: ${before}`
      : `✓ ${finding.identifier}: ${before} → ${after}`;
    return [{ tone: 'ok', text }];
  }

  return [
    { tone: 'breaking', text: `✗ ${finding.identifier}: ${before} → ${after}` },
    ...finding.mismatches.map((m): ReportLine => ({
      tone: 'breaking',
      text: `    position ${m.index}: ${m.base ?? '(none)'} → ${m.candidate ?? '(none)'}`,
    })),
  ];
}

function formatSummary(report: CompatibilityReport): string {
  const compared = report.findings.length;

  if (!report.breaking) {
    return `✅ No breaking changes detected (${plural(compared, 'node')} compared)`;
  }

  const parts: string[] = [];
  const changed = report.findings.filter((finding) => finding.isBreaking).length;
  if (changed > 0) {
    parts.push(`${plural(changed, 'node')} with changed return types`);
  }
  if (report.policy.failOnRemoved && report.removed.length > 0) {
    parts.push(`${plural(report.removed.length, 'removed node')}`);
  }

  return `❌ Breaking changes detected: ${parts.join(', ')}`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Format a report as an indented JSON document
 */
export function formatReportJson(
  report: CompatibilityReport,
  warnings: ReportWarnings = { base: [], candidate: [] }
): string {
  return JSON.stringify(
    {
      breaking: report.breaking,
      findings: report.findings,
      added: report.added,
      removed: report.removed,
      policy: report.policy,
      warnings,
    },
    null,
    2
  );
}
