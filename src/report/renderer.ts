/**
 * Report Renderer
 *
 * Turns an analysis result into Markdown, plain text or JSON. Every figure
 * comes from the result; nothing is recomputed here.
 */

import type { AnalysisResult } from '../analysis/engine.js';
import { isFiring, type Finding, type Severity } from '../types/findings.js';
import { computeExitCode, computeSeverity } from './severity.js';

export const REPORT_FORMATS = ['md', 'txt', 'json'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function summarize(findings: readonly Finding[]): string {
  const firing = findings.filter(isFiring);

  if (firing.length === 0) {
    return 'NO STRONG SIGNAL';
  }
  if (firing.length === 1) {
    const [finding] = firing;
    return `${finding.status} - ${finding.title} (${finding.confidence} confidence)`;
  }
  return `${firing.length} issues DETECTED -> ${firing.map((f) => f.title).join(', ')}`;
}

export function describeWindow(result: AnalysisResult): string {
  const { window } = result;
  const start = (window.startUptime / 60).toFixed(1);
  const end = (window.endUptime / 60).toFixed(1);
  const scope =
    window.requestedMinutes === null
      ? 'full log'
      : window.fallbackToFullLog
        ? `full log, requested last ${window.requestedMinutes} min`
        : `last ${window.requestedMinutes} min`;
  return `${start} - ${end} min uptime (${scope})`;
}

function describeSamples(result: AnalysisResult): string {
  const c = result.sampleCounts;
  return [
    `young=${c.youngGc}`,
    `mixed=${c.mixedGc}`,
    `full=${c.fullGc}`,
    `concurrent=${c.concurrentPauses}`,
    `humongous=${c.humongous}`,
    `evac-failures=${c.evacFailures}`,
    `metaspace=${c.metaspace}`,
    `tlab=${c.tlab}`,
    `safepoints=${c.safepoints}`,
    `old-gen=${c.oldGen}`,
  ].join(' ');
}

export function renderReport(result: AnalysisResult, format: ReportFormat): string {
  switch (format) {
    case 'md':
      return renderMarkdown(result);
    case 'txt':
      return renderText(result);
    case 'json':
      return renderJson(result);
  }
}

function renderMarkdown(result: AnalysisResult): string {
  const lines: string[] = [
    '# GC Triage Report',
    '',
    `**Summary:** ${summarize(result.findings)}`,
    '',
    `**Window:** ${describeWindow(result)}`,
    `**Collector:** ${result.metrics.collector.name}`,
    `**Samples:** ${describeSamples(result)}`,
    '',
  ];

  if (result.notes.length > 0) {
    lines.push('**Notes:**');
    for (const note of result.notes) {
      lines.push(`- ${note}`);
    }
    lines.push('');
  }

  for (const finding of result.findings) {
    const severity = computeSeverity(finding, result.metrics);
    lines.push(`## ${finding.title} - ${finding.status}`);
    lines.push(`**Severity:** ${severity}`);
    lines.push(`**Confidence:** ${finding.confidence}`);
    lines.push('');
    lines.push('**Evidence:**');
    lines.push(...finding.evidence.map((e) => `- ${e}`));
    if (finding.note) {
      lines.push('', '**Note:**', finding.note);
    }
    lines.push('', '**Next low-effort data:**');
    lines.push(...finding.nextSteps.map((s) => `- ${s}`));
    lines.push('');
  }

  return lines.join('\n');
}

function renderText(result: AnalysisResult): string {
  const lines: string[] = [
    '=== GC Triage Report ===',
    `Summary: ${summarize(result.findings)}`,
    `Window: ${describeWindow(result)}`,
    `Collector: ${result.metrics.collector.name}`,
    `Samples: ${describeSamples(result)}`,
    '',
  ];

  if (result.notes.length > 0) {
    lines.push('Notes:');
    lines.push(...result.notes.map((n) => `  - ${n}`));
    lines.push('');
  }

  for (const finding of result.findings) {
    const severity = computeSeverity(finding, result.metrics);
    lines.push(`${finding.title.toUpperCase()} - ${finding.status} [${severity}]`);
    lines.push(`Confidence: ${finding.confidence}`);
    lines.push('Evidence:');
    lines.push(...finding.evidence.map((e) => `  - ${e}`));
    if (finding.note) {
      lines.push('Note:', finding.note);
    }
    lines.push('Next low-effort data:');
    lines.push(...finding.nextSteps.map((s) => `  - ${s}`));
    lines.push('');
  }

  return lines.join('\n');
}

interface JsonFinding extends Finding {
  readonly severity: Severity;
}

function renderJson(result: AnalysisResult): string {
  const findings: JsonFinding[] = result.findings.map((f) => ({
    ...f,
    severity: computeSeverity(f, result.metrics),
  }));

  return JSON.stringify(
    {
      summary: summarize(result.findings),
      exitCode: computeExitCode(result.findings, result.metrics),
      window: result.window,
      sampleCounts: result.sampleCounts,
      lineStats: result.lineStats,
      notes: result.notes,
      findings,
      metrics: result.metrics,
      thresholds: result.thresholds,
    },
    null,
    2
  );
}
