/**
 * Report Generator
 *
 * Generates JSON and Markdown reports
 */

import fs from 'node:fs';
import path from 'node:path';
import { getConfig } from '../config/loader.js';
import { logger } from '../logging/logger.js';
import type {
  EstimationComponent,
  EstimationLevelAssessment,
  FactsTableRow,
  SensitivityReport,
  WaterfallStep,
} from '../../estimation/types.js';
import type { Run, StoredEstimation, StoredSensitivityReport } from '../db/database.js';

export interface ReportData {
  runId: string;
  command: string;
  timestamp: number;
  marketScope?: string;
  components?: EstimationComponent[];
  best?: EstimationComponent;
  level?: EstimationLevelAssessment;
  waterfall?: WaterfallStep[];
  strategicSummary?: string;
  sensitivity?: SensitivityReport[];
  facts?: FactsTableRow[];
  summary?: Record<string, unknown>;
}

export interface GeneratedReport {
  json: string;
  markdown: string;
  paths: string[];
}

export function formatAmount(value: number | null, unit: string = ''): string {
  if (value === null) return 'N/A';
  const amount = value.toLocaleString('en-US', { maximumFractionDigits: 0 });
  return unit ? `${amount} ${unit}` : amount;
}

export function generateReport(data: ReportData, outDir: string = getConfig().reporting.out_dir): GeneratedReport {
  // Ensure output directory exists
  if (!fs.existsSync(outDir)) {
    fs.mkdirSync(outDir, { recursive: true });
  }

  const timestamp = new Date(data.timestamp).toISOString().replace(/[:.]/g, '-');
  const baseName = `${data.command}-${timestamp}`;

  const jsonContent = JSON.stringify(data, null, 2);
  const jsonPath = path.join(outDir, `${baseName}.json`);

  const markdownContent = generateMarkdown(data);
  const mdPath = path.join(outDir, `${baseName}.md`);

  fs.writeFileSync(jsonPath, jsonContent);
  fs.writeFileSync(mdPath, markdownContent);

  logger.info(`Reports generated`, { jsonPath, mdPath });

  return {
    json: jsonContent,
    markdown: markdownContent,
    paths: [jsonPath, mdPath],
  };
}

export function generateMarkdown(data: ReportData): string {
  const lines: string[] = [
    `# Market Sizing Report`,
    '',
    `**Run ID:** ${data.runId}`,
    `**Command:** ${data.command}`,
    `**Generated:** ${new Date(data.timestamp).toISOString()}`,
    ...(data.marketScope ? [`**Market scope:** ${data.marketScope}`] : []),
    '',
    '---',
    '',
    '> Estimates are heuristic. Confidence labels are qualitative and do not',
    '> describe a statistical interval.',
    '',
    '---',
    '',
  ];

  if (data.summary) {
    lines.push('## Summary', '');
    for (const [key, value] of Object.entries(data.summary)) {
      lines.push(`- **${formatKey(key)}:** ${formatValue(value)}`);
    }
    lines.push('');
  }

  if (data.best) {
    lines.push('## Recommended Estimate', '');
    lines.push(`**${data.best.name}:** ${formatAmount(data.best.estimatedValue, data.best.unit)} (confidence ${data.best.confidence})`);
    lines.push('');
    if (data.strategicSummary) {
      lines.push(data.strategicSummary, '');
    }
  }

  if (data.level) {
    lines.push(`**Estimation Level:** ${data.level.level} (${data.level.method}, score ${data.level.confidenceScore.toFixed(2)})`);
    lines.push('');
    lines.push(data.level.explanation, '');
  }

  if (data.components && data.components.length > 0) {
    lines.push('## Estimation Components', '');
    lines.push('| Component | Value | Confidence | Status | Strategy |');
    lines.push('|-----------|-------|------------|--------|----------|');
    for (const component of data.components) {
      lines.push(
        `| ${component.name} | ${formatAmount(component.estimatedValue, component.unit)} | ${component.confidence} | ${component.status} | ${component.selectedStrategyName || '-'} |`
      );
    }
    lines.push('');

    for (const component of data.components) {
      lines.push(`### ${component.name}`, '');
      lines.push(`*${component.role}*`, '');
      if (component.status === 'empty') {
        lines.push(`**Missing:** ${component.missingDataStrategy}`, '');
        lines.push('---', '');
        continue;
      }
      lines.push(`**Method:** ${component.methodDescription}`, '');
      lines.push(`**Calculation:** \`${component.calculationBreakdown}\``, '');
      if (component.realityScore) {
        lines.push(`**Market Friction:** ${component.realityScore}`, '');
      }
      if (component.methodologyText) {
        lines.push(component.methodologyText, '');
      }
      if (component.strategicNarrative) {
        lines.push(`> ${component.strategicNarrative}`, '');
      }

      const guessed = component.bindings.filter(binding => binding.match !== 'exact');
      if (guessed.length > 0) {
        lines.push('**Approximate Bindings:**');
        for (const binding of guessed) {
          lines.push(
            `- \`${binding.requestedKey}\` resolved to \`${binding.resolvedKey}\` (${binding.match}, ${binding.similarity.toFixed(2)})`
          );
        }
        lines.push('');
      }
      lines.push('---', '');
    }
  }

  if (data.waterfall && data.waterfall.length > 0) {
    lines.push('## TAM / SAM / SOM', '');
    lines.push('| Step | Value | |');
    lines.push('|------|-------|-|');
    for (const step of data.waterfall) {
      lines.push(`| ${step.label} | ${formatAmount(step.value)} | ${step.text} |`);
    }
    lines.push('');
  }

  if (data.sensitivity && data.sensitivity.length > 0) {
    lines.push('## Sensitivity Analysis', '');

    for (const report of data.sensitivity) {
      lines.push(`### ${report.componentId}`, '');
      if (report.error) {
        lines.push(`**Unavailable:** ${report.error}`, '');
        continue;
      }
      lines.push(`**Base Value:** ${formatAmount(report.baseValue)}`);
      lines.push(`**Adjusted Confidence:** ${report.confidenceAdjusted}`);
      lines.push(`**Max Sensitivity Score:** ${report.maxSensitivityScore}`);
      lines.push('');
      lines.push('| Hypothesis | Low | High | Score | Class |');
      lines.push('|------------|-----|------|-------|-------|');
      for (const test of report.tests) {
        lines.push(
          `| ${test.hypothesis} | ${test.lowScenario.deltaPct}% | ${test.highScenario.deltaPct}% | ${test.score.toFixed(1)} | ${test.sensitivity} |`
        );
      }
      lines.push('');
      if (report.mostSensitiveVariables.length > 0) {
        lines.push(`**Most Sensitive:** ${report.mostSensitiveVariables.join(', ')}`, '');
      }
      lines.push('---', '');
    }
  }

  if (data.facts && data.facts.length > 0) {
    lines.push('## Facts', '');
    lines.push('| Variable | Value | Source | Type | Confidence | Used In |');
    lines.push('|----------|-------|--------|------|------------|---------|');
    for (const row of data.facts) {
      lines.push(`| ${row.variable} | ${row.value} | ${row.source} | ${row.sourceType} | ${row.confidence} | ${row.usedIn} |`);
    }
    lines.push('');
  }

  // Footer
  lines.push('');
  lines.push('---');
  lines.push('');
  lines.push('*Generated by msize*');

  return lines.join('\n');
}

function formatKey(key: string): string {
  return key.replace(/_/g, ' ').replace(/\b\w/g, c => c.toUpperCase());
}

function formatValue(value: unknown): string {
  if (typeof value === 'number') {
    return value.toLocaleString('en-US');
  }
  if (typeof value === 'boolean') {
    return value ? 'Yes' : 'No';
  }
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return String(value);
}

/**
 * Regenerate report from run ID
 */
export function regenerateReport(
  run: Run,
  estimations: StoredEstimation[],
  sensitivity: StoredSensitivityReport[],
  outDir?: string
): GeneratedReport {
  const best = estimations.find(estimation => estimation.is_best);
  const metadata: unknown = run.metadata;
  const marketScope = typeof metadata === 'object' && metadata !== null && 'marketScope' in metadata
    && typeof metadata.marketScope === 'string' ? metadata.marketScope : undefined;

  return generateReport({
    runId: run.id,
    command: run.command,
    timestamp: run.started_at,
    marketScope,
    components: estimations.filter(estimation => !estimation.is_best).map(estimation => estimation.component),
    best: best?.component,
    sensitivity: sensitivity.map(stored => stored.report),
    summary: {
      status: run.status,
      started_at: new Date(run.started_at).toISOString(),
      completed_at: run.completed_at ? new Date(run.completed_at).toISOString() : 'N/A',
      components_stored: estimations.length,
      sensitivity_reports: sensitivity.length,
    },
  }, outDir);
}
