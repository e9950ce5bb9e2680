/**
 * Insight Agent
 *
 * Turns an analysis summary into a short list of observations and one
 * recommendation. The primary path asks a text generator; any generation
 * failure (error, timeout, unusable output) falls back to deterministic
 * templates built from the summary's numeric fields.
 *
 * Parsing rule for generated text:
 * - the first line that starts with "RECOMMENDATION:" (case-insensitive,
 *   markdown emphasis allowed) splits the text in two
 * - before it, each line starting with "-", "*", "•", "1." or "1)" is one
 *   insight; the marker is stripped, at most `maxInsights` are kept
 * - after it, the remaining text is the recommendation
 * - whitespace is collapsed everywhere
 */

import type {
  AnalysisSummary,
  DatasetProfile,
  EdaSummary,
  InsightReport,
  MlSummary,
  RawScalar,
} from '../../core/types.js';
import type { AnalysisConfig } from '../../config/analysis.js';
import { serializeProfile, serializeSummary } from '../../core/serialize.js';
import { GenerationFailureError, errorMessage } from '../../core/errors.js';
import { generateWithTimeout, type TextGenerator } from '../../providers/base.js';
import type { StructuredLogger } from '../../logging/logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface InsightContext {
  profile?: DatasetProfile;
  preview?: Record<string, RawScalar>[];
  notes?: string[];
  signal?: AbortSignal;
}

export interface ParsedInsights {
  insights: string[];
  recommendation?: string;
}

export interface TemplateInsights {
  insights: string[];
  recommendation: string;
}

export type InsightAgentConfig = Pick<AnalysisConfig, 'generationTimeoutMs' | 'maxInsights'>;

const RECOMMENDATION_LINE = /^[#*_\s]*recommendations?[*_\s]*:[*_\s]*(.*)$/i;
const INSIGHT_LINE = /^\s*(?:[-*•]|\d+[.)])\s+(.+)$/;

// =============================================================================
// PROMPT
// =============================================================================

export function buildInsightPrompt(summary: AnalysisSummary, context: InsightContext = {}): string {
  const sections = [
    `Analysis type: ${summary.route.toUpperCase()}`,
    `Results: ${JSON.stringify(serializeSummary(summary))}`,
  ];

  if (context.profile) {
    sections.push(`Dataset profile: ${JSON.stringify(serializeProfile(context.profile))}`);
  }
  if (context.preview && context.preview.length > 0) {
    sections.push(`Preview (first ${context.preview.length} rows): ${JSON.stringify(context.preview)}`);
  }
  if (context.notes && context.notes.length > 0) {
    sections.push(`Notes: ${context.notes.join(' ')}`);
  }

  sections.push(
    [
      'Write 2 to 5 short, concrete observations about this dataset and one recommendation.',
      'Use exactly this format:',
      'INSIGHTS:',
      '- insight 1',
      '- insight 2',
      '',
      'RECOMMENDATION:',
      'one sentence',
    ].join('\n')
  );

  return sections.join('\n\n');
}

// =============================================================================
// PARSING
// =============================================================================

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function parseInsightResponse(text: string, maxInsights: number): ParsedInsights {
  const lines = text.split(/\r?\n/);
  const markerIndex = lines.findIndex(line => RECOMMENDATION_LINE.test(line));
  const insightLines = markerIndex === -1 ? lines : lines.slice(0, markerIndex);

  const insights: string[] = [];
  for (const line of insightLines) {
    const match = INSIGHT_LINE.exec(line);
    if (!match) continue;
    const insight = collapse(match[1]);
    if (insight !== '') insights.push(insight);
    if (insights.length >= maxInsights) break;
  }

  let recommendation: string | undefined;
  if (markerIndex !== -1) {
    const firstLine = RECOMMENDATION_LINE.exec(lines[markerIndex])?.[1] ?? '';
    const rest = [firstLine, ...lines.slice(markerIndex + 1)]
      .map(line => line.replace(/^\s*(?:[-*•]|\d+[.)])\s+/, ''))
      .join(' ');
    const collapsed = collapse(rest);
    if (collapsed !== '') recommendation = collapsed;
  }

  return { insights, recommendation };
}

// =============================================================================
// TEMPLATES
// =============================================================================

function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

function mlTemplate(summary: MlSummary): TemplateInsights {
  const totalRows = summary.analyzedRowCount + summary.excludedRowCount;
  const insights = [
    `${summary.outlierCount} of ${totalRows} rows (${formatPercent(summary.outlierPercent)}) were flagged as outliers.`,
  ];

  let largestLabel = '';
  let largestCount = -1;
  for (const [label, count] of Object.entries(summary.clusterDistribution)) {
    if (count > largestCount) {
      largestLabel = label;
      largestCount = count;
    }
  }
  const share = summary.analyzedRowCount > 0 ? (largestCount / summary.analyzedRowCount) * 100 : 0;
  insights.push(
    `Identified ${summary.clusterCount} groups; the largest (${largestLabel}) holds ${largestCount} rows (${formatPercent(share)}).`
  );

  const strength = summary.silhouetteScore >= 0.5
    ? 'strong'
    : summary.silhouetteScore >= 0.25 ? 'moderate' : 'weak';
  insights.push(`Group separation is ${strength} (silhouette ${summary.silhouetteScore.toFixed(2)}).`);

  if (summary.excludedRowCount > 0) {
    insights.push(
      `${summary.excludedRowCount} rows with missing numeric values were excluded from the ML analysis.`
    );
  }

  const recommendation = summary.outlierCount > 0
    ? `Review the ${summary.outlierCount} flagged outliers, then profile the ${summary.clusterCount} groups to find what separates them.`
    : `Profile the ${summary.clusterCount} groups to find what separates them.`;

  return { insights, recommendation };
}

function edaTemplate(summary: EdaSummary): TemplateInsights {
  const numericCount = Object.keys(summary.numericStats).length;
  const insights = [
    `Dataset has ${summary.rowCount} rows and ${summary.columnCount} columns (${numericCount} numeric).`,
  ];

  let topColumn = '';
  let topMissing = 0;
  let columnsWithMissing = 0;
  for (const [column, count] of Object.entries(summary.missingValueCounts)) {
    if (count > 0) columnsWithMissing++;
    if (count > topMissing) {
      topColumn = column;
      topMissing = count;
    }
  }

  insights.push(
    summary.totalMissingValues > 0
      ? `${summary.totalMissingValues} missing values across ${columnsWithMissing} columns; "${topColumn}" has the most (${topMissing}).`
      : 'No missing values detected.'
  );

  insights.push(
    summary.duplicateRowCount > 0
      ? `${summary.duplicateRowCount} duplicate rows found.`
      : 'No duplicate rows found.'
  );

  const firstNumeric = Object.entries(summary.numericStats)[0];
  if (firstNumeric) {
    const [column, stats] = firstNumeric;
    insights.push(`"${column}" ranges from ${stats.min} to ${stats.max} (mean ${stats.mean}).`);
  }

  let recommendation: string;
  if (summary.totalMissingValues > 0) {
    recommendation = `Handle missing values first, starting with "${topColumn}", then re-run the analysis.`;
  } else if (summary.duplicateRowCount > 0) {
    recommendation = `Remove the ${summary.duplicateRowCount} duplicate rows before further analysis.`;
  } else {
    recommendation = 'Data quality checks passed; proceed with deeper analysis of the numeric columns.';
  }

  return { insights, recommendation };
}

export function templateInsights(summary: AnalysisSummary): TemplateInsights {
  return summary.route === 'ml' ? mlTemplate(summary) : edaTemplate(summary);
}

// =============================================================================
// AGENT
// =============================================================================

export class InsightAgent {
  constructor(
    private readonly generator: TextGenerator | undefined,
    private readonly config: InsightAgentConfig,
    private readonly logger: StructuredLogger
  ) {}

  async generateReport(summary: AnalysisSummary, context: InsightContext = {}): Promise<InsightReport> {
    const notes = context.notes ?? [];
    const template = templateInsights(summary);
    const fallback: InsightReport = {
      route: summary.route,
      insights: template.insights.slice(0, this.config.maxInsights),
      recommendation: template.recommendation,
      source: 'template',
      notes,
    };

    if (!this.generator) {
      return fallback;
    }

    try {
      const text = await generateWithTimeout(
        this.generator,
        buildInsightPrompt(summary, context),
        this.config.generationTimeoutMs,
        context.signal
      );

      const parsed = parseInsightResponse(text, this.config.maxInsights);
      if (parsed.insights.length === 0) {
        throw new GenerationFailureError(this.generator.name, 'no insights in generated text');
      }

      return {
        route: summary.route,
        insights: parsed.insights,
        recommendation: parsed.recommendation ?? template.recommendation,
        source: 'generated',
        notes,
      };
    } catch (error) {
      this.logger.insightFallback(this.generator.name, errorMessage(error));
      return fallback;
    }
  }
}
