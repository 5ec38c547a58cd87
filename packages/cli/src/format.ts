/**
 * Console rendering for analysis results
 */

import chalk from 'chalk';
import type { AnalysisBundle, ScoreComponent } from '@lumora/core';
import { SCORE_COMPONENTS, marketPositionLabel } from '@lumora/analysis';
import { topPlatform, type PipelineStage } from '@lumora/orchestrator';

export const STAGE_LABELS: Record<PipelineStage, string> = {
  created: 'Starting analysis',
  validating: 'Validating brand profile',
  generating_prompts: 'Generating prompts',
  querying: 'Querying AI platforms',
  analyzing_brand: 'Analyzing brand mentions',
  analyzing_competitors: 'Analyzing competitors',
  scoring: 'Calculating visibility score',
  complete: 'Analysis complete',
  failed: 'Analysis failed',
};

export const COMPONENT_LABELS: Record<ScoreComponent, string> = {
  mentionFrequency: 'Mention Frequency',
  rankingPosition: 'Ranking Position',
  platformCoverage: 'Platform Coverage',
  sentimentQuality: 'Sentiment Quality',
  competitivePosition: 'Competitive Position',
};

/**
 * Text bar of `width` cells, filled in proportion to a 0-100 score
 */
export function scoreBar(score: number, width = 20): string {
  const filled = Math.round((Math.max(0, Math.min(100, score)) / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function colorScore(score: number): string {
  const text = score.toFixed(1);
  if (score >= 70) return chalk.green(text);
  if (score >= 40) return chalk.yellow(text);
  return chalk.red(text);
}

export function formatSummary(brandName: string, bundle: AnalysisBundle): string[] {
  const { visibilityScore: score, brandAnalysis: brand, competitiveInsights: insights } = bundle;
  const lines: string[] = [];
  const rule = chalk.gray('─'.repeat(60));

  lines.push('', chalk.bold(`Visibility Report: ${brandName}`), rule);
  lines.push(`Overall Score:   ${colorScore(score.overallScore)} / 100 (${marketPositionLabel(score.overallScore)})`);
  lines.push(`Brand Mentions:  ${brand.totalMentions} of ${brand.totalResponses} responses`);
  lines.push(`Average Rank:    ${brand.averageRanking ?? 'n/a'}`);
  lines.push(`Top Platform:    ${topPlatform(brand) ?? 'n/a'}`);
  lines.push(
    `Market Rank:     ${insights.marketPosition.marketRank} of ${insights.marketPosition.totalEntities}`
  );
  if (bundle.queryStats.failed > 0) {
    lines.push(chalk.yellow(`Failed Queries:  ${bundle.queryStats.failed} of ${bundle.queryStats.total}`));
  }

  lines.push('', chalk.bold('Score Components'), rule);
  for (const component of SCORE_COMPONENTS) {
    const value = score.componentScores[component];
    lines.push(`${COMPONENT_LABELS[component].padEnd(22)}${chalk.cyan(scoreBar(value))} ${colorScore(value)}`);
  }

  lines.push('', chalk.bold('Platforms'), rule);
  for (const [platform, detail] of Object.entries(brand.platformDetails)) {
    const status = insights.platformPerformance[platform]?.status;
    lines.push(
      `${platform.padEnd(14)}${String(detail.mentions).padStart(3)} mentions  ` +
        `${(detail.mentionRate * 100).toFixed(0).padStart(3)}%` +
        (status ? `  ${chalk.gray(status)}` : '')
    );
  }

  if (score.insights.length > 0) {
    lines.push('', chalk.bold('Key Findings'), rule);
    lines.push(...score.insights.map((insight) => `  • ${insight}`));
  }
  if (insights.threats.length > 0) {
    lines.push('', chalk.bold('Threats'), rule);
    lines.push(...insights.threats.map((threat) => chalk.red(`  ! ${threat}`)));
  }
  if (score.recommendations.length > 0) {
    lines.push('', chalk.bold('Recommendations'), rule);
    lines.push(...score.recommendations.map((item, index) => `  ${index + 1}. ${item}`));
  }

  return lines;
}
