// Markdown rendering of a research report

import type { AnalysisResult, ResearchReport } from '../types/research.js';

function bullets(items: readonly string[], empty = '- (none)'): string[] {
  return items.length > 0 ? items.map(item => `- ${item}`) : [empty];
}

function formatAnalysis(result: AnalysisResult): string[] {
  return [
    `### ${result.agent_name}`,
    '',
    `**Confidence:** ${(result.confidence_score * 100).toFixed(1)}%`,
    `**Source:** ${result.data_source}`,
    '',
    '**Recommendations:**',
    ...bullets(result.recommendations),
    '',
  ];
}

export function formatMemoryStatus(report: ResearchReport): string {
  const m = report.memory_status;
  const seen = m.previously_analyzed
    ? `yes (last on ${m.previous_analysis_timestamp ?? 'unknown date'})`
    : 'no';
  return `Previously analyzed: ${seen} · Memory entries: ${m.memory_entries}/${m.max_memory_entries}`;
}

export function formatReport(report: ResearchReport): string {
  const { research_plan: plan, analyses, workflows, reflection } = report;
  const routing = workflows.routing;
  const optimizer = workflows.evaluator_optimizer;

  const lines: string[] = [
    `# Research Report: ${report.symbol}`,
    '',
    `Generated ${report.generated_at} in ${report.execution_time_seconds.toFixed(2)}s`,
    '',
    '## Research Plan',
    '',
    `Plan source: ${plan.llm_powered ? 'model-generated' : 'default plan'}`,
    '',
    ...bullets(plan.objectives),
    '',
    '## Specialist Analyses',
    '',
    ...formatAnalysis(analyses.market),
    ...formatAnalysis(analyses.fundamentals),
    ...formatAnalysis(analyses.economic),
    ...formatAnalysis(analyses.regulatory),
    '## Prompt Chain Summary',
    '',
    workflows.prompt_chain.final_output,
    '',
    '## Routing',
    '',
    `**Selected agent:** ${routing.selected_agent} (${routing.routing_method})`,
    `**Reasoning:** ${routing.reasoning}`,
    '',
    '## Evaluator-Optimizer',
    '',
    ...optimizer.iterations.map(it => `- Iteration ${it.iteration}: ${it.quality_score.toFixed(2)}`),
    '',
    `**Final quality score:** ${optimizer.final_quality_score.toFixed(2)} (optimization applied: ${optimizer.optimization_applied ? 'yes' : 'no'})`,
    '',
    '## Reflection',
    '',
    `**Overall quality:** ${reflection.overall_quality_score.toFixed(2)}${reflection.llm_powered ? '' : ' (fallback)'}`,
    '',
    '**Improvements:**',
    ...bullets(reflection.improvements),
    '',
    '## Memory',
    '',
    formatMemoryStatus(report),
    '',
  ];

  return lines.join('\n');
}
