export {
  runComparison,
  planInvocations,
  type ComparisonPlan,
  type RunComparisonOptions,
} from './aggregator';
export {
  buildComparisonReport,
  rankEfficiency,
  summarizeProvider,
  type BuildReportOptions,
} from './report';
export type {
  ComparisonReport,
  EfficiencyEntry,
  EfficiencyRanking,
  ProviderSummary,
  RunMetadata,
} from './types';
