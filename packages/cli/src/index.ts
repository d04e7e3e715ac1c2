// ============================================================================
// @toonbench/cli — Public API
// ============================================================================

export { runCli, parseArgv, usage, UsageError, EXIT_OK, EXIT_ERROR, EXIT_ROUND_TRIP } from './commands.js';
export type { CliIO, CliDeps, ParsedArgs } from './commands.js';
export { loadConfig, DEFAULT_MODELS } from './config.js';
export type { BenchConfig, ConfigOverrides, Provider } from './config.js';
export { OpenAIChatModel, AnthropicChatModel, DryRunChatModel, createChatModel } from './provider.js';
export type { ChatModel, Completion, CompletionRequest } from './provider.js';
export { runCase, runBenchmark } from './driver.js';
export type { DriverOptions } from './driver.js';
export { compileLabels, extractLabel, scoreKeywords } from './answers.js';
export type { CompiledLabel, KeywordScore } from './answers.js';
export { parseScenarios, loadScenarios, fixturesDir } from './scenarios.js';
export { buildPrompt, renderPayload, SYSTEM_PROMPT } from './prompt.js';
export {
  summarize,
  renderReport,
  toJsonReport,
  deltaPct,
  priceFor,
  verdictFor,
  round1,
  MODEL_PRICES,
  EQUIVALENCE_THRESHOLD_PTS,
} from './reporter.js';
export type { Summary, EncodingSummary, MetricRow, KindBreakdown, Verdict, ModelPrice } from './reporter.js';
export { parseCsv, measureCsv, runSizeBenchmark, renderSizes } from './csv_sizes.js';
export type { CsvTable, CsvSizeResult, SizeMeasure } from './csv_sizes.js';
export type * from './types.js';
export { ENCODINGS } from './types.js';
