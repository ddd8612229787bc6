// src/index.ts
export {
  ACTION_CATEGORIES,
  FactorNotFoundError,
  clearFactorCache,
  getAllFactors,
  getFactor,
  getPurchaseSubcategories,
  isActionCategory,
} from "./factorRepository";
export type { ActionCategory, Factor } from "./factorRepository";

export {
  TIMES_OF_DAY,
  buildActionRecord,
  calculateImpact,
  compareToBenchmark,
  getCategoryBenchmark,
} from "./impactEngine";
export type { ActionRecord, BenchmarkComparison, CategoryBenchmark, ImpactResult, TimeOfDay } from "./impactEngine";

export {
  RECOMMENDATION_RULES,
  calculateSavings,
  getDefaultRecommendations,
  getRecommendations,
} from "./recommendationEngine";
export type { Difficulty, Recommendation, RecommendationRule, Savings } from "./recommendationEngine";

export { ChatSession, generateResponse, getChatSuggestions, parseMessage } from "./chatbot";
export type { AnalyzedAction, ParsedAction } from "./chatbot";

export { SupabaseActionStore, parseActionRow } from "./actionStore";
export type { ActionStore, NewAction, StoredAction } from "./actionStore";
export { InMemoryActionStore } from "./memoryActionStore";

export {
  ActionNotFoundError,
  InvalidActionError,
  deleteAction,
  listActions,
  logAction,
  logActionsBulk,
  logChatMessage,
} from "./actionLog";
export type { ActionQuery } from "./actionLog";
export { buildWeeklyTrend, countStreakDays, summarizeDaily, summarizeDay } from "./impactSummary";
export { generateDailySummary, getDailyCoaching, getWeeklyCoachingInsight, getWeeklyInsight } from "./coach";
export {
  buildDailyReport,
  buildWeeklyReport,
  createReportData,
  generateHtmlReport,
  generateJsonReport,
  generateMarkdownReport,
  generateTextReport,
  renderReport,
} from "./report";
export type { ReportData, ReportFormat } from "./report";
export { titleCaseItem } from "./format";
