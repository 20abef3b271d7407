export * from './lib/engine';
export * from './lib/pipeline';
export { config } from './lib/config';
export { ContractViolationError } from './lib/errors';
export { Logger, getStoredLogs, clearStoredLogs, exportLogsAsCSV } from './lib/logger';
export type { LogEntry, LogLevel } from './lib/logger';
export { SupabaseOpportunityStore } from './lib/store';
export type { OpportunityStore } from './lib/store';
export { summarizeGrades, summarizeOutcomes } from './lib/grade-diagnostics';
export type * from './types/opportunity';
