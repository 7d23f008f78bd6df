/**
 * Expenses Module: Public API
 */

export { ExpenseRecorder } from './expense-recorder.js';
export type { ExpenseRecorderDeps } from './expense-recorder.js';
export { BudgetReader, formatBudget, toBudgetNumber } from './budget-reader.js';
export type { BudgetReaderDeps } from './budget-reader.js';
export type { ExpenseEntry, RecordResult } from './types.js';
