import type { ExecutionRecord, ProcessSnapshot } from '../types/scheduling.js';

export function formatExecutionRecord(record: ExecutionRecord): string {
  return `Executed Process ID: ${record.processId}, Time Executed: ${record.executed}, Time Remaining: ${record.remaining}`;
}

export function formatProcess(process: ProcessSnapshot): string {
  return `P${process.id}(priority=${process.priority}, remaining=${process.remainingTime}, executed=${process.totalExecutedTime})`;
}

/**
 * One line per tier, highest priority first
 */
export function formatTiers(tiers: ReadonlyArray<ReadonlyArray<ProcessSnapshot>>): string[] {
  return tiers.map((queue, index) => `Tier ${index}: [${queue.map(formatProcess).join(', ')}]`);
}
