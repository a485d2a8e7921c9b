/**
 * Outcome of a single agent consultation.
 */
export const AgentStatus = {
  SUCCESS: 'SUCCESS',
  FAILURE: 'FAILURE',
  /** Processing halted on purpose (loop breaker, scope limits). */
  STOPPED: 'STOPPED',
  PENDING: 'PENDING',
} as const;

export type AgentStatus = typeof AgentStatus[keyof typeof AgentStatus];
