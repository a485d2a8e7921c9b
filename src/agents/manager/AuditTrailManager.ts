import { Logger } from '../../utils/logger';

export const AuditActions = {
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  AUTHORIZATION_FAILED: 'AUTHORIZATION_FAILED',
  ROUTING_FAILED: 'ROUTING_FAILED',
  REQUEST_PROCESSED: 'REQUEST_PROCESSED',
  REQUEST_FAILED: 'REQUEST_FAILED',
} as const;

export type AuditAction = typeof AuditActions[keyof typeof AuditActions];

export interface AuditEntry {
  readonly timestamp: Date;
  /** Domain the request asked for. */
  readonly agentType: string;
  readonly userId: string;
  readonly action: AuditAction;
  readonly success: boolean;
}

export interface ComplianceReport {
  totalAuditEntries: number;
  successfulEntries: number;
  failedEntries: number;
  authenticationCompliance: number;
  authorizationCompliance: number;
  overallCompliance: number;
  generatedAt: string;
}

function percentage(part: number, total: number): number {
  if (total === 0) return 100;
  return Math.round((part / total) * 10000) / 100;
}

/**
 * In-memory record of every routed request. Entries are also written to the
 * audit log channel.
 */
export class AuditTrailManager {
  private readonly entries: AuditEntry[] = [];

  record(agentType: string, userId: string, action: AuditAction, success: boolean): AuditEntry {
    const entry: AuditEntry = Object.freeze({ timestamp: new Date(), agentType, userId, action, success });
    this.entries.push(entry);
    Logger.audit(action, `${userId} -> ${agentType}`, { success });
    return entry;
  }

  getAllAuditEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getAuditEntriesForUser(userId: string): AuditEntry[] {
    return this.entries.filter((entry) => entry.userId === userId);
  }

  clearAuditTrail(): void {
    this.entries.length = 0;
  }

  /**
   * Compliance percentages: the share of entries that were not rejected at
   * the given stage, and the overall success rate. An empty trail is 100%.
   */
  generateComplianceReport(): ComplianceReport {
    const total = this.entries.length;
    const successful = this.entries.filter((entry) => entry.success).length;
    const count = (action: AuditAction) => this.entries.filter((entry) => entry.action === action).length;

    return {
      totalAuditEntries: total,
      successfulEntries: successful,
      failedEntries: total - successful,
      authenticationCompliance: percentage(total - count(AuditActions.AUTHENTICATION_FAILED), total),
      authorizationCompliance: percentage(total - count(AuditActions.AUTHORIZATION_FAILED), total),
      overallCompliance: percentage(successful, total),
      generatedAt: new Date().toISOString(),
    };
  }
}
