/**
 * Progress of one consultation session: the current objective, the
 * decisions taken so far and the planned next steps.
 */
export class SessionContext {
  readonly sessionId: string;
  readonly createdAt: Date;
  private lastUpdatedValue: Date;
  private taskObjectiveValue?: string;
  private decisions: Record<string, unknown> = {};
  private steps: string[] = [];

  constructor(sessionId: string, now: Date = new Date()) {
    this.sessionId = sessionId;
    this.createdAt = now;
    this.lastUpdatedValue = now;
  }

  get lastUpdated(): Date {
    return this.lastUpdatedValue;
  }

  get taskObjective(): string | undefined {
    return this.taskObjectiveValue;
  }

  setLastUpdated(date: Date): void {
    this.lastUpdatedValue = date;
  }

  setTaskObjective(objective: string | undefined): void {
    this.taskObjectiveValue = objective;
    this.lastUpdatedValue = new Date();
  }

  getArchitecturalDecisions(): Record<string, unknown> {
    return { ...this.decisions };
  }

  setArchitecturalDecisions(decisions: Readonly<Record<string, unknown>>): void {
    this.decisions = { ...decisions };
    this.lastUpdatedValue = new Date();
  }

  getNextSteps(): string[] {
    return [...this.steps];
  }

  setNextSteps(steps: readonly string[]): void {
    this.steps = [...steps];
    this.lastUpdatedValue = new Date();
  }

  isStale(timeoutMs: number, now: number = Date.now()): boolean {
    return now - this.lastUpdatedValue.getTime() > timeoutMs;
  }

  toJSON() {
    return {
      sessionId: this.sessionId,
      createdAt: this.createdAt.toISOString(),
      lastUpdated: this.lastUpdatedValue.toISOString(),
      taskObjective: this.taskObjectiveValue,
      architecturalDecisions: this.getArchitecturalDecisions(),
      nextSteps: this.getNextSteps(),
    };
  }
}
