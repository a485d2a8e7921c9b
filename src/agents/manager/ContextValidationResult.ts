export const REQUIRED_CONTEXT_KEYS: readonly string[] = Object.freeze([
  'session-id',
  'project-context',
  'architectural-decisions',
  'current-task',
  'domain-constraints',
  'event-driven-context',
  'cicd-context',
  'configuration-context',
  'resilience-context',
]);

export const STALE_SESSION_MARKER = 'stale-session-context';

export class ContextValidationResult {
  readonly sufficient: boolean;
  readonly missingInputs: readonly string[];
  readonly validationTimeMs: number;

  constructor(missingInputs: readonly string[], validationTimeMs: number) {
    this.missingInputs = Object.freeze([...missingInputs]);
    this.sufficient = missingInputs.length === 0;
    this.validationTimeMs = validationTimeMs;
  }

  /** Empty when the context is sufficient. */
  get insufficientContextMessage(): string {
    if (this.sufficient) return '';
    return `Context insufficient – re-anchor needed.\nMissing inputs: ${this.missingInputs.join(', ')}\n`;
  }

  toJSON() {
    return {
      sufficient: this.sufficient,
      missingInputs: [...this.missingInputs],
      validationTimeMs: this.validationTimeMs,
      message: this.insufficientContextMessage,
    };
  }
}
