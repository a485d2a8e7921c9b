/**
 * Requirement extraction and rewriting for tracker stories: bullet lines
 * become EARS statements and Gherkin scenarios, question lines become open
 * questions.
 */

export const EarsPattern = {
  UBIQUITOUS: 'UBIQUITOUS',
  EVENT_DRIVEN: 'EVENT_DRIVEN',
  STATE_DRIVEN: 'STATE_DRIVEN',
  UNWANTED: 'UNWANTED',
} as const;

export type EarsPattern = typeof EarsPattern[keyof typeof EarsPattern];

export interface Requirement {
  text: string;
  pattern: EarsPattern;
}

export interface EarsStatement {
  pattern: EarsPattern;
  /** Trigger or state; absent for ubiquitous statements. */
  condition?: string;
  action: string;
}

export interface GherkinScenario {
  name: string;
  given: string;
  when: string;
  then: string;
}

export interface StoryBreakdown {
  requirements: Requirement[];
  openQuestions: string[];
}

const BULLET = /^(?:[-*+]|\d+[.)])\s+(.*)$/;
const CHECKBOX = /^\[[ xX]\]\s*/;
const MIN_REQUIREMENT_LENGTH = 10;
const SYSTEM_SHALL = 'THE system SHALL';

export function classifyRequirement(text: string): EarsPattern {
  const lower = text.toLowerCase();
  if (lower.includes('when ') || lower.includes('if ')) {
    return lower.includes('error') || lower.includes('fail') ? EarsPattern.UNWANTED : EarsPattern.EVENT_DRIVEN;
  }
  if (lower.includes('while ') || lower.includes('during ')) {
    return EarsPattern.STATE_DRIVEN;
  }
  return EarsPattern.UBIQUITOUS;
}

/**
 * Bullet and numbered lines of at least ten characters are requirements;
 * any line ending in `?` is an open question.
 */
export function breakDownStory(body: string): StoryBreakdown {
  const requirements: Requirement[] = [];
  const openQuestions: string[] = [];

  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const bullet = BULLET.exec(line);
    const text = (bullet ? bullet[1] : line).replace(CHECKBOX, '').trim();

    if (text.endsWith('?')) {
      openQuestions.push(text);
    } else if (bullet && text.length >= MIN_REQUIREMENT_LENGTH) {
      requirements.push({ text, pattern: classifyRequirement(text) });
    }
  }

  return { requirements, openQuestions };
}

function lowerFirst(text: string): string {
  return text ? text.charAt(0).toLowerCase() + text.slice(1) : text;
}

function upperFirst(text: string): string {
  return text ? text.charAt(0).toUpperCase() + text.slice(1) : text;
}

function normalizeAction(action: string): string {
  return lowerFirst(
    action
      .trim()
      .replace(/^(the\s+)?system\s+(shall|must|should|will)\s+/i, '')
      .replace(/^then\s+/i, '')
      .replace(/\.$/, '')
  );
}

/** First matching `[condition, action]` pair. */
function splitFirst(text: string, patterns: readonly RegExp[]): [string, string] | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) return [match[1].trim(), match[2]];
  }
  return undefined;
}

const STATE_PATTERNS = [
  /^while\s+(.+?)\s+then\s+(.+)$/is,
  /^(?:when\s+)?(?:in|during)\s+(.+?\s+state)[,:]?\s+(.+)$/is,
  /^(?:while|during)\s+(.+?)[,:]\s+(.+)$/is,
];

const EVENT_PATTERNS = [
  /^when\s+(.+?)\s+then\s+(.+)$/is,
  /^when\s+(.+?)[,:]\s+(.+)$/is,
  /^(?:on|upon)\s+(.+?)[,:]\s+(.+)$/is,
  /^after\s+(.+?)[,:]\s+(.+)$/is,
];

const UNWANTED_PATTERNS = [
  /^if\s+(.+?)\s+then\s+(.+)$/is,
  /^(?:if|when)\s+(.+?)[,:]\s+(.+)$/is,
  /^in\s+case\s+of\s+(.+?)[,:]\s+(.+)$/is,
];

export function toEarsStatement(requirement: Requirement): EarsStatement {
  const text = requirement.text.trim();
  switch (requirement.pattern) {
    case EarsPattern.STATE_DRIVEN: {
      const [condition, action] = splitFirst(text, STATE_PATTERNS) ?? ['in the appropriate state', text];
      return { pattern: requirement.pattern, condition, action: normalizeAction(action) };
    }
    case EarsPattern.EVENT_DRIVEN: {
      const [condition, action] = splitFirst(text, EVENT_PATTERNS) ?? ['the event occurs', text];
      return { pattern: requirement.pattern, condition, action: normalizeAction(action) };
    }
    case EarsPattern.UNWANTED: {
      const [condition, action] = splitFirst(text, UNWANTED_PATTERNS) ?? ['an error occurs', text];
      return { pattern: requirement.pattern, condition, action: normalizeAction(action) };
    }
    case EarsPattern.UBIQUITOUS:
    default: {
      const action = text
        .replace(/^always\s+/i, '')
        .replace(/^(the\s+system\s+)?(must|should|will|shall)\s+/i, '');
      return { pattern: EarsPattern.UBIQUITOUS, action: normalizeAction(action) };
    }
  }
}

export function renderEars(statement: EarsStatement): string {
  switch (statement.pattern) {
    case EarsPattern.STATE_DRIVEN:
      return `WHILE ${statement.condition}, ${SYSTEM_SHALL} ${statement.action}`;
    case EarsPattern.EVENT_DRIVEN:
      return `WHEN ${statement.condition}, ${SYSTEM_SHALL} ${statement.action}`;
    case EarsPattern.UNWANTED:
      return `IF ${statement.condition}, THEN ${SYSTEM_SHALL} ${statement.action}`;
    case EarsPattern.UBIQUITOUS:
    default:
      return `${SYSTEM_SHALL} ${statement.action}`;
  }
}

function scenarioName(text: string): string {
  const stripped = text
    .replace(/^(the system shall|the system must|system shall|system must)\s+/i, '')
    .replace(/^(when|if|given|while)\s+/i, '');
  const firstClause = stripped.split(/[,.]/)[0].replace(/\b(should|must|shall|will)\s+/gi, '').trim();
  const name = upperFirst(firstClause);
  return name.length > 80 ? `${name.slice(0, 77)}...` : name;
}

/**
 * One scenario per requirement. State-driven conditions become the Given,
 * triggers become the When, and the action is always the Then.
 */
export function toGherkinScenario(requirement: Requirement): GherkinScenario {
  const statement = toEarsStatement(requirement);
  const hasTrigger = statement.pattern === EarsPattern.EVENT_DRIVEN || statement.pattern === EarsPattern.UNWANTED;
  return {
    name: scenarioName(requirement.text),
    given: statement.pattern === EarsPattern.STATE_DRIVEN && statement.condition
      ? `the system is ${statement.condition}`
      : 'the system is available',
    when: hasTrigger && statement.condition ? statement.condition : 'the user performs the action',
    then: `the system should ${statement.action}`,
  };
}

export function renderScenario(scenario: GherkinScenario): string {
  return [
    `Scenario: ${scenario.name}`,
    `  Given ${scenario.given}`,
    `  When ${scenario.when}`,
    `  Then ${scenario.then}`,
  ].join('\n');
}

export function renderStoryDocument(title: string, breakdown: StoryBreakdown): string {
  const ears = breakdown.requirements
    .map((requirement, index) => `${index + 1}. ${renderEars(toEarsStatement(requirement))}`)
    .join('\n');
  const scenarios = breakdown.requirements
    .map((requirement) => renderScenario(toGherkinScenario(requirement)))
    .join('\n\n');
  const questions = breakdown.openQuestions.length > 0
    ? breakdown.openQuestions.map((question) => `- ${question}`).join('\n')
    : '- None';

  return [
    `# Strengthened Requirements: ${title}`,
    '',
    '## EARS Requirements',
    ears,
    '',
    '## Acceptance Criteria',
    scenarios,
    '',
    '## Open Questions',
    questions,
    '',
  ].join('\n');
}
