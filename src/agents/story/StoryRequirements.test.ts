import {
  EarsPattern,
  breakDownStory,
  classifyRequirement,
  renderEars,
  renderScenario,
  toEarsStatement,
  toGherkinScenario,
} from './StoryRequirements';

describe('StoryRequirements', () => {
  describe('classifyRequirement', () => {
    it.each([
      ['The system shall record every sale', EarsPattern.UBIQUITOUS],
      ['When a payment is declined, notify the cashier', EarsPattern.EVENT_DRIVEN],
      ['If the printer fails, show an error banner', EarsPattern.UNWANTED],
      ['While offline, queue receipts locally', EarsPattern.STATE_DRIVEN],
    ])('classifies "%s"', (text, pattern) => {
      expect(classifyRequirement(text)).toBe(pattern);
    });
  });

  it('splits bullets into requirements and questions', () => {
    const breakdown = breakDownStory([
      'As a cashier I want faster checkout.',
      '',
      '- [ ] The system shall record every sale',
      '2. When a payment is declined, notify the cashier',
      '* short',
      '- Should refunds need approval?',
      'Who owns the receipt template?',
    ].join('\n'));

    expect(breakdown.requirements.map((r) => r.text)).toEqual([
      'The system shall record every sale',
      'When a payment is declined, notify the cashier',
    ]);
    expect(breakdown.openQuestions).toEqual([
      'Should refunds need approval?',
      'Who owns the receipt template?',
    ]);
  });

  it.each([
    ['The system shall record every sale', 'THE system SHALL record every sale'],
    ['Always must log voided items', 'THE system SHALL log voided items'],
    ['When a payment is declined, notify the cashier', 'WHEN a payment is declined, THE system SHALL notify the cashier'],
    ['When the drawer opens then the system shall log it', 'WHEN the drawer opens, THE system SHALL log it'],
    ['While offline, queue receipts locally', 'WHILE offline, THE system SHALL queue receipts locally'],
    ['If the printer fails, show an error banner', 'IF the printer fails, THEN THE system SHALL show an error banner'],
  ])('renders "%s" as EARS', (text, expected) => {
    expect(renderEars(toEarsStatement({ text, pattern: classifyRequirement(text) }))).toBe(expected);
  });

  it('falls back to a generic trigger', () => {
    const statement = toEarsStatement({ text: 'Notify the manager', pattern: EarsPattern.EVENT_DRIVEN });

    expect(renderEars(statement)).toBe('WHEN the event occurs, THE system SHALL notify the manager');
  });

  it('builds a Gherkin scenario from a triggered requirement', () => {
    const scenario = toGherkinScenario({
      text: 'When a payment is declined, notify the cashier',
      pattern: EarsPattern.EVENT_DRIVEN,
    });

    expect(renderScenario(scenario)).toBe([
      'Scenario: A payment is declined',
      '  Given the system is available',
      '  When a payment is declined',
      '  Then the system should notify the cashier',
    ].join('\n'));
  });

  it('uses the state as the Given clause', () => {
    const scenario = toGherkinScenario({ text: 'While offline, queue receipts locally', pattern: EarsPattern.STATE_DRIVEN });

    expect(scenario).toEqual({
      name: 'Offline',
      given: 'the system is offline',
      when: 'the user performs the action',
      then: 'the system should queue receipts locally',
    });
  });
});
