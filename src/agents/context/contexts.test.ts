import {
  ArchitectureContext,
  BusinessContext,
  CICDContext,
  ConfigurationContext,
  DefaultContext,
  DeploymentContext,
  EventDrivenContext,
  ImplementationContext,
  ObservabilityContext,
  OperationsContext,
  ResilienceContext,
  SecurityDomainContext,
  StoryContext,
  TestingContext,
} from './index';
import { AgentFrameworkError } from '../../utils/errorUtils';

describe('AgentContext base', () => {
  it('generates ids and defaults lastUpdated to createdAt', () => {
    const context = DefaultContext.builder().build();

    expect(context.contextId).toMatch(/^context-/);
    expect(context.sessionId).toMatch(/^session-/);
    expect(context.lastUpdated.getTime()).toBe(context.createdAt.getTime());
    expect(context.domain).toBe('default');
    expect(context.contextType).toBe('default-context');
  });

  it('keeps explicit ids and timestamps', () => {
    const createdAt = new Date('2024-01-01T00:00:00Z');
    const context = DefaultContext.builder()
      .contextId('ctx-1')
      .sessionId('session-1')
      .createdAt(createdAt)
      .domain('architecture')
      .build();

    expect(context.contextId).toBe('ctx-1');
    expect(context.sessionId).toBe('session-1');
    expect(context.createdAt).toBe(createdAt);
    expect(context.domain).toBe('architecture');
  });

  it('stores security helpers and description as properties', () => {
    const context = DefaultContext.builder()
      .description('Review the gateway')
      .requiresAuthentication(true)
      .requiresTls13(true)
      .requiredPermission('AGENT_READ')
      .serviceType('gateway')
      .property('ignored', null)
      .build();

    expect(context.getProperties()).toEqual({
      description: 'Review the gateway',
      requiresAuthentication: true,
      requiresTLS13: true,
      requiredPermission: 'AGENT_READ',
      serviceType: 'gateway',
    });
    expect(context.getDescription()).toBe('Review the gateway');
  });

  it('returns a copy of the properties', () => {
    const context = DefaultContext.builder().property('objective', 'ship').build();
    const properties = context.getProperties();
    properties.objective = 'changed';

    expect(context.getProperty('objective')).toBe('ship');
  });

  it('reads list properties from arrays and comma separated strings', () => {
    const context = DefaultContext.builder()
      .property('required-capabilities', 'unit-testing, tdd-bdd')
      .property('tags', ['a', '', 'b'])
      .build();

    expect(context.getListProperty('required-capabilities')).toEqual(['unit-testing', 'tdd-bdd']);
    expect(context.getListProperty('tags')).toEqual(['a', 'b']);
    expect(context.getListProperty('missing')).toEqual([]);
  });

  it('bumps lastUpdated when the session changes', () => {
    const context = DefaultContext.builder().createdAt(new Date('2024-01-01T00:00:00Z')).build();
    context.setSessionId('session-2');

    expect(context.sessionId).toBe('session-2');
    expect(context.lastUpdated.getTime()).toBeGreaterThan(context.createdAt.getTime());
  });
});

describe('CICDContext', () => {
  it('is valid with build tools alone and reports pipeline capabilities', () => {
    const context = CICDContext.builder()
      .buildTools(['maven', 'maven', null])
      .testingFrameworks(['junit'])
      .testTypes(['unit'])
      .deploymentStrategies(['blue-green'])
      .environments(['staging'])
      .build();

    expect(context.domain).toBe('cicd');
    expect(context.getBuildTools()).toEqual(['maven']);
    expect(context.isValid()).toBe(true);
    expect(context.hasTestingAutomation()).toBe(true);
    expect(context.hasDeploymentAutomation()).toBe(true);
    expect(context.hasSecurityIntegration()).toBe(false);
  });

  it('is invalid when empty', () => {
    expect(CICDContext.builder().build().isValid()).toBe(false);
  });

  it('ignores duplicates and rejects empty names in adders', () => {
    const context = CICDContext.builder().build();

    expect(context.addSecurityScanner('sast')).toBe(true);
    expect(context.addSecurityScanner('sast')).toBe(false);
    expect(() => context.addSecurityScanner('  ')).toThrow(AgentFrameworkError);
    expect(context.hasSecurityIntegration()).toBe(true);
  });

  it('hands out defensive copies', () => {
    const context = CICDContext.builder().buildTools(['gradle']).build();
    context.getBuildTools().push('maven');

    expect(context.getBuildTools()).toEqual(['gradle']);
  });

  it('summarizes recorded tooling', () => {
    const context = CICDContext.builder().buildTools(['maven']).securityScanners(['sast']).build();
    expect(context.summarize()).toBe('build: maven; security: sast');
  });
});

describe('ConfigurationContext', () => {
  it('checks flags, secrets, isolation and validation', () => {
    const context = ConfigurationContext.builder()
      .featureFlags(['new-checkout'])
      .rolloutStrategies(['percentage'])
      .secretsManagers(['vault'])
      .environments(['dev'])
      .build();

    expect(context.isValid()).toBe(true);
    expect(context.hasFeatureFlags()).toBe(true);
    expect(context.hasSecretsManagement()).toBe(false);
    expect(context.hasEnvironmentIsolation()).toBe(false);

    context.addEnvironment('prod');
    context.addValidationRule('schema');
    expect(context.hasEnvironmentIsolation()).toBe(true);
    expect(context.hasConfigValidation()).toBe(true);
  });
});

describe('ResilienceContext', () => {
  it('reports fault tolerance and chaos engineering', () => {
    const context = ResilienceContext.builder()
      .circuitBreakers(['payments'])
      .retryPatterns(['exponential'])
      .build();

    expect(context.domain).toBe('resilience');
    expect(context.hasFaultTolerance()).toBe(true);
    expect(context.hasChaosEngineering()).toBe(false);
    context.addChaosExperiment('pod-kill');
    expect(context.hasChaosEngineering()).toBe(true);
  });
});

describe('EventDrivenContext', () => {
  it('tracks schema versions', () => {
    const context = EventDrivenContext.builder().build();
    expect(context.isValid()).toBe(false);

    context.updateSchemaVersion('OrderPlaced', 'v1');
    context.updateSchemaVersion('OrderPlaced', 'v2');

    expect(context.isValid()).toBe(true);
    expect(context.getSchemaVersion('OrderPlaced')).toBe('v2');
    expect(context.getEventSchemas()).toEqual({ OrderPlaced: 'v2' });
  });

  it('detects event sourcing and resilience patterns', () => {
    const context = EventDrivenContext.builder()
      .messageBrokers(['kafka'])
      .eventStores(['eventstore'])
      .idempotencyPatterns(['dedup-key'])
      .build();

    expect(context.hasEventSourcing()).toBe(true);
    expect(context.hasResiliencePatterns()).toBe(true);
  });
});

describe('ObservabilityContext', () => {
  it('is healthy only when every endpoint is UP or HEALTHY', () => {
    const context = ObservabilityContext.builder()
      .healthEndpoints(['/health', '/ready'])
      .healthStatuses({ '/health': 'UP', '/ready': 'healthy' })
      .build();

    expect(context.isHealthy()).toBe(true);
    context.updateHealthStatus('/ready', 'DOWN');
    expect(context.isHealthy()).toBe(false);
  });

  it('is not healthy without endpoints', () => {
    expect(ObservabilityContext.builder().build().isHealthy()).toBe(false);
  });

  it('reports signal coverage', () => {
    const context = ObservabilityContext.builder().metricCollectors(['prometheus']).logAggregators(['loki']).build();

    expect(context.hasMetrics()).toBe(true);
    expect(context.hasLogging()).toBe(true);
    expect(context.hasTracing()).toBe(false);
    expect(context.hasAlerting()).toBe(false);
    expect(context.isValid()).toBe(false);
  });
});

describe('SecurityDomainContext', () => {
  it('is hardened with controls, auth methods and encryption', () => {
    const context = SecurityDomainContext.builder()
      .controls(['waf'])
      .authenticationMethods(['oauth2'])
      .build();

    expect(context.domain).toBe('security');
    expect(context.riskLevel).toBe('medium');
    expect(context.isValid()).toBe(true);
    expect(context.isHardened()).toBe(false);
    context.addEncryptionStandard('TLS1.3');
    expect(context.isHardened()).toBe(true);
  });
});

describe('BusinessContext', () => {
  it('matches goals case-insensitively', () => {
    const context = BusinessContext.builder().businessGoals(['Reduce Checkout Time']).build();

    expect(context.isAlignedWithGoal('reduce checkout time')).toBe(true);
    expect(context.isAlignedWithGoal('grow revenue')).toBe(false);
    expect(context.isAlignedWithGoal(null)).toBe(false);
  });
});

describe('TestingContext', () => {
  it('passes only when every suite passed', () => {
    const context = TestingContext.builder()
      .testSuites(['unit', 'integration'])
      .suiteStatuses({ unit: 'passed', integration: 'SUCCESS' })
      .build();

    expect(context.isPassing()).toBe(true);
    context.recordSuiteResult('e2e', 'FAILED');
    expect(context.isPassing()).toBe(false);
  });

  it('does not pass without suites', () => {
    expect(TestingContext.builder().frameworks(['jest']).build().isPassing()).toBe(false);
  });
});

describe('ArchitectureContext', () => {
  it('is documented once a decision has a record', () => {
    const context = ArchitectureContext.builder().services(['orders']).build();
    expect(context.isDocumented()).toBe(false);

    context.recordDecision('Use CQRS', 'ADR-001');
    expect(context.isDocumented()).toBe(true);
  });
});

describe('DeploymentContext', () => {
  it('needs approvals before rollout', () => {
    const context = DeploymentContext.builder().artifacts(['orders:1.2.0']).build();
    expect(context.isReadyForRollout()).toBe(false);

    context.addApproval('release-manager');
    expect(context.isReadyForRollout()).toBe(true);
  });
});

describe('OperationsContext', () => {
  it('is ready when every readiness check is READY or PASSED', () => {
    const context = OperationsContext.builder()
      .readinessChecks(['db'])
      .checkStatuses({ db: 'ready' })
      .build();

    expect(context.isReady()).toBe(true);
    context.recordReadiness('cache', 'PENDING');
    expect(context.isReady()).toBe(false);
    expect(context.hasMonitoring()).toBe(false);
    expect(context.hasDeploymentTargets()).toBe(false);
  });
});

describe('ImplementationContext', () => {
  it('is ready when every task is done', () => {
    const context = ImplementationContext.builder().build();
    context.updateTaskStatus('api', 'DONE');
    context.updateTaskStatus('ui', 'completed');

    expect(context.isValid()).toBe(true);
    expect(context.isReady()).toBe(true);
  });
});

describe('StoryContext', () => {
  it('is valid with a title or body', () => {
    expect(StoryContext.builder().build().isValid()).toBe(false);

    const story = StoryContext.builder().issueId(42).issueTitle('Add loyalty points').dependencies(['pos-customer']).build();
    expect(story.isValid()).toBe(true);
    expect(story.issueId).toBe(42);
    expect(story.domain).toBe('story');
    expect(story.getDependencies()).toEqual(['pos-customer']);
  });
});
