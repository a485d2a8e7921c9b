import { Agent } from '../core/Agent';
import { AgentStatus } from '../core/AgentStatus';
import { AgentType } from '../core/AgentType';
import { CICDContext } from '../context/CICDContext';
import { ConfigurationContext } from '../context/ConfigurationContext';
import { ResilienceContext } from '../context/ResilienceContext';
import { defaultContext, requestFor } from '../../tests/agentFixtures';
import { ArchitectureAgent } from './ArchitectureAgent';
import { BusinessDomainAgent } from './BusinessDomainAgent';
import { CICDPipelineAgent } from './CICDPipelineAgent';
import { ConfigurationManagementAgent } from './ConfigurationManagementAgent';
import { DeploymentAgent } from './DeploymentAgent';
import { DocumentationAgent } from './DocumentationAgent';
import { EventDrivenArchitectureAgent } from './EventDrivenArchitectureAgent';
import { ImplementationAgent } from './ImplementationAgent';
import { IntegrationGatewayAgent } from './IntegrationGatewayAgent';
import { ObservabilityAgent } from './ObservabilityAgent';
import { PairNavigatorAgent } from './PairNavigatorAgent';
import { ResilienceEngineeringAgent } from './ResilienceEngineeringAgent';
import { SecurityAgent } from './SecurityAgent';
import { TestingAgent } from './TestingAgent';

describe('guidance agents', () => {
  const cases: Array<[Agent, string]> = [
    [new ImplementationAgent(), 'Implementation guidance: '],
    [new DeploymentAgent(), 'Deployment guidance: '],
    [new TestingAgent(), 'Testing pattern recommendation: '],
    [new SecurityAgent(), 'Security recommendation: '],
    [new ObservabilityAgent(), 'Observability guidance: '],
    [new DocumentationAgent(), 'Documentation guidance: '],
    [new BusinessDomainAgent(), 'Business domain guidance: '],
    [new IntegrationGatewayAgent(), 'Integration guidance: '],
    [new EventDrivenArchitectureAgent(), 'Event-driven pattern: '],
    [new CICDPipelineAgent(), 'CI/CD pipeline guidance: '],
    [new ConfigurationManagementAgent(), 'Configuration management guidance: '],
    [new ResilienceEngineeringAgent(), 'Resilience pattern guidance: '],
  ];

  it.each(cases)('agent %# prefixes its guidance', async (agent, prefix) => {
    const response = await agent.processRequest(requestFor(defaultContext(agent.getTechnicalDomain()), 'add caching'));

    expect(response.status).toBe(AgentStatus.SUCCESS);
    expect(response.output).toBe(`${prefix}add caching`);
    expect(response.confidence).toBe(0.8);
    expect(response.recommendations).toEqual(['implement pattern', 'configure system', 'add monitoring']);
    expect(response.agentType).toBe(agent.agentType);
  });

  it('declares elevated requirements for security and configuration', () => {
    expect(new SecurityAgent().getRequiredRoles()).toEqual(['ADMIN']);
    expect(new SecurityAgent().getRequiredPermissions()).toEqual(['AGENT_ADMIN', 'SECURITY_VALIDATE']);
    expect(new ConfigurationManagementAgent().getRequiredRoles()).toEqual(['ADMIN', 'CONFIG_MANAGER']);
    expect(new ConfigurationManagementAgent().getRequiredPermissions()).toEqual(['CONFIG_MANAGE', 'SECRETS_MANAGE']);
    expect(new IntegrationGatewayAgent().getRequiredPermissions())
      .toEqual(['SERVICE_READ', 'SERVICE_WRITE', 'AGENT_READ', 'AGENT_WRITE']);
  });
});

describe('ArchitectureAgent', () => {
  it('analyses the system type, requirements and constraints', async () => {
    const agent = new ArchitectureAgent();
    const context = defaultContext('architecture', {
      systemType: 'microservices',
      requirements: ['security'],
      constraints: { team_size: 'small' },
    });

    const response = await agent.processRequest(requestFor(context, 'Design the order service'));

    expect(response.output).toBe(
      "Architecture Analysis for 'Design the order service':\n\n" +
      'System Type: microservices\n' +
      'Recommended Patterns: API Gateway, Service Discovery, Circuit Breaker, Event Sourcing, CQRS, Saga Pattern\n' +
      'Key Requirements: security\n'
    );
    expect(response.confidence).toBeCloseTo(0.9);
    expect(response.recommendations).toHaveLength(13);
    expect(response.recommendations[0]).toBe(
      'Implement microservices architecture for Design the order service to enables independent deployment, scaling, and technology diversity'
    );
    expect(response.recommendations).toContain('Prefer monolithic or modular monolith over microservices');
    expect(response.metadata.tradeOffs).toEqual([
      'Security vs Developer Velocity: Additional security layers slow development iteration',
      'Team Size vs Architecture Complexity: Small teams struggle with distributed systems',
    ]);
  });

  it('keeps the specialised session contexts and drops them together', () => {
    const agent = new ArchitectureAgent();
    const cicd = agent.getCICDContext('s-1');

    expect(agent.getCICDContext('s-1')).toBe(cicd);
    expect(agent.getEventDrivenContext('s-1').domain).toBe('event-driven');
    expect(agent.getConfigurationContext('s-1').domain).toBe('configuration');
    expect(agent.getResilienceContext('s-1').domain).toBe('resilience');

    agent.removeContext('s-1');

    expect(agent.getCICDContext('s-1')).not.toBe(cicd);
  });
});

describe('CICDPipelineAgent', () => {
  const agent = new CICDPipelineAgent();
  const context = CICDContext.builder().serviceName('pos-checkout').build();

  it('gives Kubernetes, Helm and canary guidance for a service', () => {
    const kubernetes = agent.provideKubernetesDeploymentGuidance(context);
    expect(kubernetes.output).toBe('Kubernetes deployment guidance for service: pos-checkout');
    expect(kubernetes.confidence).toBe(0.85);
    expect(kubernetes.recommendations[0]).toBe('Use rolling deployment strategy for zero-downtime updates');

    expect(agent.provideHelmDeploymentGuidance(context).output).toBe('Helm deployment guidance for service: pos-checkout');
    expect(agent.provideCanaryDeploymentGuidance(context).recommendations)
      .toContain('Gradually increase traffic to new version');
  });

  it('extracts pipeline tools from guidance text', () => {
    agent.updateContext('s-9', 'Build with Maven and Docker, scan with SAST, deploy blue-green from Jenkins');

    const ctx = agent.getOrCreateContext('s-9');
    expect(ctx.getBuildTools()).toEqual(['maven', 'docker']);
    expect(ctx.getSecurityScanners()).toEqual(['sast']);
    expect(ctx.getDeploymentStrategies()).toEqual(['blue-green']);
    expect(ctx.getOrchestrationTools()).toEqual(['jenkins']);
  });

  it('renders its pipeline checklist', () => {
    expect(agent.generateOutput('harden builds')).toContain('For query: harden builds\n\n- Implement security scanning');
  });
});

describe('ConfigurationManagementAgent', () => {
  const agent = new ConfigurationManagementAgent();

  it('reports missing profiles per environment', () => {
    const context = ConfigurationContext.builder()
      .serviceName('pos-catalog')
      .environments(['dev', 'prod'])
      .profileMappings({ dev: 'local' })
      .build();

    const response = agent.provideEnvironmentProfileGuidance(context);

    expect(response.output).toBe('Environment profile guidance for service: pos-catalog (2 environments)');
    expect(response.recommendations).toEqual([
      'Environment dev uses profile local',
      'Define a configuration profile for environment prod',
      'Validate configuration at startup',
    ]);
  });

  it('names the service mesh from context properties', () => {
    const context = ConfigurationContext.builder().serviceName('pos-order').property('serviceMesh', 'linkerd').build();

    expect(agent.provideServiceMeshGuidance(context).output)
      .toBe('Service mesh guidance for service: pos-order with mesh: linkerd');
    expect(agent.provideKubernetesConfigGuidance(context).recommendations[0])
      .toBe('Use ConfigMaps for non-sensitive configuration');
  });
});

describe('ResilienceEngineeringAgent', () => {
  it('gives health check, disruption budget and autoscaler guidance', () => {
    const agent = new ResilienceEngineeringAgent();
    const context = ResilienceContext.builder().serviceName('pos-payments').build();

    expect(agent.provideKubernetesHealthCheckGuidance(context).output)
      .toBe('Kubernetes health check guidance for service: pos-payments');
    expect(agent.providePodDisruptionBudgetGuidance(context).output)
      .toBe('Pod Disruption Budget guidance for service: pos-payments');
    expect(agent.provideHorizontalPodAutoscalerGuidance(context).recommendations)
      .toEqual([
        'Configure CPU and memory thresholds for scaling',
        'Set appropriate min and max replica counts',
        'Use custom metrics for application-specific scaling',
      ]);
  });
});

describe('EventDrivenArchitectureAgent', () => {
  it('tracks schema versions across guidance calls', () => {
    const agent = new EventDrivenArchitectureAgent();

    expect(agent.provideSchemaGuidance('s-1', 'OrderPlaced', '1').output).toBe('Event schema guidance for OrderPlaced at v1');
    expect(agent.provideSchemaGuidance('s-1', 'OrderPlaced', '2').output)
      .toBe('Event schema guidance for OrderPlaced from v1 to v2');
    expect(agent.getOrCreateContext('s-1').getSchemaVersion('OrderPlaced')).toBe('2');
  });

  it('records brokers and sagas mentioned in guidance', () => {
    const agent = new EventDrivenArchitectureAgent();

    agent.updateContext('s-2', 'Publish to Kafka and coordinate with a saga; add a dead letter queue');

    const ctx = agent.getOrCreateContext('s-2');
    expect(ctx.getMessageBrokers()).toEqual(['kafka']);
    expect(ctx.getSagas()).toEqual(['saga-pattern']);
    expect(ctx.getDeadLetterQueues()).toEqual(['failed-events']);
  });
});

describe('DocumentationAgent', () => {
  it('renders a markdown guide', () => {
    const output = new DocumentationAgent().generateOutput('document the API');

    expect(output.startsWith('# Documentation Agent Guidance\n\nRequest: document the API\n\n## API Documentation Best Practices:\n')).toBe(true);
    expect(output).toContain('## Documentation Synchronization Mechanisms:\n- Automated generation from doc comments\n');
  });
});

describe('PairNavigatorAgent', () => {
  let agent: PairNavigatorAgent;
  const context = defaultContext('pair-programming');

  beforeEach(() => {
    agent = new PairNavigatorAgent();
  });

  it('stops when the same request repeats', async () => {
    await agent.processRequest(requestFor(context, 'review the parser'));
    const response = await agent.processRequest(requestFor(context, 'review the parser'));

    expect(response.status).toBe(AgentStatus.STOPPED);
    expect(response.output).toBe('Loop detected: repeated request in session session-test');
    expect(response.agentType).toBe(AgentType.PAIR_PROGRAMMING);
  });

  it('stops after three iterations until reset', async () => {
    for (const step of ['one', 'two', 'three']) {
      const response = await agent.processRequest(requestFor(context, step));
      expect(response.status).toBe(AgentStatus.SUCCESS);
    }

    const stopped = await agent.processRequest(requestFor(context, 'four'));
    expect(stopped.status).toBe(AgentStatus.STOPPED);
    expect(stopped.metadata.stopReason).toBe('Iteration limit reached (3) in session session-test');
    expect(agent.getIterationCount('session-test')).toBe(3);

    agent.resetIterationCounter('session-test');
    const resumed = await agent.processRequest(requestFor(context, 'four'));
    expect(resumed.output).toBe('Code review guidance: four');
    expect(resumed.metadata.iteration).toBe(1);
  });
});
