import { AbstractAgent, GuidanceRule } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { Permission, Permissions, Role, Roles } from '../core/Permissions';
import { ConfigurationContext } from '../context/ConfigurationContext';

export class ConfigurationManagementAgent extends AbstractAgent<ConfigurationContext> {
  constructor() {
    super(AgentType.CONFIGURATION_MANAGEMENT, [
      'config-externalization',
      'secrets-management',
      'environment-configuration',
      'config-validation',
      'feature-flags',
    ], 'configuration');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Configuration management guidance: ', request);
  }

  getRequiredRoles(): Role[] {
    return [Roles.ADMIN, Roles.CONFIG_MANAGER];
  }

  getRequiredPermissions(): Permission[] {
    return [Permissions.CONFIG_MANAGE, Permissions.SECRETS_MANAGE];
  }

  protected createContext(sessionId: string): ConfigurationContext {
    return ConfigurationContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  provideKubernetesConfigGuidance(context: ConfigurationContext): AgentResponse {
    return this.serviceGuidance(`Kubernetes configuration guidance for service: ${serviceOf(context)}`, [
      'Use ConfigMaps for non-sensitive configuration',
      'Use Secrets for sensitive data',
      'Apply configuration through environment variables or volumes',
    ]);
  }

  /**
   * Reads the mesh name from the `serviceMesh` property (defaults to `istio`).
   */
  provideServiceMeshGuidance(context: ConfigurationContext): AgentResponse {
    const mesh = context.getStringProperty('serviceMesh') ?? 'istio';
    return this.serviceGuidance(`Service mesh guidance for service: ${serviceOf(context)} with mesh: ${mesh}`, [
      'Enable mTLS for service-to-service communication',
      'Configure traffic routing and load balancing',
      'Set up observability with distributed tracing',
    ]);
  }

  /**
   * One recommendation per environment, naming its mapped profile when there
   * is one. Environments without a profile are flagged.
   */
  provideEnvironmentProfileGuidance(context: ConfigurationContext): AgentResponse {
    const mappings = context.getProfileMappings();
    const environments = context.getEnvironments();
    const recommendations = environments.map((environment) => {
      const profile = mappings[environment];
      return profile
        ? `Environment ${environment} uses profile ${profile}`
        : `Define a configuration profile for environment ${environment}`;
    });
    if (!context.hasEnvironmentIsolation()) {
      recommendations.push('Separate configuration for at least two environments');
    }
    if (!context.hasConfigValidation()) {
      recommendations.push('Validate configuration at startup');
    }
    return this.serviceGuidance(
      `Environment profile guidance for service: ${serviceOf(context)} (${environments.length} environments)`,
      recommendations
    );
  }

  protected guidanceRules(): readonly GuidanceRule<ConfigurationContext>[] {
    return [
      { keywords: ['vault'], apply: (ctx) => ctx.addSecretsManager('vault') },
      { keywords: ['feature flag', 'feature-flag'], apply: (ctx) => ctx.addFeatureFlag('feature-flags') },
      { keywords: ['configmap'], apply: (ctx) => ctx.addConfigSource('configmap') },
      { keywords: ['schema validation', 'validate configuration'], apply: (ctx) => ctx.addValidationRule('schema') },
    ];
  }

  private serviceGuidance(output: string, recommendations: string[]): AgentResponse {
    return AgentResponse.builder()
      .agentType(this.agentType)
      .output(output)
      .confidence(0.85)
      .recommendations(recommendations)
      .build();
  }
}

function serviceOf(context: ConfigurationContext): string {
  return context.serviceName ?? 'unknown';
}
