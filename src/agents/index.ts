import { Agent } from './core/Agent';
import { ArchitectureAgent } from './impl/ArchitectureAgent';
import { BusinessDomainAgent } from './impl/BusinessDomainAgent';
import { CICDPipelineAgent } from './impl/CICDPipelineAgent';
import { ConfigurationManagementAgent } from './impl/ConfigurationManagementAgent';
import { DeploymentAgent } from './impl/DeploymentAgent';
import { DocumentationAgent } from './impl/DocumentationAgent';
import { EventDrivenArchitectureAgent } from './impl/EventDrivenArchitectureAgent';
import { ImplementationAgent } from './impl/ImplementationAgent';
import { IntegrationGatewayAgent } from './impl/IntegrationGatewayAgent';
import { ObservabilityAgent } from './impl/ObservabilityAgent';
import { PairNavigatorAgent } from './impl/PairNavigatorAgent';
import { ResilienceEngineeringAgent } from './impl/ResilienceEngineeringAgent';
import { SecurityAgent } from './impl/SecurityAgent';
import { StoryStrengtheningAgent } from './impl/StoryStrengtheningAgent';
import { TestingAgent } from './impl/TestingAgent';
import { AgentManager, AgentManagerOptions } from './manager/AgentManager';

export { AgentManager } from './manager/AgentManager';
export type { AgentManagerOptions, RegistryHealthStatus } from './manager/AgentManager';
export { AuditActions, AuditTrailManager } from './manager/AuditTrailManager';
export { AgentRequest } from './core/AgentRequest';
export { AgentResponse } from './core/AgentResponse';
export { AgentStatus } from './core/AgentStatus';
export { AgentType } from './core/AgentType';
export { SecurityContext } from './security/SecurityContext';
export type { Agent } from './core/Agent';
export * from './context';

/**
 * One instance of every built-in agent. Architecture comes first: it is
 * the fallback and the first healthy candidate.
 */
export function createDefaultAgents(): Agent[] {
  return [
    new ArchitectureAgent(),
    new ImplementationAgent(),
    new DeploymentAgent(),
    new TestingAgent(),
    new SecurityAgent(),
    new ObservabilityAgent(),
    new DocumentationAgent(),
    new BusinessDomainAgent(),
    new IntegrationGatewayAgent(),
    new PairNavigatorAgent(),
    new EventDrivenArchitectureAgent(),
    new CICDPipelineAgent(),
    new ConfigurationManagementAgent(),
    new ResilienceEngineeringAgent(),
    new StoryStrengtheningAgent(),
  ];
}

export function createDefaultAgentManager(options: AgentManagerOptions = {}): AgentManager {
  const manager = new AgentManager(options);
  createDefaultAgents().forEach((agent) => manager.registerAgent(agent));
  return manager;
}
