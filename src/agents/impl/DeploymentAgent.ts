import { AbstractAgent, GuidanceRule } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { DeploymentContext } from '../context/DeploymentContext';

export class DeploymentAgent extends AbstractAgent<DeploymentContext> {
  constructor() {
    super(AgentType.DEPLOYMENT, [
      'deployment-strategy',
      'rollback-procedures',
      'blue-green-deployment',
      'canary-releases',
      'infrastructure-automation',
    ], 'deployment');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Deployment guidance: ', request);
  }

  protected createContext(sessionId: string): DeploymentContext {
    return DeploymentContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  protected guidanceRules(): readonly GuidanceRule<DeploymentContext>[] {
    return [
      { keywords: ['kubernetes', 'k8s'], apply: (ctx) => ctx.addDeploymentTarget('kubernetes') },
      { keywords: ['ecs'], apply: (ctx) => ctx.addDeploymentTarget('ecs') },
    ];
  }
}
