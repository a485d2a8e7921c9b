import { AbstractAgent } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { BusinessContext } from '../context/BusinessContext';

export class BusinessDomainAgent extends AbstractAgent<BusinessContext> {
  constructor() {
    super(AgentType.BUSINESS_DOMAIN, [
      'domain-modeling',
      'business-logic',
      'domain-driven-design',
      'ubiquitous-language',
      'bounded-context',
    ], 'business');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Business domain guidance: ', request);
  }

  protected createContext(sessionId: string): BusinessContext {
    return BusinessContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }
}
