import { AbstractAgent } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { DefaultContext } from '../context/DefaultContext';

const GUIDE_SECTIONS: ReadonlyArray<{ title: string; items: readonly string[] }> = [
  {
    title: 'API Documentation Best Practices',
    items: [
      'Use OpenAPI/Swagger specifications for API documentation',
      'Generate reference documentation from route and schema definitions',
      'Ensure endpoint schema synchronization with code',
      'API documentation must be kept synchronized with implementation',
    ],
  },
  {
    title: 'Documentation Validation and Completeness',
    items: [
      'Create completeness checklists for all documentation',
      'Implement automated documentation metrics and coverage analysis',
      'Use CI/CD pipeline for broken links detection',
      'Perform regular documentation audits and quality reviews',
      'Track documentation freshness and update frequency',
    ],
  },
  {
    title: 'Technical Documentation Best Practices',
    items: [
      'Keep API and technical documentation synchronized',
      'Provide comprehensive README documentation',
      'Maintain endpoint specifications and schema definitions',
      'Document all breaking API changes',
    ],
  },
  {
    title: 'Documentation Synchronization Mechanisms',
    items: [
      'Automated generation from doc comments',
      'CI/CD pipeline validation of documentation against code',
      'Version control integration for change tracking',
    ],
  },
];

export class DocumentationAgent extends AbstractAgent<DefaultContext> {
  constructor() {
    super(AgentType.DOCUMENTATION, [
      'api-documentation',
      'code-documentation',
      'user-guides',
      'technical-writing',
      'documentation-generation',
    ], 'documentation');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Documentation guidance: ', request);
  }

  protected createContext(sessionId: string): DefaultContext {
    return DefaultContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  /**
   * Markdown guide with one section per documentation concern.
   */
  generateOutput(query: string): string {
    const sections = GUIDE_SECTIONS.map(
      (section) => `## ${section.title}:\n${section.items.map((item) => `- ${item}\n`).join('')}`
    );
    return `# Documentation Agent Guidance\n\nRequest: ${query}\n\n${sections.join('\n')}`;
  }
}
