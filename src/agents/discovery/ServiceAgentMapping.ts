import { z } from 'zod';
import { AgentType } from '../core/AgentType';
import defaultMappings from './service-agent-map.json';

const agentTypeSchema = z.nativeEnum(AgentType);

const mappingSchema = z.record(
  z.string().min(1),
  z.object({
    primary: agentTypeSchema,
    suggested: z.array(agentTypeSchema).default([]),
  })
);

export type ServiceMappingTable = z.infer<typeof mappingSchema>;

/**
 * Service name (e.g. `pos-order`) to the agent that owns its guidance, plus
 * agents worth consulting next. The default table ships as
 * service-agent-map.json.
 */
export class ServiceAgentMapping {
  private readonly table: ServiceMappingTable;

  /**
   * @throws ZodError when the table names an unknown agent type
   */
  constructor(table: unknown = defaultMappings) {
    this.table = mappingSchema.parse(table);
  }

  getPrimaryAgent(serviceName: string): AgentType | undefined {
    return this.entry(serviceName)?.primary;
  }

  getSuggestedAgents(serviceName: string): AgentType[] {
    return [...(this.entry(serviceName)?.suggested ?? [])];
  }

  getAllMappedServices(): string[] {
    return Object.keys(this.table);
  }

  hasMappingFor(serviceName: string): boolean {
    return Object.hasOwn(this.table, serviceName);
  }

  private entry(serviceName: string): ServiceMappingTable[string] | undefined {
    return Object.hasOwn(this.table, serviceName) ? this.table[serviceName] : undefined;
  }
}
