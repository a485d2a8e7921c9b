export * from './AgentContext';
export * from './ArchitectureContext';
export * from './BusinessContext';
export * from './CICDContext';
export * from './ConfigurationContext';
export * from './DefaultContext';
export * from './DeploymentContext';
export * from './EventDrivenContext';
export * from './ImplementationContext';
export * from './ObservabilityContext';
export * from './OperationsContext';
export * from './ResilienceContext';
export * from './SecurityDomainContext';
export * from './StoryContext';
export * from './TestingContext';
