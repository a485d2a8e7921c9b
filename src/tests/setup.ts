// Loaded through jest `setupFiles`, before any module reads configuration.
process.env.NODE_ENV = 'test';
process.env.AGENT_JWT_SECRET = 'test-secret-for-agent-tokens';
process.env.AGENT_JWT_ISSUER = 'agent-guidance-router-test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';
process.env.LOG_TO_FILE = 'false';
