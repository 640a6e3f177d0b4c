process.env.NODE_ENV = process.env.NODE_ENV ?? 'test';
process.env.JWT_SECRET = process.env.JWT_SECRET ?? 'test-secret-survey-insights-0123456789abcdef';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
delete process.env.REDIS_URL;
