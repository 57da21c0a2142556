// Keep test output readable; individual tests can override.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
