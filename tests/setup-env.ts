// Keep test output quiet; individual tests pass an explicit level when they
// need a logger that writes.
process.env.LOG_LEVEL = 'silent';
process.env.NODE_ENV = 'test';
