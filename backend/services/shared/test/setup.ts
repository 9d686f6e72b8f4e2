// backend/services/shared/test/setup.ts
// Runs before every test file, ahead of any import of the shared logger.
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || "silent";
