/**
 * Test environment setup
 *
 * Runs before any test module is loaded, so module-level loggers pick up
 * these values.
 */
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "silent";
