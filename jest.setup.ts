/**
 * Jest Setup
 *
 * Runs before any test module is loaded, so loggers created at import
 * time pick up these values.
 */

process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "silent";
