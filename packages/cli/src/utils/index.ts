/**
 * CLI Utilities
 *
 * This module re-exports all utility functions for convenience.
 */

export * from "./logger.js";
export * from "./config.js";
