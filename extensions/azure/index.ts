/**
 * Azure Resource Toolkit — package entry point.
 */

export * from "./src/index.js";
