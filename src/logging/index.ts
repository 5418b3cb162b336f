/**
 * Logging Module
 * ==============
 *
 * Structured, component-scoped logging on top of winston.
 */

export * from './types';
export { AgentLogger, createAgentLogger } from './agent-logger';
export type { AgentLoggerOptions } from './agent-logger';
export { ComponentLogger } from './component-logger';
