// Shared utilities for AgentChat

export { ConsoleLogger, noopLogger, type Logger, type LogLevel } from './logger.js';
export { newId, systemClock, type IdGenerator, type Clock } from './ids.js';
