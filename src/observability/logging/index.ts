// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  LOG_LEVELS,
  configureLogger,
  getLogger,
  resetLogger,
  redact,
  withTiming,
} from './logger.js';
