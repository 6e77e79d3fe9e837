// lib/logger.ts

/**
 * 日志级别，名称与 CLI 的 --log-level 选项保持一致。
 */
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

let currentLevel: LogLevel = 'INFO';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * 设置全局日志级别。
 * 兼容 "WARN" 写法，其余未知值会被忽略并保持原级别。
 */
export function setLogLevel(level: string): void {
  const normalized = level.trim().toUpperCase();
  if (normalized === 'WARN') {
    currentLevel = 'WARNING';
  } else if (isLogLevel(normalized)) {
    currentLevel = normalized;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * 所有日志统一写到 stderr。
 * stdio 传输模式下 stdout 就是 MCP 协议通道，任何多余输出都会破坏 JSON-RPC 帧。
 */
function write(level: LogLevel, module: string, message: string, details: unknown[]): void {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[currentLevel]) {
    return;
  }
  const line = `[${new Date().toISOString()}] [${level}] [${module}] ${message}`;
  if (details.length > 0) {
    console.error(line, ...details);
  } else {
    console.error(line);
  }
}

/**
 * 创建带模块标签的日志器。
 * @param module 模块名称，会出现在每行日志的方括号中
 */
export function createLogger(module: string): Logger {
  return {
    debug: (message, ...details) => write('DEBUG', module, message, details),
    info: (message, ...details) => write('INFO', module, message, details),
    warn: (message, ...details) => write('WARNING', module, message, details),
    error: (message, ...details) => write('ERROR', module, message, details),
  };
}
