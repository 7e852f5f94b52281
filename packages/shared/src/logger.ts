/**
 * @module logger
 *
 * 日志工具模块，提供带时间戳和级别过滤的日志输出功能。
 *
 * 日志级别从低到高为 `debug`、`info`、`warn`、`error`，`silent` 关闭所有输出。
 * 初始级别读取环境变量 `ZHUANJIE_LOG_LEVEL`，未设置时为 `info`。
 */

/** 日志级别 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** 各级别的权重，数值越大越严重 */
const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * 判断字符串是否为合法的日志级别
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);
}

const envLevel = process.env.ZHUANJIE_LOG_LEVEL;
let currentLevel: LogLevel = envLevel && isLogLevel(envLevel) ? envLevel : 'info';

/**
 * 设置全局日志级别
 *
 * @param level - 新的日志级别，低于该级别的日志将被丢弃
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * 获取当前日志级别
 */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[currentLevel];
}

/**
 * 格式化当前时间为日志时间戳
 *
 * @returns 格式化的时间字符串，格式为 HH:MM:SS.mmm
 */
function formatTimestamp(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const ms = String(now.getMilliseconds()).padStart(3, '0');
  return `${hours}:${minutes}:${seconds}.${ms}`;
}

/**
 * 带时间戳的日志工具
 */
export const logger = {
  /**
   * 输出调试日志（连接级别的细节）
   */
  debug: (...message: unknown[]): void => {
    if (enabled('debug')) {
      console.log(`[${formatTimestamp()}]`, ...message);
    }
  },

  /**
   * 输出信息日志
   */
  info: (...message: unknown[]): void => {
    if (enabled('info')) {
      console.log(`[${formatTimestamp()}]`, ...message);
    }
  },

  /**
   * 输出信息日志（`info` 的别名）
   */
  log: (...message: unknown[]): void => {
    logger.info(...message);
  },

  /**
   * 输出警告日志
   */
  warn: (...message: unknown[]): void => {
    if (enabled('warn')) {
      console.warn(`[${formatTimestamp()}]`, ...message);
    }
  },

  /**
   * 输出错误日志
   */
  error: (...message: unknown[]): void => {
    if (enabled('error')) {
      console.error(`[${formatTimestamp()}]`, ...message);
    }
  },
};
