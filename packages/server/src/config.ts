/**
 * @module config
 * @description 服务器配置模块。
 * 配置来源的优先级为：命令行参数 > JSON 配置文件 > 默认值。
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import {
  DEFAULT_CONFIG,
  ErrorCode,
  ForwardError,
  getErrnoCode,
  getLogLevel,
  isLogLevel,
  type ServerConfig,
} from '@zhuanjie/shared';

/** 数据目录，存放映射文件、PID 文件、日志和配置文件 */
export const DATA_DIR = join(homedir(), '.zhuanjie');

/** 默认配置文件路径 */
export const DEFAULT_CONFIG_FILE = join(DATA_DIR, 'server.json');

/** 默认映射文件路径 */
export const DEFAULT_MAPPING_FILE = join(DATA_DIR, DEFAULT_CONFIG.MAPPING_FILE_NAME);

/**
 * 合并配置并填充默认值
 *
 * 后面的来源覆盖前面的来源，值为 `undefined` 的字段不参与覆盖。
 *
 * @param sources - 按优先级从低到高排列的部分配置
 * @returns 完整的服务器配置
 */
export function resolveServerConfig(...sources: Partial<ServerConfig>[]): ServerConfig {
  const merged: Partial<ServerConfig> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  return {
    host: merged.host ?? DEFAULT_CONFIG.HOST,
    adminPort: merged.adminPort ?? DEFAULT_CONFIG.ADMIN_PORT,
    listenHost: merged.listenHost ?? DEFAULT_CONFIG.LISTEN_HOST,
    startPort: merged.startPort ?? DEFAULT_CONFIG.START_PORT,
    mappingFile: merged.mappingFile ?? DEFAULT_MAPPING_FILE,
    connectTimeout: merged.connectTimeout ?? DEFAULT_CONFIG.CONNECT_TIMEOUT,
    stopTimeout: merged.stopTimeout ?? DEFAULT_CONFIG.STOP_TIMEOUT,
    closeConnectionsOnStop: merged.closeConnectionsOnStop ?? false,
    logLevel: merged.logLevel ?? getLogLevel(),
  };
}

function isPort(value: number, allowZero: boolean): boolean {
  return Number.isInteger(value) && value >= (allowZero ? 0 : 1) && value <= DEFAULT_CONFIG.MAX_PORT;
}

/**
 * 校验服务器配置
 *
 * `adminPort` 允许为 0，表示由系统分配端口。
 *
 * @throws {ForwardError} 配置无效时抛出 `INVALID_CONFIG`
 */
export function validateServerConfig(config: ServerConfig): void {
  const problems: string[] = [];

  if (!config.host.trim()) problems.push('host 不能为空');
  if (!config.listenHost.trim()) problems.push('listenHost 不能为空');
  if (!isPort(config.adminPort, true)) problems.push(`adminPort 无效: ${config.adminPort}`);
  if (!isPort(config.startPort, false)) problems.push(`startPort 无效: ${config.startPort}`);
  if (!config.mappingFile.trim()) problems.push('mappingFile 不能为空');
  if (!Number.isFinite(config.connectTimeout) || config.connectTimeout <= 0) {
    problems.push(`connectTimeout 必须为正数: ${config.connectTimeout}`);
  }
  if (!Number.isFinite(config.stopTimeout) || config.stopTimeout <= 0) {
    problems.push(`stopTimeout 必须为正数: ${config.stopTimeout}`);
  }
  if (!isLogLevel(config.logLevel)) problems.push(`未知的日志级别: ${String(config.logLevel)}`);

  if (problems.length > 0) {
    throw new ForwardError(ErrorCode.INVALID_CONFIG, `配置无效: ${problems.join('; ')}`);
  }
}

function readNumber(data: Record<string, unknown>, key: string, problems: string[]): number | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    problems.push(`${key} 应为数字`);
    return undefined;
  }
  return value;
}

function readString(data: Record<string, unknown>, key: string, problems: string[]): string | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    problems.push(`${key} 应为字符串`);
    return undefined;
  }
  return value;
}

/**
 * 把 JSON 对象转换为部分配置
 *
 * 未知字段会被忽略。
 *
 * @throws {ForwardError} 字段类型不符时抛出 `INVALID_CONFIG`
 */
export function parseConfigObject(data: unknown): Partial<ServerConfig> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ForwardError(ErrorCode.INVALID_CONFIG, '配置文件顶层必须是对象');
  }
  const record: Record<string, unknown> = { ...data };
  const problems: string[] = [];

  const logLevel = readString(record, 'logLevel', problems);
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    problems.push(`未知的日志级别: ${logLevel}`);
  }
  const closeConnectionsOnStop = record.closeConnectionsOnStop;
  if (closeConnectionsOnStop !== undefined && typeof closeConnectionsOnStop !== 'boolean') {
    problems.push('closeConnectionsOnStop 应为布尔值');
  }

  const config: Partial<ServerConfig> = {
    host: readString(record, 'host', problems),
    adminPort: readNumber(record, 'adminPort', problems),
    listenHost: readString(record, 'listenHost', problems),
    startPort: readNumber(record, 'startPort', problems),
    mappingFile: readString(record, 'mappingFile', problems),
    connectTimeout: readNumber(record, 'connectTimeout', problems),
    stopTimeout: readNumber(record, 'stopTimeout', problems),
    closeConnectionsOnStop: typeof closeConnectionsOnStop === 'boolean' ? closeConnectionsOnStop : undefined,
    logLevel: logLevel !== undefined && isLogLevel(logLevel) ? logLevel : undefined,
  };

  if (problems.length > 0) {
    throw new ForwardError(ErrorCode.INVALID_CONFIG, `配置文件无效: ${problems.join('; ')}`);
  }
  return config;
}

/**
 * 读取 JSON 配置文件
 *
 * @param filePath - 配置文件路径
 * @param required - 文件不存在时是否报错；为 `false` 时返回空配置
 * @throws {ForwardError} 文件无法读取或内容无效时抛出 `INVALID_CONFIG`
 */
export async function loadConfigFile(filePath: string, required = false): Promise<Partial<ServerConfig>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!required && getErrnoCode(error) === 'ENOENT') {
      return {};
    }
    throw new ForwardError(ErrorCode.INVALID_CONFIG, `无法读取配置文件 ${filePath}`, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ForwardError(ErrorCode.INVALID_CONFIG, `配置文件 ${filePath} 不是合法的 JSON`, error);
  }
  return parseConfigObject(data);
}
