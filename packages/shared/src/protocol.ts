/**
 * @module protocol
 *
 * 端口转发协议定义模块。
 *
 * 本模块定义了转发系统的协议端口表、错误码、默认配置以及各类配置接口，
 * 包括映射记录、代理状态和服务器配置等数据结构的类型定义。
 */

import type { LogLevel } from './logger.js';

/**
 * 协议到目标端口（内部端口）的固定对照表
 *
 * 转发目标端口只由协议决定，不写入映射文件。
 */
export const PROTOCOL_PORTS = {
  ssh: 22,
  telnet: 23,
  http: 80,
  https: 443,
} as const;

/** 支持转发的协议 */
export type ForwardProtocol = keyof typeof PROTOCOL_PORTS;

/** 支持转发的协议列表，顺序与 {@link PROTOCOL_PORTS} 一致 */
export const SUPPORTED_PROTOCOLS: readonly ForwardProtocol[] = ['ssh', 'telnet', 'http', 'https'];

/**
 * 协议错误码
 *
 * 涵盖配置错误、资源错误和内部错误三大类。
 */
export enum ErrorCode {
  /** 不支持的协议 */
  UNSUPPORTED_PROTOCOL = 'UNSUPPORTED_PROTOCOL',
  /** 远程主机地址无效 */
  INVALID_HOST = 'INVALID_HOST',
  /** 映射记录格式错误 */
  INVALID_MAPPING = 'INVALID_MAPPING',
  /** 配置项不合法 */
  INVALID_CONFIG = 'INVALID_CONFIG',
  /** 请求缺少参数或请求体格式错误 */
  INVALID_REQUEST = 'INVALID_REQUEST',

  /** 可分配的外部端口已用尽 */
  PORT_EXHAUSTED = 'PORT_EXHAUSTED',
  /** 端口已被其他程序占用 */
  PORT_IN_USE = 'PORT_IN_USE',
  /** 没有权限绑定端口 */
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  /** 其他绑定失败 */
  BIND_FAILED = 'BIND_FAILED',

  /** 无法连接到远程目标 */
  CONNECT_FAILED = 'CONNECT_FAILED',
  /** 连接远程目标超时 */
  CONNECT_TIMEOUT = 'CONNECT_TIMEOUT',

  /** 映射文件写入失败 */
  PERSIST_FAILED = 'PERSIST_FAILED',

  /** 内部错误 */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * 转发错误类
 *
 * 继承自 {@link Error}，附带 {@link ErrorCode} 错误码，底层错误保存在 `cause` 中。
 */
export class ForwardError extends Error {
  /**
   * 创建一个转发错误实例。
   *
   * @param code - 错误码，参见 {@link ErrorCode}
   * @param message - 可读的错误描述信息
   * @param cause - 引发该错误的底层错误
   */
  constructor(
    public code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ForwardError';
  }
}

/**
 * 判断一个值是否为 {@link ForwardError}，可选地限定错误码
 */
export function isForwardError(error: unknown, code?: ErrorCode): error is ForwardError {
  return error instanceof ForwardError && (code === undefined || error.code === code);
}

/**
 * 读取系统错误的 `code` 字段（如 `EADDRINUSE`、`ENOENT`）
 *
 * @returns 错误码；不是带 `code` 的错误时返回 `undefined`
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 判断字符串是否为支持的协议（区分大小写）
 */
export function isForwardProtocol(value: string): value is ForwardProtocol {
  return Object.prototype.hasOwnProperty.call(PROTOCOL_PORTS, value);
}

/**
 * 获取协议对应的目标端口
 *
 * @param protocol - 协议名称
 * @returns 远程目标上的端口号
 * @throws {ForwardError} 协议不受支持时抛出 `UNSUPPORTED_PROTOCOL`
 */
export function getInternalPort(protocol: string): number {
  if (!isForwardProtocol(protocol)) {
    throw new ForwardError(ErrorCode.UNSUPPORTED_PROTOCOL, `不支持的协议 '${protocol}'`);
  }
  return PROTOCOL_PORTS[protocol];
}

/**
 * HTTP 状态码常量
 */
export const HTTP_STATUS = {
  OK: 200,
  FOUND: 302,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
} as const;

/**
 * 将错误映射为 HTTP 状态码
 *
 * @param error - 任意错误
 * @returns 对应的 HTTP 状态码，非 {@link ForwardError} 一律为 500
 */
export function toHttpStatus(error: unknown): number {
  if (!(error instanceof ForwardError)) {
    return HTTP_STATUS.INTERNAL_SERVER_ERROR;
  }
  switch (error.code) {
    case ErrorCode.UNSUPPORTED_PROTOCOL:
    case ErrorCode.INVALID_HOST:
    case ErrorCode.INVALID_MAPPING:
    case ErrorCode.INVALID_CONFIG:
    case ErrorCode.INVALID_REQUEST:
      return HTTP_STATUS.BAD_REQUEST;
    case ErrorCode.PORT_IN_USE:
    case ErrorCode.PERMISSION_DENIED:
      return HTTP_STATUS.CONFLICT;
    case ErrorCode.PORT_EXHAUSTED:
    case ErrorCode.BIND_FAILED:
      return HTTP_STATUS.SERVICE_UNAVAILABLE;
    case ErrorCode.CONNECT_FAILED:
    case ErrorCode.CONNECT_TIMEOUT:
      return HTTP_STATUS.BAD_GATEWAY;
    default:
      return HTTP_STATUS.INTERNAL_SERVER_ERROR;
  }
}

/**
 * 默认配置
 */
export const DEFAULT_CONFIG = {
  /** 管理/入口 HTTP 服务监听地址 */
  HOST: '127.0.0.1',
  /** 管理/入口 HTTP 服务端口 */
  ADMIN_PORT: 5000,
  /** 转发监听器绑定地址 */
  LISTEN_HOST: '0.0.0.0',
  /** 第一个外部端口 */
  START_PORT: 10000,
  /** 最大端口号 */
  MAX_PORT: 65535,
  /** 映射文件名，位于数据目录下 */
  MAPPING_FILE_NAME: 'port_mappings.json',
  /** 映射文件键中主机与协议的分隔符 */
  KEY_DELIMITER: '|',
  /** 连接远程目标的超时时间，单位毫秒（默认 10 秒） */
  CONNECT_TIMEOUT: 10000,
  /** 停止监听器时等待连接关闭的超时时间，单位毫秒（默认 5 秒） */
  STOP_TIMEOUT: 5000,
  /** 统计日志输出间隔，单位毫秒（默认 60 秒） */
  STATS_INTERVAL: 60000,
  /** 管理端点路径前缀 */
  API_PREFIX: '/_zhuanjie',
} as const;

/**
 * 映射记录
 *
 * 从文件加载的记录可能带有已不再支持的协议，因此 `protocol` 为普通字符串。
 */
export interface MappingRecord {
  /** 远程主机地址 */
  remoteHost: string;
  /** 协议名称 */
  protocol: string;
  /** 分配的外部端口 */
  externalPort: number;
}

/** 监听器生命周期状态（`absent` 即不在注册表中） */
export type ProxyState = 'starting' | 'running' | 'stopping';

/**
 * 活跃代理的只读快照
 */
export interface ProxyStatus {
  /** 外部端口 */
  port: number;
  /** 转发目标主机 */
  remoteHost: string;
  /** 转发目标端口 */
  remotePort: number;
  /** 生命周期状态 */
  state: ProxyState;
  /** 当前正在转发的连接数 */
  connections: number;
  /** 监听器启动时间戳（Unix 毫秒） */
  startedAt: number;
}

/**
 * 服务器配置接口
 */
export interface ServerConfig {
  /** 管理/入口 HTTP 服务监听地址 */
  host: string;
  /** 管理/入口 HTTP 服务端口，0 表示随机端口 */
  adminPort: number;
  /** 转发监听器绑定地址 */
  listenHost: string;
  /** 第一个外部端口 */
  startPort: number;
  /** 映射文件路径 */
  mappingFile: string;
  /** 连接远程目标的超时时间（毫秒） */
  connectTimeout: number;
  /** 停止监听器时等待连接关闭的超时时间（毫秒） */
  stopTimeout: number;
  /** 停止监听器时是否同时关闭已转发的连接 */
  closeConnectionsOnStop: boolean;
  /** 日志级别 */
  logLevel: LogLevel;
}
