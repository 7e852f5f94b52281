/**
 * @module mapping-store
 * @description 映射存储模块，负责 (远程主机, 协议) → 外部端口 映射的持久化。
 *
 * 映射文件是一个扁平 JSON 对象，键为 `主机|协议`，值为外部端口，例如：
 * `{"10.0.0.5|ssh":10000,"example.org|https":10001}`。
 * 文件缺失、为空或内容损坏时视为没有任何映射。
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  DEFAULT_CONFIG,
  ErrorCode,
  ForwardError,
  KeyedSerialQueue,
  getErrnoCode,
  isForwardProtocol,
  logger,
  type MappingRecord,
} from '@zhuanjie/shared';
import { nextPort } from './port-allocator.js';

/**
 * 映射解析结果
 */
export interface ResolveResult {
  /** 映射对应的外部端口 */
  externalPort: number;
  /** 本次调用是否新建了映射 */
  created: boolean;
}

/**
 * 校验远程主机地址
 *
 * 主机地址去除首尾空白后不能为空，且不能包含空白字符或键分隔符 `|`。
 *
 * @param remoteHost - 原始主机地址
 * @returns 去除首尾空白后的主机地址
 * @throws {ForwardError} 主机地址无效时抛出 `INVALID_HOST`
 */
export function normalizeRemoteHost(remoteHost: string): string {
  const host = remoteHost.trim();
  if (!host || /\s/.test(host) || host.includes(DEFAULT_CONFIG.KEY_DELIMITER)) {
    throw new ForwardError(ErrorCode.INVALID_HOST, `无效的远程主机地址 '${remoteHost}'`);
  }
  return host;
}

function isValidPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= DEFAULT_CONFIG.MAX_PORT;
}

function mappingKey(remoteHost: string, protocol: string): string {
  return `${remoteHost}${DEFAULT_CONFIG.KEY_DELIMITER}${protocol}`;
}

/**
 * 解析映射文件内容
 *
 * 非法 JSON 或顶层不是对象时返回空数组；单条格式错误或端口重复的记录会被跳过并输出警告。
 *
 * @param content - 映射文件的文本内容
 * @returns 解析出的映射记录，顺序与文件中一致
 */
export function parseMappings(content: string): MappingRecord[] {
  if (content.trim() === '') {
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    logger.warn('映射文件不是合法的 JSON，按空映射处理');
    return [];
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    logger.warn('映射文件顶层不是对象，按空映射处理');
    return [];
  }

  const records: MappingRecord[] = [];
  const usedPorts = new Set<number>();

  for (const [key, value] of Object.entries(data)) {
    const index = key.lastIndexOf(DEFAULT_CONFIG.KEY_DELIMITER);
    const remoteHost = index > 0 ? key.slice(0, index) : '';
    const protocol = index > 0 ? key.slice(index + 1) : '';

    if (!remoteHost || !protocol || !isValidPort(value)) {
      logger.warn(`跳过格式错误的映射记录: ${JSON.stringify(key)} -> ${JSON.stringify(value)}`);
      continue;
    }
    if (usedPorts.has(value)) {
      logger.warn(`跳过重复使用端口 ${value} 的映射记录: ${key}`);
      continue;
    }

    usedPorts.add(value);
    records.push({ remoteHost, protocol, externalPort: value });
  }

  return records;
}

/**
 * 序列化映射集为文件内容
 *
 * @param records - 映射记录
 * @returns JSON 文本
 * @throws {ForwardError} 记录无法无损写入（主机为空或含分隔符、端口非法、键或端口重复）时抛出 `INVALID_MAPPING`
 */
export function serializeMappings(records: readonly MappingRecord[]): string {
  const data: Record<string, number> = {};
  const usedPorts = new Set<number>();

  for (const record of records) {
    const { remoteHost, protocol, externalPort } = record;
    if (!remoteHost || remoteHost.includes(DEFAULT_CONFIG.KEY_DELIMITER) || !protocol || !isValidPort(externalPort)) {
      throw new ForwardError(ErrorCode.INVALID_MAPPING, `无效的映射记录: ${JSON.stringify(record)}`);
    }
    const key = mappingKey(remoteHost, protocol);
    if (Object.prototype.hasOwnProperty.call(data, key) || usedPorts.has(externalPort)) {
      throw new ForwardError(ErrorCode.INVALID_MAPPING, `重复的映射记录: ${key} -> ${externalPort}`);
    }
    data[key] = externalPort;
    usedPorts.add(externalPort);
  }

  return JSON.stringify(data, null, 2);
}

/**
 * 映射存储
 *
 * 所有“读取-修改-写入”序列都在同一个串行队列中执行，
 * 因此并发请求同一个新映射时只会分配一个端口。
 */
export class MappingStore {
  /** 映射文件路径 */
  private filePath: string;
  /** 映射集为空时使用的起始端口 */
  private startPort: number;
  /** 串行化读写的队列 */
  private queue = new KeyedSerialQueue<string>();

  private static readonly QUEUE_KEY = 'mappings';

  /**
   * 创建映射存储实例
   *
   * @param filePath - 映射文件路径
   * @param startPort - 第一个外部端口，默认使用 {@link DEFAULT_CONFIG.START_PORT}
   */
  constructor(filePath: string, startPort: number = DEFAULT_CONFIG.START_PORT) {
    this.filePath = filePath;
    this.startPort = startPort;
  }

  /**
   * 获取映射文件路径
   */
  getFilePath(): string {
    return this.filePath;
  }

  /**
   * 加载全部映射
   *
   * 文件不存在、无法读取或内容损坏时返回空数组，不会抛出异常。
   */
  async load(): Promise<MappingRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (getErrnoCode(error) !== 'ENOENT') {
        logger.warn(`无法读取映射文件 ${this.filePath}，按空映射处理:`, error);
      }
      return [];
    }
    return parseMappings(content);
  }

  /**
   * 写入全部映射，替换文件原有内容
   *
   * 先写入同目录下的临时文件再重命名覆盖目标文件。
   *
   * @param records - 完整的映射集
   * @throws {ForwardError} 记录无效时抛出 `INVALID_MAPPING`，写入失败时抛出 `PERSIST_FAILED`
   */
  async persist(records: readonly MappingRecord[]): Promise<void> {
    const content = serializeMappings(records);
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((rmError: unknown) => {
        logger.debug(`清理临时映射文件失败: ${tempPath}`, rmError);
      });
      throw new ForwardError(ErrorCode.PERSIST_FAILED, `写入映射文件 ${this.filePath} 失败`, error);
    }
  }

  /**
   * 解析映射，必要时分配新端口
   *
   * 已存在的映射直接返回其端口；否则按高水位线分配新端口并持久化。
   * 持久化失败时映射不会生效。
   *
   * @param remoteHost - 远程主机地址
   * @param protocol - 协议名称
   * @returns 外部端口以及是否新建
   * @throws {ForwardError} 协议不受支持时抛出 `UNSUPPORTED_PROTOCOL`（不会分配端口），主机无效时抛出 `INVALID_HOST`
   */
  async resolve(remoteHost: string, protocol: string): Promise<ResolveResult> {
    if (!isForwardProtocol(protocol)) {
      throw new ForwardError(ErrorCode.UNSUPPORTED_PROTOCOL, `不支持的协议 '${protocol}'`);
    }
    const host = normalizeRemoteHost(remoteHost);

    return this.queue.run(MappingStore.QUEUE_KEY, async () => {
      const records = await this.load();
      const existing = records.find((record) => record.remoteHost === host && record.protocol === protocol);
      if (existing) {
        return { externalPort: existing.externalPort, created: false };
      }

      const externalPort = nextPort(records, this.startPort);
      await this.persist([...records, { remoteHost: host, protocol, externalPort }]);
      logger.log(`新建映射 ${mappingKey(host, protocol)} -> 端口 ${externalPort}`);
      return { externalPort, created: true };
    });
  }

  /**
   * 查找映射
   *
   * @returns 对应的映射记录；若不存在则返回 `undefined`
   */
  async find(remoteHost: string, protocol: string): Promise<MappingRecord | undefined> {
    const records = await this.load();
    return records.find((record) => record.remoteHost === remoteHost && record.protocol === protocol);
  }

  /**
   * 删除映射（管理操作）
   *
   * @returns 被删除的映射记录；若映射不存在则返回 `undefined`
   * @throws {ForwardError} 写入失败时抛出 `PERSIST_FAILED`
   */
  async remove(remoteHost: string, protocol: string): Promise<MappingRecord | undefined> {
    return this.queue.run(MappingStore.QUEUE_KEY, async () => {
      const records = await this.load();
      const index = records.findIndex((record) => record.remoteHost === remoteHost && record.protocol === protocol);
      if (index === -1) {
        return undefined;
      }
      const [removed] = records.splice(index, 1);
      await this.persist(records);
      logger.log(`已删除映射 ${mappingKey(remoteHost, protocol)} (端口 ${removed.externalPort})`);
      return removed;
    });
  }
}
