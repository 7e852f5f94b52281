/**
 * @module forward-service
 * @description 端口转发服务模块，核心对外的边界接口。
 * 组合映射存储与代理注册表，提供请求转发、启动恢复、关闭、状态查询和映射管理操作。
 */

import {
  ErrorCode,
  ForwardError,
  getInternalPort,
  isForwardProtocol,
  logger,
  type ForwardProtocol,
  type MappingRecord,
  type ProxyStatus,
} from '@zhuanjie/shared';
import { MappingStore, normalizeRemoteHost } from './mapping-store.js';
import { ProxyRegistry, type EnsureResult, type StopOptions } from './proxy-registry.js';
import { restoreProxies, type RestoreReport } from './bootstrap.js';

/**
 * 请求转发的结果
 */
export interface ForwardResult {
  /** 远程主机地址（已去除首尾空白） */
  remoteHost: string;
  /** 协议 */
  protocol: ForwardProtocol;
  /** 分配的外部端口 */
  externalPort: number;
  /** 远程目标端口 */
  remotePort: number;
  /** 本次是否新建了映射 */
  created: boolean;
  /** 监听器的处理结果 */
  proxy: EnsureResult;
}

/**
 * 端口转发服务
 */
export class PortForwardService {
  private store: MappingStore;
  private registry: ProxyRegistry;

  /**
   * @param store - 映射存储
   * @param registry - 代理注册表
   */
  constructor(store: MappingStore, registry: ProxyRegistry) {
    this.store = store;
    this.registry = registry;
  }

  /**
   * 请求把 (远程主机, 协议) 转发到一个固定的外部端口
   *
   * 协议或主机无效时直接拒绝，不会分配端口，也不会启动监听器。
   *
   * @param remoteHost - 远程主机地址
   * @param protocol - 协议名称，必须是 ssh、telnet、http、https 之一
   * @returns 转发结果
   * @throws {ForwardError} `UNSUPPORTED_PROTOCOL`、`INVALID_HOST`、`PERSIST_FAILED` 或监听器绑定错误
   */
  async requestForward(remoteHost: string, protocol: string): Promise<ForwardResult> {
    if (!isForwardProtocol(protocol)) {
      throw new ForwardError(ErrorCode.UNSUPPORTED_PROTOCOL, `不支持的协议 '${protocol}'`);
    }
    const host = normalizeRemoteHost(remoteHost);
    const remotePort = getInternalPort(protocol);

    const { externalPort, created } = await this.store.resolve(host, protocol);
    const proxy = await this.registry.ensure(externalPort, host, remotePort);

    logger.log(`转发 ${protocol}://${host} -> 端口 ${externalPort} (${proxy})`);
    return { remoteHost: host, protocol, externalPort, remotePort, created, proxy };
  }

  /**
   * 启动恢复入口，进程启动时调用一次；重复调用不会重复启动监听器
   */
  restore(): Promise<RestoreReport> {
    return restoreProxies(this.store, this.registry);
  }

  /**
   * 停止所有监听器
   *
   * 默认只停止接受新连接，已转发的连接是否一并关闭由注册表配置或 `options` 决定。
   *
   * @returns 被停止的端口列表
   */
  shutdown(options: StopOptions = {}): Promise<number[]> {
    return this.registry.stopAll(options);
  }

  /**
   * 代理注册表的只读快照
   */
  getProxyStatus(): ProxyStatus[] {
    return this.registry.getSnapshot();
  }

  /**
   * 当前转发的连接总数
   */
  getConnectionCount(): number {
    return this.registry.getConnectionCount();
  }

  /**
   * 读取全部映射
   */
  listMappings(): Promise<MappingRecord[]> {
    return this.store.load();
  }

  /**
   * 删除映射并停止对应的监听器（管理操作）
   *
   * @returns 映射是否存在并已删除
   */
  async removeMapping(remoteHost: string, protocol: string): Promise<boolean> {
    const removed = await this.store.remove(remoteHost.trim(), protocol);
    if (!removed) {
      return false;
    }
    await this.registry.stop(removed.externalPort);
    return true;
  }
}
