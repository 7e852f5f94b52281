/**
 * @module index
 * @description 转接服务端公共 API 入口模块。
 * 提供便捷的 start、status、stop 函数，以及核心类和类型的导出。
 */

import type { ServerConfig } from '@zhuanjie/shared';
import { PortForwardServer, type ServerStatus } from './server.js';

export { PortForwardServer } from './server.js';
export type { ServerStatus } from './server.js';
export { PortForwardService } from './forward-service.js';
export type { ForwardResult } from './forward-service.js';
export { MappingStore, normalizeRemoteHost, parseMappings, serializeMappings } from './mapping-store.js';
export type { ResolveResult } from './mapping-store.js';
export { ProxyRegistry } from './proxy-registry.js';
export type { EnsureResult, ProxyRegistryOptions, StopOptions } from './proxy-registry.js';
export { forwardConnection } from './handlers/tcp-forwarder.js';
export type { ForwardedConnection, ForwardOptions, ForwardTarget } from './handlers/tcp-forwarder.js';
export { restoreProxies } from './bootstrap.js';
export type { RestoreReport } from './bootstrap.js';
export { nextPort } from './port-allocator.js';
export { loadConfigFile, resolveServerConfig, validateServerConfig } from './config.js';
export type { ServerConfig } from '@zhuanjie/shared';

/**
 * 启动转发服务器
 *
 * @param options - 可选的服务器配置项，未提供的字段将使用默认值
 * @returns 已启动的 {@link PortForwardServer} 实例
 */
export async function start(options: Partial<ServerConfig> = {}): Promise<PortForwardServer> {
  const server = new PortForwardServer(options);
  await server.start();
  return server;
}

/**
 * 查询服务器状态
 */
export function status(server: PortForwardServer): Promise<ServerStatus> {
  return server.getStatus();
}

/**
 * 停止服务器，关闭管理端口和所有转发监听器
 */
export async function stop(server: PortForwardServer): Promise<void> {
  await server.stop();
}
