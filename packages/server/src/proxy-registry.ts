/**
 * @module proxy-registry
 * @description 代理注册表与监听器生命周期管理模块。
 * 以外部端口为键维护所有活跃的转发监听器，负责启动、替换和停止监听器。
 * 同一端口上的生命周期操作严格串行，不同端口之间互不影响。
 */

import { createServer as createTcpServer, Server as TcpServer, Socket } from 'net';
import {
  DEFAULT_CONFIG,
  ErrorCode,
  ForwardError,
  KeyedSerialQueue,
  getErrnoCode,
  logger,
  type ProxyState,
  type ProxyStatus,
} from '@zhuanjie/shared';
import { forwardConnection, type ForwardedConnection } from './handlers/tcp-forwarder.js';

/**
 * `ensure` 的结果
 *
 * - `started`：端口原本没有监听器，已新建
 * - `unchanged`：端口已在以相同目标运行，未做任何操作
 * - `replaced`：端口原本以不同目标运行，已停止旧监听器并以新目标重新启动
 */
export type EnsureResult = 'started' | 'unchanged' | 'replaced';

/**
 * 停止监听器的选项
 */
export interface StopOptions {
  /** 是否同时关闭该监听器已转发的连接，默认取注册表的 `closeConnectionsOnStop` */
  closeConnections?: boolean;
}

/**
 * 代理注册表配置
 */
export interface ProxyRegistryOptions {
  /** 监听器绑定地址 */
  listenHost?: string;
  /** 连接远程目标的超时时间（毫秒） */
  connectTimeout?: number;
  /** 强制关闭连接时等待监听器完全关闭的超时时间（毫秒） */
  stopTimeout?: number;
  /** 停止监听器时是否默认关闭已转发的连接 */
  closeConnectionsOnStop?: boolean;
}

/**
 * 活跃代理
 *
 * 只在注册表内部使用，外部通过 {@link ProxyStatus} 快照读取。
 */
interface ActiveProxy {
  port: number;
  remoteHost: string;
  remotePort: number;
  state: ProxyState;
  server: TcpServer;
  /** 该监听器接受并仍在转发的连接，键为连接 ID */
  connections: Map<string, ForwardedConnection>;
  startedAt: number;
}

/**
 * 把监听失败的系统错误转换为 {@link ForwardError}
 */
export function toBindError(port: number, error: Error): ForwardError {
  switch (getErrnoCode(error)) {
    case 'EADDRINUSE':
      return new ForwardError(ErrorCode.PORT_IN_USE, `端口 ${port} 已被占用`, error);
    case 'EACCES':
      return new ForwardError(ErrorCode.PERMISSION_DENIED, `没有权限绑定端口 ${port}`, error);
    default:
      return new ForwardError(ErrorCode.BIND_FAILED, `无法在端口 ${port} 上启动监听: ${error.message}`, error);
  }
}

/**
 * 在限定时间内等待 Promise 完成
 *
 * @returns 是否在超时之前完成
 */
function settleWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    void promise.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

/**
 * 代理注册表
 *
 * 判断“某端口当前是否在转发”的唯一依据。
 * 监听器每接受一个连接就立即交给 {@link forwardConnection}，接受新连接从不等待出站连接。
 */
export class ProxyRegistry {
  /** 活跃代理映射表，键为外部端口 */
  private proxies = new Map<number, ActiveProxy>();
  /** 按端口串行化生命周期操作的队列 */
  private lifecycle = new KeyedSerialQueue<number>();
  /** 监听器已停止但仍在转发的连接，键为连接 ID */
  private draining = new Map<string, { port: number; connection: ForwardedConnection }>();

  private listenHost: string;
  private connectTimeout: number;
  private stopTimeout: number;
  private closeConnectionsOnStop: boolean;

  /**
   * 创建代理注册表
   *
   * @param options - 注册表配置，未提供的字段使用 {@link DEFAULT_CONFIG} 中的默认值
   */
  constructor(options: ProxyRegistryOptions = {}) {
    this.listenHost = options.listenHost ?? DEFAULT_CONFIG.LISTEN_HOST;
    this.connectTimeout = options.connectTimeout ?? DEFAULT_CONFIG.CONNECT_TIMEOUT;
    this.stopTimeout = options.stopTimeout ?? DEFAULT_CONFIG.STOP_TIMEOUT;
    this.closeConnectionsOnStop = options.closeConnectionsOnStop ?? false;
  }

  /**
   * 确保端口上有一个转发到指定目标的监听器
   *
   * 目标相同时不做任何操作；目标不同时先停止旧监听器（不关闭其已转发的连接）再启动新监听器。
   * 绑定失败时注册表回滚为该端口不存在监听器。
   *
   * @param port - 外部端口
   * @param remoteHost - 远程主机地址
   * @param remotePort - 远程端口
   * @returns 本次操作的结果
   * @throws {ForwardError} 端口号无效时抛出 `INVALID_MAPPING`，绑定失败时抛出 `PORT_IN_USE`、`PERMISSION_DENIED` 或 `BIND_FAILED`
   */
  ensure(port: number, remoteHost: string, remotePort: number): Promise<EnsureResult> {
    if (!Number.isInteger(port) || port < 1 || port > DEFAULT_CONFIG.MAX_PORT) {
      return Promise.reject(new ForwardError(ErrorCode.INVALID_MAPPING, `无效的外部端口: ${port}`));
    }

    return this.lifecycle.run(port, async (): Promise<EnsureResult> => {
      this.sweep();
      const existing = this.proxies.get(port);
      if (existing && existing.remoteHost === remoteHost && existing.remotePort === remotePort) {
        return 'unchanged';
      }
      if (existing) {
        logger.log(`端口 ${port} 的转发目标变更: ${existing.remoteHost}:${existing.remotePort} -> ${remoteHost}:${remotePort}`);
        await this.stopProxy(existing, false);
      }
      await this.startProxy(port, remoteHost, remotePort);
      return existing ? 'replaced' : 'started';
    });
  }

  /**
   * 停止端口上的监听器
   *
   * 先关闭监听 socket，此后该端口不再接受新连接。
   *
   * @param port - 外部端口
   * @param options - 停止选项
   * @returns 监听器原本是否在运行；返回 `false` 表示端口上没有监听器
   */
  stop(port: number, options: StopOptions = {}): Promise<boolean> {
    return this.lifecycle.run(port, async () => {
      const proxy = this.proxies.get(port);
      if (!proxy) {
        logger.debug(`端口 ${port} 上没有运行中的转发监听器`);
        return false;
      }
      await this.stopProxy(proxy, options.closeConnections ?? this.closeConnectionsOnStop);
      return true;
    });
  }

  /**
   * 并行停止所有监听器
   *
   * 关闭连接时，已停止或被替换的监听器遗留的连接也一起关闭。
   *
   * @returns 被停止的端口列表
   */
  async stopAll(options: StopOptions = {}): Promise<number[]> {
    const closeConnections = options.closeConnections ?? this.closeConnectionsOnStop;
    const ports = this.getActivePorts();
    const results = await Promise.all(ports.map((port) => this.stop(port, { closeConnections })));
    if (closeConnections) {
      this.closeDraining();
    }
    return ports.filter((_, index) => results[index]);
  }

  /**
   * 获取注册表快照
   *
   * @returns 按端口排序的只读状态副本
   */
  getSnapshot(): ProxyStatus[] {
    this.sweep();
    return Array.from(this.proxies.values())
      .map((proxy) => ({
        port: proxy.port,
        remoteHost: proxy.remoteHost,
        remotePort: proxy.remotePort,
        state: proxy.state,
        connections: proxy.connections.size,
        startedAt: proxy.startedAt,
      }))
      .sort((a, b) => a.port - b.port);
  }

  /**
   * 获取所有活跃监听器的端口列表
   */
  getActivePorts(): number[] {
    this.sweep();
    return Array.from(this.proxies.keys()).sort((a, b) => a - b);
  }

  /**
   * 端口上是否有正在运行的监听器
   */
  isRunning(port: number): boolean {
    this.sweep();
    return this.proxies.get(port)?.state === 'running';
  }

  /**
   * 当前转发的连接总数
   *
   * 包括已停止的监听器遗留、仍在转发的连接。
   */
  getConnectionCount(): number {
    this.sweep();
    let total = this.draining.size;
    for (const proxy of this.proxies.values()) {
      total += proxy.connections.size;
    }
    return total;
  }

  /**
   * 绑定并启动监听器
   */
  private startProxy(port: number, remoteHost: string, remotePort: number): Promise<void> {
    const server = createTcpServer();
    const proxy: ActiveProxy = {
      port,
      remoteHost,
      remotePort,
      state: 'starting',
      server,
      connections: new Map(),
      startedAt: Date.now(),
    };
    this.proxies.set(port, proxy);

    server.on('connection', (socket: Socket) => {
      this.handleConnection(proxy, socket);
    });

    return new Promise<void>((resolve, reject) => {
      const onBindError = (error: Error) => {
        if (this.proxies.get(port) === proxy) {
          this.proxies.delete(port);
        }
        const bindError = toBindError(port, error);
        logger.error(bindError.message);
        reject(bindError);
      };

      server.once('error', onBindError);
      server.listen(port, this.listenHost, () => {
        server.off('error', onBindError);
        server.on('error', (error) => {
          logger.error(`端口 ${port} 的转发监听器发生错误:`, error);
        });
        server.on('close', () => {
          this.handleListenerClosed(proxy);
        });
        proxy.state = 'running';
        proxy.startedAt = Date.now();
        logger.log(`转发监听器已在端口 ${port} 上启动 -> ${remoteHost}:${remotePort}`);
        resolve();
      });
    });
  }

  /**
   * 关闭监听 socket 并从注册表移除
   *
   * `closeConnections` 为真时同时关闭已转发的连接，并在 `stopTimeout` 内等待监听器完全关闭。
   */
  private async stopProxy(proxy: ActiveProxy, closeConnections: boolean): Promise<void> {
    proxy.state = 'stopping';
    const closed = new Promise<void>((resolve) => {
      proxy.server.once('close', () => resolve());
    });

    proxy.server.close();
    if (this.proxies.get(proxy.port) === proxy) {
      this.proxies.delete(proxy.port);
    }

    if (closeConnections) {
      for (const connection of proxy.connections.values()) {
        connection.close();
      }
      this.closeDraining(proxy.port);
      const drained = await settleWithin(closed, this.stopTimeout);
      if (!drained) {
        logger.warn(`端口 ${proxy.port} 的监听器在 ${this.stopTimeout}ms 内未完全关闭`);
      }
    } else if (proxy.connections.size > 0) {
      for (const [id, connection] of proxy.connections) {
        this.draining.set(id, { port: proxy.port, connection });
      }
      logger.log(`端口 ${proxy.port} 停止接受新连接，${proxy.connections.size} 个已转发的连接继续保持`);
    }

    logger.log(`转发监听器已在端口 ${proxy.port} 上停止`);
  }

  /**
   * 关闭遗留的连接，指定端口时只关闭该端口的
   */
  private closeDraining(port?: number): void {
    for (const { port: drainingPort, connection } of Array.from(this.draining.values())) {
      if (port === undefined || drainingPort === port) {
        connection.close();
      }
    }
  }

  /**
   * 把接受的连接交给转发器
   */
  private handleConnection(proxy: ActiveProxy, socket: Socket): void {
    if (proxy.state !== 'running') {
      socket.destroy();
      return;
    }

    const connection = forwardConnection(
      socket,
      { host: proxy.remoteHost, port: proxy.remotePort },
      {
        connectTimeout: this.connectTimeout,
        onClose: (closedConnection) => {
          proxy.connections.delete(closedConnection.id);
          this.draining.delete(closedConnection.id);
        },
      },
    );
    proxy.connections.set(connection.id, connection);
    logger.debug(`端口 ${proxy.port} 接受连接 ${connection.remoteAddress} (${connection.id})`);
  }

  /**
   * 监听器关闭事件处理
   *
   * 不是由 `stop` 引起的关闭视为意外终止，立即从注册表移除，避免状态查询报告一个不存在的监听器。
   */
  private handleListenerClosed(proxy: ActiveProxy): void {
    if (proxy.state === 'stopping' || this.proxies.get(proxy.port) !== proxy) {
      return;
    }
    this.proxies.delete(proxy.port);
    logger.warn(`端口 ${proxy.port} 的转发监听器意外关闭，已从注册表移除`);
  }

  /**
   * 移除监听 socket 已关闭但仍标记为运行中的监听器
   *
   * 监听器的 `close` 事件要等所有已接受的连接结束才会触发，因此另外检查 `listening` 状态。
   */
  private sweep(): void {
    for (const proxy of this.proxies.values()) {
      if (proxy.state === 'running' && !proxy.server.listening) {
        this.handleListenerClosed(proxy);
      }
    }
  }
}
