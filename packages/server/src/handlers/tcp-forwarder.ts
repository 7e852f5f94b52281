/**
 * @module tcp-forwarder
 * @description TCP 连接转发模块。
 * 为每个被接受的客户端连接建立一条到远程目标的出站连接，并在两者之间双向转发原始字节。
 * 任意一侧结束或出错时两条连接一起关闭，不保留 TCP 半关闭状态。
 */

import { connect, Socket } from 'net';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_CONFIG, ErrorCode, ForwardError, logger } from '@zhuanjie/shared';

/**
 * 转发目标
 */
export interface ForwardTarget {
  /** 远程主机地址 */
  host: string;
  /** 远程端口 */
  port: number;
}

/**
 * 转发选项
 */
export interface ForwardOptions {
  /** 连接远程目标的超时时间（毫秒） */
  connectTimeout?: number;
  /**
   * 转发结束回调，每条连接只触发一次
   *
   * 出站连接失败或转发过程中出现 I/O 错误时 `error` 为对应的错误。
   */
  onClose?: (connection: ForwardedConnection, error?: Error) => void;
}

/**
 * 一条正在转发的连接
 */
export interface ForwardedConnection {
  /** 连接唯一标识 ID */
  readonly id: string;
  /** 客户端地址，形如 `1.2.3.4:5678` */
  readonly remoteAddress: string;
  /** 连接建立时间戳（Unix 毫秒） */
  readonly createdAt: number;
  /** 立即关闭客户端和远程两侧的连接 */
  close(): void;
}

/**
 * 转发一个客户端连接到远程目标
 *
 * 出站连接建立之前，客户端发来的数据保留在客户端 socket 的缓冲区中；
 * 连接建立后通过 `pipe` 进行双向转发，由传输层自身完成流控。
 * 出站连接失败（包括超时）时立即关闭客户端连接，不会重试。
 *
 * @param client - 已接受的客户端 socket
 * @param target - 远程目标
 * @param options - 转发选项
 * @returns 转发连接句柄
 */
export function forwardConnection(client: Socket, target: ForwardTarget, options: ForwardOptions = {}): ForwardedConnection {
  const connectTimeout = options.connectTimeout ?? DEFAULT_CONFIG.CONNECT_TIMEOUT;
  const remoteAddress = `${client.remoteAddress ?? ''}:${client.remotePort ?? ''}`;
  const targetLabel = `${target.host}:${target.port}`;

  let closed = false;
  let established = false;

  const remote = connect({ host: target.host, port: target.port });

  const connection: ForwardedConnection = {
    id: uuidv4(),
    remoteAddress,
    createdAt: Date.now(),
    close: () => teardown(undefined, true),
  };

  const connectTimer = setTimeout(() => {
    const error = new ForwardError(ErrorCode.CONNECT_TIMEOUT, `连接 ${targetLabel} 超时（${connectTimeout}ms）`);
    logger.error(`无法连接到 ${targetLabel}:`, error.message);
    teardown(error, true);
  }, connectTimeout);

  /**
   * 关闭两侧连接
   *
   * 正常结束时先冲刷待写数据再关闭；出错或强制关闭时立即销毁。
   */
  function teardown(error: Error | undefined, force: boolean): void {
    if (closed) {
      return;
    }
    closed = true;
    clearTimeout(connectTimer);

    for (const socket of [client, remote]) {
      if (socket.destroyed) {
        continue;
      }
      if (force || error || !established) {
        socket.destroy();
      } else {
        socket.end(() => socket.destroy());
      }
    }

    if (error) {
      logger.debug(`转发连接 ${connection.id} 因错误结束: ${error.message}`);
    } else {
      logger.debug(`转发连接 ${connection.id} 已关闭`);
    }
    options.onClose?.(connection, error);
  }

  remote.once('connect', () => {
    clearTimeout(connectTimer);
    if (closed) {
      remote.destroy();
      return;
    }
    established = true;
    logger.debug(`转发连接 ${connection.id}: ${remoteAddress} -> ${targetLabel}`);
    client.pipe(remote);
    remote.pipe(client);
  });

  remote.on('error', (cause: Error) => {
    if (!established) {
      const error = new ForwardError(ErrorCode.CONNECT_FAILED, `无法连接到 ${targetLabel}: ${cause.message}`, cause);
      logger.error(error.message);
      teardown(error, true);
      return;
    }
    teardown(cause, true);
  });

  client.on('error', (cause: Error) => {
    teardown(cause, true);
  });

  client.on('end', () => teardown(undefined, false));
  remote.on('end', () => teardown(undefined, false));
  client.on('close', () => teardown(undefined, false));
  remote.on('close', () => teardown(undefined, false));

  return connection;
}
