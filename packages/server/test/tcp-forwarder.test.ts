/**
 * TCP 连接转发测试
 * 使用进程内回显服务器作为远程目标
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createServer, Server, Socket } from 'net';
import { ErrorCode, isForwardError } from '@zhuanjie/shared';
import { forwardConnection, type ForwardedConnection, type ForwardOptions } from '../src/handlers/tcp-forwarder.js';
import { connectClient, getRandomPort, startEchoServer, waitFor, type EchoServer } from './helpers.js';

interface ClosedEvent {
  connection: ForwardedConnection;
  error?: Error;
}

describe('forwardConnection', () => {
  let echo: EchoServer;
  let front: Server | undefined;
  let connections: ForwardedConnection[];
  let closedEvents: ClosedEvent[];

  /**
   * 启动一个把每个连接交给 forwardConnection 的入口服务器
   */
  async function startFront(targetPort: number, options: ForwardOptions = {}): Promise<number> {
    const server = createServer((socket: Socket) => {
      connections.push(
        forwardConnection(socket, { host: '127.0.0.1', port: targetPort }, {
          ...options,
          onClose: (connection, error) => closedEvents.push({ connection, error }),
        }),
      );
    });
    front = server;
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    return address && typeof address === 'object' ? address.port : 0;
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    echo = await startEchoServer('echo:');
    connections = [];
    closedEvents = [];
  });

  afterEach(async () => {
    for (const connection of connections) connection.close();
    if (front) {
      const server = front;
      front = undefined;
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    await echo.close();
    vi.restoreAllMocks();
  });

  it('应该在客户端和远程目标之间双向转发数据', async () => {
    const port = await startFront(echo.port);
    const client = await connectClient(port);

    client.socket.write('hello');
    await waitFor(() => client.received() === 'echo:hello');

    client.socket.write('world');
    await waitFor(() => client.received() === 'echo:helloecho:world');
    expect(connections).toHaveLength(1);
    expect(connections[0].id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('远程目标建立之前客户端发送的数据不应该丢失', async () => {
    const port = await startFront(echo.port);
    const client = await connectClient(port);

    client.socket.write('early');

    await waitFor(() => client.received() === 'echo:early');
  });

  it('客户端关闭时远程连接应该一起关闭', async () => {
    const port = await startFront(echo.port);
    const client = await connectClient(port);
    client.socket.write('x');
    await waitFor(() => echo.sockets.size === 1);

    client.socket.end();

    await waitFor(() => echo.sockets.size === 0);
    await waitFor(() => closedEvents.length === 1);
    expect(closedEvents[0].error).toBeUndefined();
  });

  it('远程目标关闭时客户端连接应该一起关闭', async () => {
    const port = await startFront(echo.port);
    const client = await connectClient(port);
    client.socket.write('x');
    await waitFor(() => echo.sockets.size === 1);

    for (const socket of echo.sockets) socket.end();

    await waitFor(() => client.closed());
    expect(closedEvents).toHaveLength(1);
  });

  it('远程目标连接失败时应该关闭客户端连接', async () => {
    const deadPort = await getRandomPort();
    const port = await startFront(deadPort);
    const client = await connectClient(port);

    await waitFor(() => client.closed());
    await waitFor(() => closedEvents.length === 1);
    expect(isForwardError(closedEvents[0].error, ErrorCode.CONNECT_FAILED)).toBe(true);
    expect(client.received()).toBe('');
  });

  it('出站连接超过 connectTimeout 时应该关闭客户端并报告 CONNECT_TIMEOUT', () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    try {
      const client = new Socket();
      forwardConnection(client, { host: '127.0.0.1', port: echo.port }, {
        connectTimeout: 500,
        onClose: (connection, error) => closedEvents.push({ connection, error }),
      });

      vi.advanceTimersByTime(499);
      expect(closedEvents).toHaveLength(0);

      vi.advanceTimersByTime(1);
      expect(closedEvents).toHaveLength(1);
      expect(isForwardError(closedEvents[0].error, ErrorCode.CONNECT_TIMEOUT)).toBe(true);
      expect(closedEvents[0].error?.message).toBe(`连接 127.0.0.1:${echo.port} 超时（500ms）`);
      expect(client.destroyed).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it('close() 应该立即关闭两侧连接且 onClose 只触发一次', async () => {
    const port = await startFront(echo.port);
    const client = await connectClient(port);
    client.socket.write('x');
    await waitFor(() => echo.sockets.size === 1);

    connections[0].close();
    connections[0].close();

    await waitFor(() => client.closed() && echo.sockets.size === 0);
    expect(closedEvents).toHaveLength(1);
  });
});
