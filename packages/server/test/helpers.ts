/**
 * 服务器测试共享工具函数
 */

import { createServer as createTcpServer, connect, Socket, type AddressInfo } from 'net';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

/**
 * 获取一个随机可用端口
 */
export async function getRandomPort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const srv = createTcpServer();
    srv.listen(0, '127.0.0.1', () => {
      const address = srv.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      srv.close(() => resolve(port));
    });
    srv.on('error', reject);
  });
}

/**
 * 等待指定毫秒
 */
export const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * 轮询直到条件成立
 */
export async function waitFor(condition: () => boolean, timeout = 3000): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error('等待条件超时');
    }
    await sleep(10);
  }
}

/**
 * 进程内回显服务器，作为转发目标
 */
export interface EchoServer {
  port: number;
  /** 服务器侧当前打开的连接 */
  sockets: Set<Socket>;
  close(): Promise<void>;
}

/**
 * 启动回显服务器
 *
 * @param prefix - 回显时加在数据前面的前缀，用于区分不同目标
 */
export async function startEchoServer(prefix = ''): Promise<EchoServer> {
  const sockets = new Set<Socket>();
  const server = createTcpServer((socket) => {
    sockets.add(socket);
    socket.on('data', (data) => socket.write(prefix + data.toString()));
    socket.on('end', () => socket.end());
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => socket.destroy());
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address: AddressInfo | string | null = server.address();
  const port = address && typeof address === 'object' ? address.port : 0;

  return {
    port,
    sockets,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

/**
 * 测试用 TCP 客户端，收集收到的全部数据
 */
export interface TestClient {
  socket: Socket;
  received(): string;
  closed(): boolean;
}

/**
 * 连接到指定端口
 */
export function connectClient(port: number, host = '127.0.0.1'): Promise<TestClient> {
  return new Promise((resolve, reject) => {
    let data = '';
    let isClosed = false;
    const socket = connect({ host, port }, () => {
      socket.off('error', reject);
      socket.on('error', () => {});
      resolve({ socket, received: () => data, closed: () => isClosed });
    });
    socket.setEncoding('utf-8');
    socket.on('data', (chunk: string) => { data += chunk; });
    socket.on('close', () => { isClosed = true; });
    socket.once('error', reject);
  });
}

/**
 * 创建临时目录，返回目录路径和清理函数
 */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'zhuanjie-test-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
