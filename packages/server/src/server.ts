/**
 * @module server
 *
 * 转接服务端核心模块。
 *
 * 在管理端口上提供 HTTP 服务：
 * - 入口 `GET /?ip=&protocol=`：按需建立映射并重定向到外部端口
 * - 管理端点 `/_zhuanjie/*`：状态查询、映射管理和停止服务器
 *
 * 转发监听器由 {@link ProxyRegistry} 独立管理，与管理端口无关。
 */

import { createServer as createHttpServer, IncomingMessage, ServerResponse, Server as HttpServer } from 'http';
import {
  DEFAULT_CONFIG,
  ErrorCode,
  ForwardError,
  HTTP_STATUS,
  SUPPORTED_PROTOCOLS,
  logger,
  setLogLevel,
  toHttpStatus,
  type ServerConfig,
} from '@zhuanjie/shared';
import { resolveServerConfig, validateServerConfig } from './config.js';
import { MappingStore } from './mapping-store.js';
import { ProxyRegistry, toBindError } from './proxy-registry.js';
import { PortForwardService } from './forward-service.js';

/**
 * 服务器状态信息接口
 */
export interface ServerStatus {
  running: boolean;
  host: string;
  adminPort: number;
  uptime: number;
  activeProxies: number;
  activeConnections: number;
  mappings: number;
}

/** 转发请求参数 */
interface ForwardParams {
  ip?: string;
  protocol?: string;
}

/** 请求体大小上限（字节） */
const MAX_BODY_SIZE = 64 * 1024;

const API = DEFAULT_CONFIG.API_PREFIX;

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    const onData = (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_SIZE) {
        req.off('data', onData);
        req.resume();
        reject(new ForwardError(ErrorCode.INVALID_REQUEST, '请求体过大'));
        return;
      }
      chunks.push(chunk);
    };
    req.on('data', onData);
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

/**
 * 从请求体中取出 `ip` 和 `protocol`
 *
 * 支持 JSON 和 `application/x-www-form-urlencoded` 两种格式。
 */
function parseForwardParams(body: string, contentType: string | undefined): ForwardParams {
  if (contentType?.includes('application/json')) {
    let data: unknown;
    try {
      data = body.trim() ? JSON.parse(body) : {};
    } catch (error) {
      throw new ForwardError(ErrorCode.INVALID_REQUEST, '请求体不是合法的 JSON', error);
    }
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new ForwardError(ErrorCode.INVALID_REQUEST, '请求体必须是 JSON 对象');
    }
    const ip: unknown = 'ip' in data ? data.ip : undefined;
    const protocol: unknown = 'protocol' in data ? data.protocol : undefined;
    return {
      ip: typeof ip === 'string' ? ip : undefined,
      protocol: typeof protocol === 'string' ? protocol : undefined,
    };
  }

  const form = new URLSearchParams(body);
  return { ip: form.get('ip') ?? undefined, protocol: form.get('protocol') ?? undefined };
}

function requireForwardParams(params: ForwardParams): { ip: string; protocol: string } {
  if (!params.ip || !params.protocol) {
    throw new ForwardError(ErrorCode.INVALID_REQUEST, '请同时指定协议和 IP');
  }
  return { ip: params.ip, protocol: params.protocol };
}

/**
 * 取请求 `Host` 头中的主机名部分，IPv6 地址保留方括号
 */
function getRequestHostname(req: IncomingMessage, fallback: string): string {
  const host = req.headers.host;
  if (!host) {
    return fallback;
  }
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host : host.slice(0, end + 1);
  }
  return host.split(':')[0];
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * 端口转发服务器
 */
export class PortForwardServer {
  private config: ServerConfig;
  private store: MappingStore;
  private registry: ProxyRegistry;
  private service: PortForwardService;
  private httpServer?: HttpServer;
  private statsInterval?: ReturnType<typeof setInterval>;
  private startedAt?: number;

  /**
   * @param options - 服务器配置，未提供的字段使用默认值
   * @throws {ForwardError} 配置无效时抛出 `INVALID_CONFIG`
   */
  constructor(options: Partial<ServerConfig> = {}) {
    this.config = resolveServerConfig(options);
    validateServerConfig(this.config);

    this.store = new MappingStore(this.config.mappingFile, this.config.startPort);
    this.registry = new ProxyRegistry({
      listenHost: this.config.listenHost,
      connectTimeout: this.config.connectTimeout,
      stopTimeout: this.config.stopTimeout,
      closeConnectionsOnStop: this.config.closeConnectionsOnStop,
    });
    this.service = new PortForwardService(this.store, this.registry);
  }

  /**
   * 启动服务器
   *
   * 先根据映射文件恢复所有监听器，再开始监听管理端口。
   */
  async start(): Promise<void> {
    setLogLevel(this.config.logLevel);
    await this.service.restore();

    const httpServer = createHttpServer((req, res) => {
      this.handleHttpRequest(req, res).catch((error: unknown) => {
        this.sendError(res, error);
      });
    });
    this.httpServer = httpServer;

    try {
      await new Promise<void>((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(this.config.adminPort, this.config.host, () => {
          httpServer.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      this.httpServer = undefined;
      await this.service.shutdown();
      throw error instanceof Error ? toBindError(this.config.adminPort, error) : error;
    }

    httpServer.on('error', (error) => {
      logger.error('管理服务器错误:', error);
    });

    logger.log(`管理服务器正在监听 http://${this.config.host}:${this.getPort()}`);

    this.startedAt = Date.now();
    this.statsInterval = setInterval(() => {
      logger.log(
        `统计: ${this.registry.getActivePorts().length} 个转发监听器, ${this.registry.getConnectionCount()} 个连接`,
      );
    }, DEFAULT_CONFIG.STATS_INTERVAL);
    this.statsInterval.unref();
  }

  private async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = url.pathname;

    // 入口：按需建立映射并重定向
    if (pathname === '/' && (req.method === 'GET' || req.method === 'POST')) {
      const params: ForwardParams =
        req.method === 'POST'
          ? parseForwardParams(await readBody(req), req.headers['content-type'])
          : { ip: url.searchParams.get('ip') ?? undefined, protocol: url.searchParams.get('protocol') ?? undefined };

      if (req.method === 'GET' && (!params.ip || !params.protocol)) {
        sendJson(res, HTTP_STATUS.OK, { protocols: SUPPORTED_PROTOCOLS });
        return;
      }

      const { ip, protocol } = requireForwardParams(params);
      const result = await this.service.requestForward(ip, protocol);
      const location = `${result.protocol}://${getRequestHostname(req, this.config.host)}:${result.externalPort}`;
      logger.log(`重定向到 ${location}`);
      res.writeHead(HTTP_STATUS.FOUND, { Location: location });
      res.end();
      return;
    }

    // 转发请求 API
    if (pathname === `${API}/forward` && req.method === 'POST') {
      const { ip, protocol } = requireForwardParams(
        parseForwardParams(await readBody(req), req.headers['content-type'] ?? 'application/json'),
      );
      const result = await this.service.requestForward(ip, protocol);
      sendJson(res, HTTP_STATUS.OK, result);
      return;
    }

    // 服务器状态 API
    if (pathname === `${API}/status` && req.method === 'GET') {
      sendJson(res, HTTP_STATUS.OK, await this.getStatus());
      return;
    }

    // 转发监听器列表 API
    if (pathname === `${API}/proxies` && req.method === 'GET') {
      sendJson(res, HTTP_STATUS.OK, { proxies: this.service.getProxyStatus() });
      return;
    }

    // 映射列表 API
    if (pathname === `${API}/mappings` && req.method === 'GET') {
      sendJson(res, HTTP_STATUS.OK, { mappings: await this.service.listMappings() });
      return;
    }

    // 删除映射 API
    if (pathname === `${API}/mappings` && req.method === 'DELETE') {
      const { ip, protocol } = requireForwardParams({
        ip: url.searchParams.get('ip') ?? undefined,
        protocol: url.searchParams.get('protocol') ?? undefined,
      });
      const removed = await this.service.removeMapping(ip, protocol);
      if (removed) {
        sendJson(res, HTTP_STATUS.OK, { removed: true });
      } else {
        sendJson(res, HTTP_STATUS.NOT_FOUND, { removed: false, error: '映射不存在' });
      }
      return;
    }

    // 停止服务器 API
    if (pathname === `${API}/stop` && req.method === 'POST') {
      sendJson(res, HTTP_STATUS.OK, { message: '服务器正在停止' });
      this.stop().catch((error: unknown) => {
        logger.error('停止服务器失败:', error);
      });
      return;
    }

    res.writeHead(HTTP_STATUS.NOT_FOUND);
    res.end('Not Found');
  }

  private sendError(res: ServerResponse, error: unknown): void {
    const statusCode = toHttpStatus(error);
    if (statusCode >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
      logger.error('请求处理失败:', error);
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    const code = error instanceof ForwardError ? error.code : ErrorCode.INTERNAL_ERROR;
    const message = error instanceof Error ? error.message : String(error);
    sendJson(res, statusCode, { error: message, code });
  }

  /**
   * 停止服务器
   *
   * 关闭管理端口并停止所有转发监听器。
   */
  async stop(): Promise<void> {
    logger.log('正在停止服务器...');

    if (this.statsInterval) {
      clearInterval(this.statsInterval);
      this.statsInterval = undefined;
    }

    const httpServer = this.httpServer;
    this.httpServer = undefined;
    if (httpServer) {
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
      });
    }

    await this.service.shutdown();
    this.startedAt = undefined;

    logger.log('服务器已停止');
  }

  /**
   * 管理端口实际监听的端口号
   *
   * `adminPort` 为 0 时返回系统分配的端口。
   */
  getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.adminPort;
  }

  async getStatus(): Promise<ServerStatus> {
    const mappings = await this.service.listMappings();
    return {
      running: this.httpServer?.listening ?? false,
      host: this.config.host,
      adminPort: this.getPort(),
      uptime: this.startedAt ? Date.now() - this.startedAt : 0,
      activeProxies: this.service.getProxyStatus().length,
      activeConnections: this.service.getConnectionCount(),
      mappings: mappings.length,
    };
  }

  getConfig(): ServerConfig {
    return this.config;
  }

  getService(): PortForwardService {
    return this.service;
  }
}
