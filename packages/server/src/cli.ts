#!/usr/bin/env node

/**
 * @module cli
 * @description 转接服务端命令行工具模块。
 * 提供 `zhuanjie` CLI 命令，支持启动、停止、查询服务器状态，以及查看和请求端口映射。
 * `start` 以后台守护进程方式运行服务器，使用 PID 文件跟踪运行中的服务器实例。
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { readFileSync, writeFileSync, mkdirSync, unlinkSync, openSync, closeSync } from 'fs';
import { join } from 'path';
import { request } from 'http';
import { spawn } from 'child_process';
import { fileURLToPath } from 'url';
import { PROTOCOL_PORTS, isForwardProtocol, isLogLevel, type LogLevel, type ServerConfig } from '@zhuanjie/shared';
import { start, stop, type PortForwardServer } from './index.js';
import { DATA_DIR, DEFAULT_CONFIG_FILE, loadConfigFile, resolveServerConfig, validateServerConfig } from './config.js';
import { MappingStore } from './mapping-store.js';
import { createShutdownHandler } from './shutdown.js';

/** PID 文件完整路径 */
const PID_FILE = join(DATA_DIR, 'server.pid');
/** 日志文件路径 */
const LOG_FILE = join(DATA_DIR, 'server.log');

/**
 * PID 文件信息接口
 */
interface PidInfo {
  /** 服务器进程 ID */
  pid: number;
  /** 管理端口监听地址 */
  host: string;
  /** 管理端口 */
  adminPort: number;
}

/**
 * 服务器选项，供 start 和 _serve 共用
 */
interface ServerCliOptions {
  config?: string;
  port?: number;
  host?: string;
  listenHost?: string;
  startPort?: number;
  mappingFile?: string;
  connectTimeout?: number;
  stopTimeout?: number;
  closeConnectionsOnStop?: boolean;
  logLevel?: LogLevel;
}

interface HttpResult {
  statusCode: number;
  body: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('必须是整数');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('可选值: debug, info, warn, error, silent');
  }
  return value;
}

/**
 * 写入 PID 文件
 */
function writePidFile(info: PidInfo): void {
  mkdirSync(DATA_DIR, { recursive: true });
  writeFileSync(PID_FILE, JSON.stringify(info, null, 2));
}

/**
 * 读取 PID 文件
 *
 * @returns 解析后的 {@link PidInfo} 对象；若文件不存在或内容无效则返回 `null`
 */
function readPidFile(): PidInfo | null {
  try {
    const data: unknown = JSON.parse(readFileSync(PID_FILE, 'utf-8'));
    if (
      isRecord(data) &&
      typeof data.pid === 'number' &&
      typeof data.host === 'string' &&
      typeof data.adminPort === 'number'
    ) {
      return { pid: data.pid, host: data.host, adminPort: data.adminPort };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * 删除 PID 文件，文件不存在时静默忽略
 */
function removePidFile(): void {
  try {
    unlinkSync(PID_FILE);
  } catch {
    // ignore
  }
}

/**
 * 向管理端口发送 HTTP 请求
 *
 * 当 host 为 `0.0.0.0` 时自动替换为 `127.0.0.1`。
 */
function httpRequest(host: string, port: number, method: string, path: string, body?: unknown): Promise<HttpResult> {
  return new Promise((resolve, reject) => {
    const payload = body === undefined ? undefined : JSON.stringify(body);
    const req = request(
      {
        hostname: host === '0.0.0.0' ? '127.0.0.1' : host,
        port,
        path,
        method,
        timeout: 5000,
        headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
      },
      (res) => {
        let data = '';
        res.on('data', (chunk) => { data += chunk; });
        res.on('end', () => resolve({ statusCode: res.statusCode ?? 0, body: data }));
      },
    );
    req.on('error', reject);
    req.on('timeout', () => { req.destroy(); reject(new Error('请求超时')); });
    req.end(payload);
  });
}

/**
 * 轮询状态端点，等待后台服务器启动完成
 *
 * @returns 是否成功启动
 */
async function waitForStartup(host: string, port: number, timeoutMs: number): Promise<boolean> {
  const startTime = Date.now();
  const interval = 500;

  while (Date.now() - startTime < timeoutMs) {
    await new Promise((r) => setTimeout(r, interval));
    try {
      await httpRequest(host, port, 'GET', '/_zhuanjie/status');
      return true;
    } catch {
      // 未就绪，继续重试
    }
  }
  return false;
}

/**
 * 合并配置文件与命令行参数
 *
 * 显式指定的 `--config` 文件必须存在；默认配置文件缺失时忽略。
 */
async function loadCliConfig(options: ServerCliOptions): Promise<ServerConfig> {
  const fileConfig = await loadConfigFile(options.config ?? DEFAULT_CONFIG_FILE, options.config !== undefined);
  const config = resolveServerConfig(fileConfig, {
    host: options.host,
    adminPort: options.port,
    listenHost: options.listenHost,
    startPort: options.startPort,
    mappingFile: options.mappingFile,
    connectTimeout: options.connectTimeout,
    stopTimeout: options.stopTimeout,
    closeConnectionsOnStop: options.closeConnectionsOnStop,
    logLevel: options.logLevel,
  });
  validateServerConfig(config);
  return config;
}

/**
 * 把 start 收到的选项还原为 _serve 的命令行参数
 */
function toServeArgs(options: ServerCliOptions): string[] {
  const args: string[] = [];
  if (options.config !== undefined) args.push('--config', options.config);
  if (options.port !== undefined) args.push('--port', String(options.port));
  if (options.host !== undefined) args.push('--host', options.host);
  if (options.listenHost !== undefined) args.push('--listen-host', options.listenHost);
  if (options.startPort !== undefined) args.push('--start-port', String(options.startPort));
  if (options.mappingFile !== undefined) args.push('--mapping-file', options.mappingFile);
  if (options.connectTimeout !== undefined) args.push('--connect-timeout', String(options.connectTimeout));
  if (options.stopTimeout !== undefined) args.push('--stop-timeout', String(options.stopTimeout));
  if (options.closeConnectionsOnStop) args.push('--close-connections-on-stop');
  if (options.logLevel !== undefined) args.push('--log-level', options.logLevel);
  return args;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 为命令添加服务器选项
 */
function addServerOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', `JSON 配置文件（默认 ${DEFAULT_CONFIG_FILE}）`)
    .option('-p, --port <port>', '管理端口（默认 5000）', parseInteger)
    .option('-a, --host <address>', '管理端口监听地址（默认 127.0.0.1）')
    .option('--listen-host <address>', '转发监听器绑定地址（默认 0.0.0.0）')
    .option('--start-port <port>', '第一个外部端口（默认 10000）', parseInteger)
    .option('--mapping-file <path>', '映射文件路径')
    .option('--connect-timeout <ms>', '连接远程目标的超时时间（毫秒）', parseInteger)
    .option('--stop-timeout <ms>', '强制关闭连接时的等待时间（毫秒）', parseInteger)
    .option('--close-connections-on-stop', '停止监听器时同时关闭已转发的连接')
    .option('--log-level <level>', '日志级别', parseLogLevel);
}

/**
 * 读取 PID 文件，服务器未运行时输出提示并退出
 */
function requirePidInfo(): PidInfo {
  const pidInfo = readPidFile();
  if (!pidInfo) {
    console.log(chalk.red('未找到正在运行的服务器（PID 文件不存在）'));
    process.exit(1);
  }
  return pidInfo;
}

const program = new Command();

program
  .name('zhuanjie')
  .description(chalk.blue('转接 - 动态 TCP 端口转发服务'))
  .version('0.1.0');

// ====== _serve 命令（隐藏，前台运行，供 start 调用）======

addServerOptions(program.command('_serve', { hidden: true }).description('前台运行服务器（内部命令）'))
  .action(async (options: ServerCliOptions) => {
    let server: PortForwardServer;
    try {
      server = await start(await loadCliConfig(options));
    } catch (error) {
      console.error(chalk.red(`服务器启动失败: ${errorMessage(error)}`));
      process.exit(1);
    }

    const config = server.getConfig();
    writePidFile({ pid: process.pid, host: config.host, adminPort: server.getPort() });

    console.log(chalk.green('服务器启动成功'));
    console.log(chalk.gray(`  管理端口: ${config.host}:${server.getPort()}`));
    console.log(chalk.gray(`  转发地址: ${config.listenHost}`));
    console.log(chalk.gray(`  映射文件: ${config.mappingFile}`));

    const shutdown = createShutdownHandler({
      stop: () => {
        console.log(chalk.yellow('\n正在关闭...'));
        return stop(server);
      },
      cleanup: removePidFile,
      onError: (error) => console.error(chalk.red(`停止服务器失败: ${errorMessage(error)}`)),
      exit: (code) => process.exit(code),
    });

    const onSignal = () => {
      void shutdown();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });

// ====== start 命令（后台守护进程）======

addServerOptions(program.command('start').description('启动服务器（后台运行）'))
  .action(async (options: ServerCliOptions) => {
    // 1. 检测是否已在运行
    const existing = readPidFile();
    if (existing) {
      try {
        await httpRequest(existing.host, existing.adminPort, 'GET', '/_zhuanjie/status');
        console.log(chalk.yellow('服务器已在运行中'));
        console.log(chalk.gray(`  PID: ${existing.pid}`));
        console.log(chalk.gray(`  端口: ${existing.adminPort}`));
        return;
      } catch {
        // PID 文件残留，清理后继续
        removePidFile();
      }
    }

    // 2. 先在前台校验配置，配置错误时不启动后台进程
    let config: ServerConfig;
    try {
      config = await loadCliConfig(options);
    } catch (error) {
      console.log(chalk.red(errorMessage(error)));
      process.exit(1);
    }

    mkdirSync(DATA_DIR, { recursive: true });

    // 3. 启动后台守护进程
    const scriptPath = fileURLToPath(import.meta.url);
    const logFd = openSync(LOG_FILE, 'a');
    const child = spawn(process.execPath, [scriptPath, '_serve', ...toServeArgs(options)], {
      detached: true,
      stdio: ['ignore', logFd, logFd],
    });
    child.unref();
    closeSync(logFd);

    // 4. 等待服务器启动
    const started = await waitForStartup(config.host, config.adminPort, 10000);
    if (!started) {
      console.log(chalk.red('服务器启动失败，请查看日志文件:'));
      console.log(chalk.gray(`  ${LOG_FILE}`));
      process.exit(1);
    }

    console.log(chalk.green('服务器已在后台启动'));
    console.log(chalk.gray(`  PID: ${child.pid}`));
    console.log(chalk.gray(`  管理端口: ${config.host}:${config.adminPort}`));
    console.log(chalk.gray(`  日志: ${LOG_FILE}`));
  });

// ====== status 命令 ======

program
  .command('status')
  .description('查询服务器状态')
  .action(async () => {
    const pidInfo = requirePidInfo();

    let status: unknown;
    let proxies: unknown;
    try {
      status = JSON.parse((await httpRequest(pidInfo.host, pidInfo.adminPort, 'GET', '/_zhuanjie/status')).body);
      proxies = JSON.parse((await httpRequest(pidInfo.host, pidInfo.adminPort, 'GET', '/_zhuanjie/proxies')).body);
    } catch {
      console.log(chalk.red('无法连接到服务器，服务器可能未在运行。'));
      removePidFile();
      process.exit(1);
    }

    if (!isRecord(status)) {
      console.log(chalk.red('服务器返回了无法识别的状态'));
      process.exit(1);
    }

    console.log(chalk.blue.bold('转接服务器状态'));
    console.log(chalk.gray(`  运行中: ${status.running === true ? chalk.green('是') : chalk.red('否')}`));
    console.log(chalk.gray(`  管理端口: ${String(status.host)}:${String(status.adminPort)}`));
    console.log(chalk.gray(`  运行时长: ${Math.floor(Number(status.uptime) / 1000)}秒`));
    console.log(chalk.gray(`  映射: ${String(status.mappings)}`));
    console.log(chalk.gray(`  转发监听器: ${String(status.activeProxies)}`));
    console.log(chalk.gray(`  连接数: ${String(status.activeConnections)}`));

    if (isRecord(proxies) && Array.isArray(proxies.proxies)) {
      for (const proxy of proxies.proxies) {
        if (isRecord(proxy)) {
          console.log(
            chalk.gray(
              `    ${String(proxy.port)} -> ${String(proxy.remoteHost)}:${String(proxy.remotePort)} ` +
                `[${String(proxy.state)}] ${String(proxy.connections)} 个连接`,
            ),
          );
        }
      }
    }
  });

// ====== stop 命令 ======

program
  .command('stop')
  .description('停止服务器')
  .action(async () => {
    const pidInfo = requirePidInfo();

    try {
      await httpRequest(pidInfo.host, pidInfo.adminPort, 'POST', '/_zhuanjie/stop');
      console.log(chalk.green('服务器已停止'));
    } catch {
      console.log(chalk.red('无法连接到服务器，服务器可能未在运行。'));
    }
    removePidFile();
  });

// ====== show 命令 ======

addServerOptions(program.command('show').description('显示映射表'))
  .action(async (options: ServerCliOptions) => {
    const config = await loadCliConfig(options);
    const records = await new MappingStore(config.mappingFile).load();

    if (records.length === 0) {
      console.log(chalk.yellow('暂无映射'));
      console.log(chalk.gray(`  映射文件: ${config.mappingFile}`));
      return;
    }

    console.log(chalk.blue.bold(`端口映射（${records.length}）`));
    console.log(chalk.gray(`  ${'主机'.padEnd(30)}${'协议'.padEnd(10)}${'外部端口'.padEnd(10)}内部端口`));
    for (const record of [...records].sort((a, b) => a.externalPort - b.externalPort)) {
      const internal = isForwardProtocol(record.protocol) ? String(PROTOCOL_PORTS[record.protocol]) : chalk.red('未知协议');
      console.log(
        `  ${record.remoteHost.padEnd(30)}${chalk.cyan(record.protocol.padEnd(10))}` +
          `${chalk.green(String(record.externalPort).padEnd(10))}${internal}`,
      );
    }
  });

// ====== forward 命令 ======

program
  .command('forward <ip> <protocol>')
  .description('请求运行中的服务器为 (ip, protocol) 建立转发')
  .action(async (ip: string, protocol: string) => {
    const pidInfo = requirePidInfo();

    let result: HttpResult;
    try {
      result = await httpRequest(pidInfo.host, pidInfo.adminPort, 'POST', '/_zhuanjie/forward', { ip, protocol });
    } catch {
      console.log(chalk.red('无法连接到服务器，服务器可能未在运行。'));
      process.exit(1);
    }

    let data: unknown;
    try {
      data = JSON.parse(result.body);
    } catch {
      data = undefined;
    }
    if (!isRecord(data)) {
      console.log(chalk.red(`服务器返回了无法识别的响应（HTTP ${result.statusCode}）`));
      process.exit(1);
    }
    if (result.statusCode !== 200) {
      console.log(chalk.red(`转发失败: ${String(data.error)} (${String(data.code)})`));
      process.exit(1);
    }

    const host = pidInfo.host === '0.0.0.0' ? '127.0.0.1' : pidInfo.host;
    console.log(chalk.green(`${String(data.protocol)}://${host}:${String(data.externalPort)}`));
    console.log(chalk.gray(`  -> ${String(data.remoteHost)}:${String(data.remotePort)}${data.created === true ? '（新建）' : ''}`));
  });

program.parse();
