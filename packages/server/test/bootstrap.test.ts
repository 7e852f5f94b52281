/**
 * 启动恢复测试
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createServer, Server } from 'net';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { ErrorCode, isForwardError } from '@zhuanjie/shared';
import { MappingStore } from '../src/mapping-store.js';
import { ProxyRegistry } from '../src/proxy-registry.js';
import { restoreProxies } from '../src/bootstrap.js';
import { createTempDir, getRandomPort } from './helpers.js';

const TIMESTAMP = /^\[\d{2}:\d{2}:\d{2}\.\d{3}\]$/;

describe('restoreProxies', () => {
  let cleanup: () => Promise<void>;
  let file: string;
  let store: MappingStore;
  let registry: ProxyRegistry;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const temp = await createTempDir();
    cleanup = temp.cleanup;
    file = join(temp.dir, 'port_mappings.json');
    store = new MappingStore(file);
    registry = new ProxyRegistry({ listenHost: '127.0.0.1' });
  });

  afterEach(async () => {
    await registry.stopAll();
    await cleanup();
    vi.restoreAllMocks();
  });

  it('应该为协议可识别的映射启动监听器，并跳过未知协议', async () => {
    const [a, b, c, d] = [await getRandomPort(), await getRandomPort(), await getRandomPort(), await getRandomPort()];
    await writeFile(
      file,
      JSON.stringify({
        '10.0.0.1|ssh': a,
        '10.0.0.2|http': b,
        'example.org|https': c,
        '10.0.0.7|ftp': d,
      }),
    );

    const report = await restoreProxies(store, registry);

    expect(report.started.sort((x, y) => x - y)).toEqual([a, b, c].sort((x, y) => x - y));
    expect(report.skipped).toEqual([
      { record: { remoteHost: '10.0.0.7', protocol: 'ftp', externalPort: d }, reason: "协议 'ftp' 无法识别" },
    ]);
    expect(report.failed).toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringMatching(TIMESTAMP),
      `跳过映射 10.0.0.7:${d}: 协议 'ftp' 无法识别`,
    );

    expect(registry.getSnapshot().map((s) => [s.port, s.remoteHost, s.remotePort])).toEqual(
      [
        [a, '10.0.0.1', 22],
        [b, '10.0.0.2', 80],
        [c, 'example.org', 443],
      ].sort((x, y) => Number(x[0]) - Number(y[0])),
    );
    expect(registry.isRunning(d)).toBe(false);
  });

  it('重复调用不应该重复启动监听器', async () => {
    const port = await getRandomPort();
    await writeFile(file, JSON.stringify({ '10.0.0.1|ssh': port }));

    await restoreProxies(store, registry);
    const second = await restoreProxies(store, registry);

    expect(second.started).toEqual([]);
    expect(second.unchanged).toEqual([port]);
    expect(registry.getActivePorts()).toEqual([port]);
  });

  it('一条映射启动失败不应该影响其他映射', async () => {
    const blocker: Server = createServer();
    await new Promise<void>((resolve) => blocker.listen(0, '127.0.0.1', resolve));
    const address = blocker.address();
    const busyPort = address && typeof address === 'object' ? address.port : 0;
    const freePort = await getRandomPort();
    await writeFile(file, JSON.stringify({ '10.0.0.1|ssh': busyPort, '10.0.0.2|ssh': freePort }));

    try {
      const report = await restoreProxies(store, registry);

      expect(report.started).toEqual([freePort]);
      expect(report.failed).toHaveLength(1);
      expect(report.failed[0].record.externalPort).toBe(busyPort);
      expect(isForwardError(report.failed[0].error, ErrorCode.PORT_IN_USE)).toBe(true);
      expect(registry.getActivePorts()).toEqual([freePort]);
    } finally {
      await new Promise<void>((resolve) => blocker.close(() => resolve()));
    }
  });

  it('映射文件不存在时什么也不做', async () => {
    const report = await restoreProxies(store, registry);

    expect(report).toEqual({ started: [], unchanged: [], skipped: [], failed: [] });
    expect(registry.getSnapshot()).toEqual([]);
  });
});
