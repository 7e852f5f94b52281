/**
 * 外部端口分配测试
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, isForwardError, type MappingRecord } from '@zhuanjie/shared';
import { nextPort } from '../src/port-allocator.js';

const record = (remoteHost: string, externalPort: number): MappingRecord => ({
  remoteHost,
  protocol: 'ssh',
  externalPort,
});

describe('nextPort', () => {
  it('映射集为空时返回起始端口', () => {
    expect(nextPort([])).toBe(10000);
    expect(nextPort([], 20000)).toBe(20000);
  });

  it('返回现有最大端口加一', () => {
    expect(nextPort([record('a', 10000), record('b', 10001)])).toBe(10002);
  });

  it('不复用中间的空闲端口', () => {
    expect(nextPort([record('a', 10005), record('b', 10000)])).toBe(10006);
  });

  it('以现有最大端口为准，与起始端口无关', () => {
    expect(nextPort([record('a', 10003)], 20000)).toBe(10004);
  });

  it('超过 65535 时抛出 PORT_EXHAUSTED', () => {
    expect(nextPort([record('a', 65534)])).toBe(65535);

    let caught: unknown;
    try {
      nextPort([record('a', 65535)]);
    } catch (error) {
      caught = error;
    }
    expect(isForwardError(caught, ErrorCode.PORT_EXHAUSTED)).toBe(true);
  });
});
