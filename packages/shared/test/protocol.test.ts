/**
 * @module protocol.test
 * @description 协议模块的单元测试
 */

import { describe, it, expect } from 'vitest';
import {
  PROTOCOL_PORTS,
  SUPPORTED_PROTOCOLS,
  ErrorCode,
  ForwardError,
  HTTP_STATUS,
  DEFAULT_CONFIG,
  isForwardError,
  isForwardProtocol,
  getErrnoCode,
  getInternalPort,
  toHttpStatus,
} from '../src/protocol.js';

describe('protocol - 常量', () => {
  it('协议表应该只包含四种协议及其端口', () => {
    expect(PROTOCOL_PORTS).toEqual({ ssh: 22, telnet: 23, http: 80, https: 443 });
    expect(SUPPORTED_PROTOCOLS).toEqual(['ssh', 'telnet', 'http', 'https']);
  });

  it('默认配置应该与文档一致', () => {
    expect(DEFAULT_CONFIG.HOST).toBe('127.0.0.1');
    expect(DEFAULT_CONFIG.ADMIN_PORT).toBe(5000);
    expect(DEFAULT_CONFIG.START_PORT).toBe(10000);
    expect(DEFAULT_CONFIG.KEY_DELIMITER).toBe('|');
    expect(DEFAULT_CONFIG.MAPPING_FILE_NAME).toBe('port_mappings.json');
    expect(DEFAULT_CONFIG.API_PREFIX).toBe('/_zhuanjie');
  });
});

describe('protocol - 协议查询', () => {
  it('isForwardProtocol 区分大小写', () => {
    expect(isForwardProtocol('ssh')).toBe(true);
    expect(isForwardProtocol('https')).toBe(true);
    expect(isForwardProtocol('SSH')).toBe(false);
    expect(isForwardProtocol('ftp')).toBe(false);
    expect(isForwardProtocol('toString')).toBe(false);
  });

  it('getInternalPort 应该返回协议对应的端口', () => {
    expect(getInternalPort('ssh')).toBe(22);
    expect(getInternalPort('telnet')).toBe(23);
    expect(getInternalPort('http')).toBe(80);
    expect(getInternalPort('https')).toBe(443);
  });

  it('getInternalPort 对未知协议抛出 UNSUPPORTED_PROTOCOL', () => {
    expect(() => getInternalPort('ftp')).toThrow(ForwardError);
    try {
      getInternalPort('ftp');
    } catch (error) {
      expect(isForwardError(error, ErrorCode.UNSUPPORTED_PROTOCOL)).toBe(true);
      expect(error instanceof Error && error.message).toBe("不支持的协议 'ftp'");
    }
  });
});

describe('protocol - ForwardError', () => {
  it('应该保存错误码、名称和底层错误', () => {
    const cause = new Error('underlying');
    const error = new ForwardError(ErrorCode.PERSIST_FAILED, '写入失败', cause);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ForwardError');
    expect(error.code).toBe(ErrorCode.PERSIST_FAILED);
    expect(error.message).toBe('写入失败');
    expect(error.cause).toBe(cause);
  });

  it('没有底层错误时 cause 为 undefined', () => {
    const error = new ForwardError(ErrorCode.INTERNAL_ERROR, 'oops');
    expect(error.cause).toBeUndefined();
  });

  it('isForwardError 可以限定错误码', () => {
    const error = new ForwardError(ErrorCode.PORT_IN_USE, 'busy');

    expect(isForwardError(error)).toBe(true);
    expect(isForwardError(error, ErrorCode.PORT_IN_USE)).toBe(true);
    expect(isForwardError(error, ErrorCode.BIND_FAILED)).toBe(false);
    expect(isForwardError(new Error('plain'))).toBe(false);
  });

  it('getErrnoCode 应该读取系统错误码', () => {
    const error = Object.assign(new Error('in use'), { code: 'EADDRINUSE' });

    expect(getErrnoCode(error)).toBe('EADDRINUSE');
    expect(getErrnoCode(new Error('plain'))).toBeUndefined();
    expect(getErrnoCode('EADDRINUSE')).toBeUndefined();
  });
});

describe('protocol - toHttpStatus', () => {
  const cases: Array<[ErrorCode, number]> = [
    [ErrorCode.UNSUPPORTED_PROTOCOL, HTTP_STATUS.BAD_REQUEST],
    [ErrorCode.INVALID_HOST, HTTP_STATUS.BAD_REQUEST],
    [ErrorCode.INVALID_REQUEST, HTTP_STATUS.BAD_REQUEST],
    [ErrorCode.PORT_IN_USE, HTTP_STATUS.CONFLICT],
    [ErrorCode.PERMISSION_DENIED, HTTP_STATUS.CONFLICT],
    [ErrorCode.PORT_EXHAUSTED, HTTP_STATUS.SERVICE_UNAVAILABLE],
    [ErrorCode.BIND_FAILED, HTTP_STATUS.SERVICE_UNAVAILABLE],
    [ErrorCode.CONNECT_FAILED, HTTP_STATUS.BAD_GATEWAY],
    [ErrorCode.PERSIST_FAILED, HTTP_STATUS.INTERNAL_SERVER_ERROR],
  ];

  it.each(cases)('%s 应该映射为 %i', (code, status) => {
    expect(toHttpStatus(new ForwardError(code, 'x'))).toBe(status);
  });

  it('非 ForwardError 一律映射为 500', () => {
    expect(toHttpStatus(new Error('plain'))).toBe(500);
    expect(toHttpStatus('string')).toBe(500);
  });
});
