/**
 * @module port-allocator
 * @description 外部端口分配模块。
 * 采用高水位线策略：映射集为空时返回起始端口，否则返回现有最大外部端口加一。
 * 被删除映射腾出的端口不会被重新使用。
 */

import { DEFAULT_CONFIG, ErrorCode, ForwardError, type MappingRecord } from '@zhuanjie/shared';

/**
 * 计算下一个外部端口
 *
 * @param records - 现有映射集
 * @param startPort - 映射集为空时使用的起始端口
 * @returns 新映射应使用的外部端口
 * @throws {ForwardError} 端口超出 65535 时抛出 `PORT_EXHAUSTED`
 */
export function nextPort(records: readonly MappingRecord[], startPort: number = DEFAULT_CONFIG.START_PORT): number {
  let port = startPort;
  if (records.length > 0) {
    port = records.reduce((max, record) => Math.max(max, record.externalPort), 0) + 1;
  }
  if (port > DEFAULT_CONFIG.MAX_PORT) {
    throw new ForwardError(ErrorCode.PORT_EXHAUSTED, `外部端口已用尽（上一个端口为 ${port - 1}）`);
  }
  return port;
}
