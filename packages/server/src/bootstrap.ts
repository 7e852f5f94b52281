/**
 * @module bootstrap
 * @description 启动恢复模块。
 * 进程启动时读取映射文件，为每条协议可识别的映射重新建立转发监听器。
 * 各映射并发、独立地恢复，一条映射失败不会阻塞其他映射。
 */

import { getInternalPort, isForwardProtocol, logger, type MappingRecord } from '@zhuanjie/shared';
import type { MappingStore } from './mapping-store.js';
import type { ProxyRegistry } from './proxy-registry.js';

/**
 * 因协议无法识别而跳过的映射
 */
export interface SkippedMapping {
  record: MappingRecord;
  reason: string;
}

/**
 * 恢复失败的映射
 */
export interface FailedMapping {
  record: MappingRecord;
  error: Error;
}

/**
 * 恢复报告
 */
export interface RestoreReport {
  /** 新启动的端口 */
  started: number[];
  /** 已在运行、无需改动的端口 */
  unchanged: number[];
  /** 被跳过的映射 */
  skipped: SkippedMapping[];
  /** 启动失败的映射 */
  failed: FailedMapping[];
}

/**
 * 根据映射文件恢复所有监听器
 *
 * 可以重复调用：已在运行且目标相同的端口不会被重复启动。
 *
 * @param store - 映射存储
 * @param registry - 代理注册表
 * @returns 恢复报告
 */
export async function restoreProxies(store: MappingStore, registry: ProxyRegistry): Promise<RestoreReport> {
  const records = await store.load();
  const report: RestoreReport = { started: [], unchanged: [], skipped: [], failed: [] };

  const recognized: MappingRecord[] = [];
  for (const record of records) {
    if (isForwardProtocol(record.protocol)) {
      recognized.push(record);
      continue;
    }
    const reason = `协议 '${record.protocol}' 无法识别`;
    logger.warn(`跳过映射 ${record.remoteHost}:${record.externalPort}: ${reason}`);
    report.skipped.push({ record, reason });
  }

  const results = await Promise.allSettled(
    recognized.map((record) =>
      registry.ensure(record.externalPort, record.remoteHost, getInternalPort(record.protocol)),
    ),
  );

  results.forEach((result, index) => {
    const record = recognized[index];
    if (result.status === 'rejected') {
      const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
      logger.error(`恢复端口 ${record.externalPort} -> ${record.remoteHost} 失败:`, error.message);
      report.failed.push({ record, error });
    } else if (result.value === 'unchanged') {
      report.unchanged.push(record.externalPort);
    } else {
      report.started.push(record.externalPort);
      logger.log(`已恢复端口 ${record.externalPort} -> ${record.remoteHost}:${getInternalPort(record.protocol)}`);
    }
  });

  logger.log(
    `恢复完成: 启动 ${report.started.length} 个，保持 ${report.unchanged.length} 个，` +
      `跳过 ${report.skipped.length} 个，失败 ${report.failed.length} 个`,
  );
  return report;
}
