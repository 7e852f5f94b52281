/**
 * @module shared
 *
 * 端口转发共享模块入口。
 *
 * 统一导出协议端口表、错误码、默认配置、类型定义和工具函数，
 * 作为 `@zhuanjie/shared` 包的公共 API 入口。
 */

/** 导出协议常量、错误码、默认配置及各类配置接口 */
export * from './protocol.js';
/** 导出日志工具 */
export * from './logger.js';
/** 导出按键串行任务队列 */
export * from './serial-queue.js';
