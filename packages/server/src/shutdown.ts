/**
 * @module shutdown
 * @description 退出信号处理模块。
 */

/**
 * 关闭流程中的各个步骤
 */
export interface ShutdownSteps {
  /** 停止服务器 */
  stop(): Promise<void>;
  /** 清理运行时文件，停止失败时也会调用 */
  cleanup(): void;
  /** 停止失败时的回调 */
  onError(error: unknown): void;
  /** 结束进程，成功时退出码为 0，失败时为 1 */
  exit(code: number): void;
}

/**
 * 创建退出信号处理函数
 *
 * 重复收到信号时只执行一次关闭流程。返回的 Promise 不会拒绝。
 */
export function createShutdownHandler(steps: ShutdownSteps): () => Promise<void> {
  let running: Promise<void> | undefined;

  return () => {
    if (running) {
      return running;
    }
    running = steps.stop().then(
      () => 0,
      (error: unknown) => {
        steps.onError(error);
        return 1;
      },
    ).then((code) => {
      steps.cleanup();
      steps.exit(code);
    });
    return running;
  };
}
