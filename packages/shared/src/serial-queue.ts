/**
 * @module serial-queue
 *
 * 按键串行执行的异步任务队列。
 *
 * 同一个键上的任务严格按提交顺序依次执行，前一个任务结束（无论成功失败）后才开始下一个；
 * 不同键上的任务互不影响，可以并发进行。
 */

export class KeyedSerialQueue<K> {
  /** 每个键当前队尾的 Promise */
  private tails = new Map<K, Promise<void>>();

  /**
   * 在指定键上排队执行任务
   *
   * @param key - 串行化的键
   * @param task - 要执行的异步任务
   * @returns 任务自身的结果
   */
  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      // 队尾没有新任务时释放该键
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  /**
   * 指定键上是否有未完成的任务
   */
  isBusy(key: K): boolean {
    return this.tails.has(key);
  }

  /**
   * 当前有未完成任务的键数量
   */
  get size(): number {
    return this.tails.size;
  }
}
