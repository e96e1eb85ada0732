/**
 * 测试辅助模块
 * 提供常用的测试工具函数，简化测试代码编写
 */

import { StorePropertySource } from "../source/property-source";
import type { PropertySourceOptions } from "../source/types";
import { MemoryPropertyStore } from "../store/memory-store";

/**
 * 默认测试配置
 */
export const DEFAULT_TEST_OPTIONS = {
  prefix: "/test/config",
} as const;

/**
 * 创建基于内存存储的、已启动的属性源
 *
 * @example
 * ```ts
 * const { store, source } = await Testing.createTestSource();
 * await source.upsertProperty("pool.size", 10);
 *
 * // 自定义根路径
 * const { source } = await Testing.createTestSource({ prefix: "/orders" });
 * ```
 */
async function createTestSource(
  options?: Partial<PropertySourceOptions>
): Promise<{ store: MemoryPropertyStore; source: StorePropertySource }> {
  const store = new MemoryPropertyStore();
  const source = new StorePropertySource(store, {
    ...DEFAULT_TEST_OPTIONS,
    ...options,
  });
  await source.start();
  return { store, source };
}

/**
 * 等待指定时间（用于异步测试）
 *
 * @param ms 等待的毫秒数
 * @returns Promise
 */
function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 轮询等待条件成立，超时抛出异常
 *
 * 存储事件异步到达，断言前用它等待传播完成
 */
async function waitFor(
  predicate: () => boolean,
  timeoutMs = 1000,
  intervalMs = 5
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await wait(intervalMs);
  }
}

/**
 * 测试辅助工具命名空间
 * 所有测试相关的工具函数都通过这个命名空间导出，避免命名冲突
 */
export const Testing = {
  createTestSource,
  DEFAULT_TEST_OPTIONS,
  wait,
  waitFor,
} as const;
