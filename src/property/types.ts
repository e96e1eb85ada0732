import type { PropertyLogger } from "../core/logger";

/**
 * 属性变更监听器
 *
 * addAndCallListener 的首次调用传入 (current, current)
 */
export type PropertyListener<T> = (oldValue: T, newValue: T) => void;

/**
 * 属性种类（封闭集合）
 */
export type PropertyKind =
  | "atomic"
  | "mapped"
  | "combined"
  | "sourced"
  | "constant"
  | "delegated";

/**
 * 订阅句柄
 *
 * 由订阅方独占持有，close 只移除对应的那一次注册，重复 close 无副作用
 */
export interface PropertySubscription<T> {
  readonly closed: boolean;
  /**
   * 读取被订阅属性的当前值
   */
  get(): T;
  close(): void;
}

/**
 * 动态属性
 *
 * 所有属性变体（atomic / mapped / combined / sourced / constant / delegated）
 * 都实现这一组能力
 *
 * @example
 * ```typescript
 * const poolSize = Properties.atomic(10);
 * const subscription = poolSize.addAndCallListener((oldValue, newValue) => {
 *   pool.resize(newValue);
 * });
 *
 * poolSize.set(20);
 * subscription.close();
 * ```
 */
export interface DynamicProperty<T> {
  readonly kind: PropertyKind;

  get(): T;

  addListener(listener: PropertyListener<T>): PropertySubscription<T>;

  /**
   * 注册监听器并立即以 (current, current) 调用一次
   */
  addAndCallListener(listener: PropertyListener<T>): PropertySubscription<T>;

  /**
   * 注册监听器并返回当前值（不调用监听器），之后通过 removeListener 取消
   */
  addListenerAndGet(listener: PropertyListener<T>): T;

  /**
   * 移除该函数的第一次注册
   */
  removeListener(listener: PropertyListener<T>): void;

  /**
   * 取消全部订阅，get() 仍返回最后一次的值
   */
  close(): void;
}

export interface PropertyOptions {
  /**
   * 属性名称（用于日志）
   */
  name?: string;

  logger?: PropertyLogger;
}
