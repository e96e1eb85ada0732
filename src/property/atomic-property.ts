import defaultLogger, { describeValue } from "../core/logger";
import { ListenerRegistry } from "./listeners";
import type {
  DynamicProperty,
  PropertyListener,
  PropertyOptions,
  PropertySubscription,
} from "./types";

/**
 * 可变的根属性
 *
 * set 先切换值，再按注册顺序通知所有监听器 (old, new)。
 * 在监听器中对同一属性调用 set 是被禁止的，会以
 * ReentrantPropertyUpdateError 的形式记录到日志中，值保持不变
 */
export class AtomicProperty<T> implements DynamicProperty<T> {
  public readonly kind = "atomic";

  private value: T;
  private readonly listeners: ListenerRegistry<T>;

  constructor(initialValue: T, options?: PropertyOptions) {
    this.value = initialValue;
    this.listeners = new ListenerRegistry(
      options?.name || "atomic",
      options?.logger || defaultLogger
    );
  }

  get(): T {
    return this.value;
  }

  set(newValue: T): void {
    this.listeners.transition(() => {
      const oldValue = this.value;
      this.value = newValue;
      return { oldValue, newValue };
    });
  }

  addListener(listener: PropertyListener<T>): PropertySubscription<T> {
    return this.listeners.add(listener, () => this.value);
  }

  addAndCallListener(listener: PropertyListener<T>): PropertySubscription<T> {
    return this.listeners.addAndCall(listener, () => this.value);
  }

  addListenerAndGet(listener: PropertyListener<T>): T {
    this.listeners.add(listener, () => this.value);
    return this.value;
  }

  removeListener(listener: PropertyListener<T>): void {
    this.listeners.remove(listener);
  }

  close(): void {
    this.listeners.clear();
  }

  toString(): string {
    return `AtomicProperty{value=${describeValue(this.value)}}`;
  }
}
