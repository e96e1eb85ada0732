import { ReentrantPropertyUpdateError } from "../core/errors";
import { describeValue, type PropertyLogger } from "../core/logger";
import type { PropertyListener, PropertySubscription } from "./types";

interface Registration<T> {
  listener: PropertyListener<T>;
  active: boolean;
}

/**
 * 监听器注册表
 *
 * 负责一个属性实例的全部状态切换与扇出通知：
 * - 按注册顺序通知，允许重复注册
 * - 通知时遍历快照，已关闭的注册不再被调用
 * - 单个监听器抛出的异常只记录日志，不影响后续监听器
 * - 通知过程中再次切换同一属性会抛出 ReentrantPropertyUpdateError
 */
export class ListenerRegistry<T> {
  private registrations: Registration<T>[] = [];
  private delivering = false;

  constructor(
    private readonly name: string,
    private readonly logger: PropertyLogger
  ) {}

  get size(): number {
    return this.registrations.length;
  }

  /**
   * 注册监听器，返回订阅句柄
   */
  add(listener: PropertyListener<T>, read: () => T): PropertySubscription<T> {
    const registration: Registration<T> = { listener, active: true };
    this.registrations = [...this.registrations, registration];
    return new ListenerSubscription(read, () => this.release(registration));
  }

  /**
   * 注册后立即以 (current, current) 调用一次
   */
  addAndCall(
    listener: PropertyListener<T>,
    read: () => T
  ): PropertySubscription<T> {
    const subscription = this.add(listener, read);
    const current = read();
    this.invoke(listener, current, current);
    return subscription;
  }

  remove(listener: PropertyListener<T>): void {
    const registration = this.registrations.find(
      (r) => r.listener === listener
    );
    if (registration) {
      this.release(registration);
    }
  }

  clear(): void {
    for (const registration of this.registrations) {
      registration.active = false;
    }
    this.registrations = [];
  }

  /**
   * 在串行区内执行值切换，并把 (old, new) 依次通知给所有监听器
   *
   * @param swap 完成切换并返回旧值与新值
   */
  transition(swap: () => { oldValue: T; newValue: T }): void {
    if (this.delivering) {
      throw new ReentrantPropertyUpdateError(this.name);
    }

    this.delivering = true;
    try {
      const { oldValue, newValue } = swap();
      for (const registration of this.registrations) {
        if (registration.active) {
          this.invoke(registration.listener, oldValue, newValue);
        }
      }
    } finally {
      this.delivering = false;
    }
  }

  private release(registration: Registration<T>): void {
    if (!registration.active) {
      return;
    }
    registration.active = false;
    this.registrations = this.registrations.filter((r) => r !== registration);
  }

  private invoke(listener: PropertyListener<T>, oldValue: T, newValue: T) {
    notifyListener(listener, oldValue, newValue, this.name, this.logger);
  }
}

/**
 * 调用单个监听器，异常只记录日志
 */
export function notifyListener<T>(
  listener: PropertyListener<T>,
  oldValue: T,
  newValue: T,
  name: string,
  logger: PropertyLogger
): void {
  try {
    listener(oldValue, newValue);
  } catch (error) {
    logger.error(
      `Failed to update property ${name} from oldValue ${describeValue(oldValue)} to newValue ${describeValue(newValue)}`,
      error
    );
  }
}

/**
 * 注册表返回的订阅句柄
 */
export class ListenerSubscription<T> implements PropertySubscription<T> {
  private released = false;

  constructor(
    private readonly read: () => T,
    private readonly release: () => void
  ) {}

  get closed(): boolean {
    return this.released;
  }

  get(): T {
    return this.read();
  }

  close(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.release();
  }
}

/**
 * 不会收到任何通知的订阅（常量类属性使用）
 */
export class InertSubscription<T> implements PropertySubscription<T> {
  private released = false;

  constructor(private readonly read: () => T) {}

  get closed(): boolean {
    return this.released;
  }

  get(): T {
    return this.read();
  }

  close(): void {
    this.released = true;
  }
}
