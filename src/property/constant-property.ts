import defaultLogger, {
  describeValue,
  type PropertyLogger,
} from "../core/logger";
import { InertSubscription, notifyListener } from "./listeners";
import type {
  DynamicProperty,
  PropertyListener,
  PropertyOptions,
  PropertySubscription,
} from "./types";

/**
 * 常量属性，值永不变化，监听器只会在 addAndCallListener 时被调用一次
 *
 * 常用作 @PropertyId 字段的默认值载体
 */
export class ConstantProperty<T> implements DynamicProperty<T> {
  public readonly kind = "constant";

  private readonly name: string;
  private readonly logger: PropertyLogger;

  constructor(
    private readonly value: T,
    options?: PropertyOptions
  ) {
    this.name = options?.name || "constant";
    this.logger = options?.logger || defaultLogger;
  }

  get(): T {
    return this.value;
  }

  addListener(_listener: PropertyListener<T>): PropertySubscription<T> {
    return new InertSubscription(() => this.value);
  }

  addAndCallListener(listener: PropertyListener<T>): PropertySubscription<T> {
    notifyListener(listener, this.value, this.value, this.name, this.logger);
    return new InertSubscription(() => this.value);
  }

  addListenerAndGet(_listener: PropertyListener<T>): T {
    return this.value;
  }

  removeListener(_listener: PropertyListener<T>): void {}

  close(): void {}

  toString(): string {
    return `ConstantProperty{value=${describeValue(this.value)}}`;
  }
}

/**
 * 委托属性，每次 get() 都调用 supplier
 */
export class DelegatedProperty<T> implements DynamicProperty<T> {
  public readonly kind = "delegated";

  private readonly name: string;
  private readonly logger: PropertyLogger;

  constructor(
    private readonly supplier: () => T,
    options?: PropertyOptions
  ) {
    this.name = options?.name || "delegated";
    this.logger = options?.logger || defaultLogger;
  }

  get(): T {
    return this.supplier();
  }

  addListener(_listener: PropertyListener<T>): PropertySubscription<T> {
    return new InertSubscription(() => this.supplier());
  }

  addAndCallListener(listener: PropertyListener<T>): PropertySubscription<T> {
    const current = this.supplier();
    notifyListener(listener, current, current, this.name, this.logger);
    return new InertSubscription(() => this.supplier());
  }

  addListenerAndGet(_listener: PropertyListener<T>): T {
    return this.supplier();
  }

  removeListener(_listener: PropertyListener<T>): void {}

  close(): void {}
}
