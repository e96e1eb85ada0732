import { AtomicProperty } from "./atomic-property";
import type {
  DynamicProperty,
  PropertyListener,
  PropertyOptions,
  PropertySubscription,
} from "./types";

/**
 * 单源派生属性
 *
 * 持有对父属性的订阅，父属性每次变化时以 map(newValue) 更新自身。
 * map 抛出的异常由父属性的扇出边界记录，派生值保持不变
 */
export class MappedProperty<T, R> implements DynamicProperty<R> {
  public readonly kind = "mapped";

  private readonly value: AtomicProperty<R>;
  private readonly subscription: PropertySubscription<T>;

  constructor(
    source: DynamicProperty<T>,
    map: (value: T) => R,
    options?: PropertyOptions
  ) {
    this.value = new AtomicProperty(map(source.get()), {
      name: options?.name || "mapped",
      logger: options?.logger,
    });
    this.subscription = source.addListener((_oldValue, newValue) =>
      this.value.set(map(newValue))
    );
  }

  get(): R {
    return this.value.get();
  }

  addListener(listener: PropertyListener<R>): PropertySubscription<R> {
    return this.value.addListener(listener);
  }

  addAndCallListener(listener: PropertyListener<R>): PropertySubscription<R> {
    return this.value.addAndCallListener(listener);
  }

  addListenerAndGet(listener: PropertyListener<R>): R {
    return this.value.addListenerAndGet(listener);
  }

  removeListener(listener: PropertyListener<R>): void {
    this.value.removeListener(listener);
  }

  close(): void {
    this.subscription.close();
    this.value.close();
  }
}
