import { AtomicProperty } from "./atomic-property";
import type {
  DynamicProperty,
  PropertyListener,
  PropertyOptions,
  PropertySubscription,
} from "./types";

/**
 * 多源派生属性
 *
 * 订阅所有来源，任一来源变化都会调用一次 combiner。
 * combiner 通过闭包读取各来源的当前值，而不是触发事件中的值；
 * 不做合并或防抖，每次上游变化至少产生一次通知
 *
 * @example
 * ```typescript
 * const host = Properties.atomic("localhost");
 * const port = Properties.atomic(8080);
 * const url = new CombinedProperty([host, port], () => `${host.get()}:${port.get()}`);
 * ```
 */
export class CombinedProperty<R> implements DynamicProperty<R> {
  public readonly kind = "combined";

  private readonly value: AtomicProperty<R>;
  private readonly subscriptions: PropertySubscription<unknown>[];

  constructor(
    sources: ReadonlyArray<DynamicProperty<unknown>>,
    combiner: () => R,
    options?: PropertyOptions
  ) {
    this.value = new AtomicProperty(combiner(), {
      name: options?.name || "combined",
      logger: options?.logger,
    });
    this.subscriptions = sources.map((source) =>
      source.addListener(() => this.value.set(combiner()))
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
    for (const subscription of this.subscriptions) {
      subscription.close();
    }
    this.value.close();
  }
}
