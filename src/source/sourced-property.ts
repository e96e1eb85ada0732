import defaultLogger, {
  describeValue,
  type PropertyLogger,
} from "../core/logger";
import { ListenerRegistry } from "../property/listeners";
import type {
  DynamicProperty,
  PropertyListener,
  PropertySubscription,
} from "../property/types";
import type { OptionalDefaultValue } from "./default-value";
import type { PropertyType } from "./marshaller";
import type { DynamicPropertySource, SourceSubscription } from "./types";

export type SourcedPropertyState = "UNINITIALIZED" | "ACTIVE" | "CLOSED";

/**
 * 绑定到属性源中某个 key 的属性
 *
 * 构造时向属性源注册并同步拿到第一个值（存储中的值或默认值），
 * 构造函数返回后 get() 一定可用；之后属性源的每次通知都会
 * 切换本地缓存并按顺序通知本地监听器。
 *
 * 默认值只属于当前实例：同一个 key 上的两个 SourcedProperty 互不影响
 *
 * @example
 * ```typescript
 * const timeout = new SourcedProperty(source, "http.timeout", z.number(), DefaultValue.of(3000));
 * timeout.addListener((oldValue, newValue) => client.setTimeout(newValue));
 * ```
 */
export class SourcedProperty<T> implements DynamicProperty<T> {
  public readonly kind = "sourced";

  private current: { value: T } | undefined;
  private status: SourcedPropertyState = "UNINITIALIZED";
  private readonly listeners: ListenerRegistry<T>;
  private readonly logger: PropertyLogger;
  private readonly subscription: SourceSubscription;

  constructor(
    source: DynamicPropertySource,
    private readonly name: string,
    type: PropertyType<T>,
    defaultValue: OptionalDefaultValue<T>,
    options?: { logger?: PropertyLogger }
  ) {
    this.logger = options?.logger || defaultLogger;
    this.listeners = new ListenerRegistry(name, this.logger);

    this.subscription = source.subscribeAndCallListener(
      name,
      type,
      defaultValue,
      (newValue) => this.onSourceValue(newValue)
    );
    this.status = "ACTIVE";
  }

  get state(): SourcedPropertyState {
    return this.status;
  }

  get(): T {
    if (!this.current) {
      throw new Error(`Property '${this.name}' has not received a value yet`);
    }
    return this.current.value;
  }

  addListener(listener: PropertyListener<T>): PropertySubscription<T> {
    return this.listeners.add(listener, () => this.get());
  }

  addAndCallListener(listener: PropertyListener<T>): PropertySubscription<T> {
    return this.listeners.addAndCall(listener, () => this.get());
  }

  addListenerAndGet(listener: PropertyListener<T>): T {
    this.listeners.add(listener, () => this.get());
    return this.get();
  }

  removeListener(listener: PropertyListener<T>): void {
    this.listeners.remove(listener);
  }

  close(): void {
    if (this.status === "CLOSED") {
      return;
    }
    this.status = "CLOSED";
    this.subscription.close();
    this.listeners.clear();
  }

  toString(): string {
    return `SourcedProperty{name='${this.name}', value=${describeValue(this.current?.value)}}`;
  }

  private onSourceValue(newValue: T): void {
    if (this.status === "CLOSED") {
      return;
    }

    const previous = this.current;
    if (!previous) {
      this.current = { value: newValue };
      return;
    }

    this.listeners.transition(() => {
      this.current = { value: newValue };
      return { oldValue: previous.value, newValue };
    });
    this.logger.debug(
      `Sourced property update: name: ${this.name}, oldValue: ${describeValue(previous.value)}, newValue: ${describeValue(newValue)}`
    );
  }
}
