import { z } from "zod";

import {
  MissingDefaultValueError,
  PropertyDecodeError,
  PropertyReadTimeoutError,
  PropertySourceStateError,
  PropertyWriteConflictError,
} from "../core/errors";
import defaultLogger, {
  describeValue,
  type PropertyLogger,
} from "../core/logger";
import type { PropertyStore, StoreEvent, StoreWatch } from "../store/types";
import { StoreEventType } from "../store/types";
import type { OptionalDefaultValue } from "./default-value";
import {
  EjsonPropertyMarshaller,
  type PropertyMarshaller,
  type PropertyType,
} from "./marshaller";
import type {
  DynamicPropertySource,
  PropertySourceOptions,
  SourceSubscription,
} from "./types";
import { PropertySourceState } from "./types";
import { joinPath, withTimeout } from "./utils";

const UPSERT_PROPERTY_RETRY_COUNT = 10;

const DEFAULT_READ_TIMEOUT_MS = 120_000;

const PropertySourceOptionsSchema = z.object({
  prefix: z
    .string()
    .regex(
      /^(\/[^/]+)+$/,
      "prefix must be an absolute slash-separated path without a trailing slash"
    ),
  readTimeoutMs: z.number().int().positive().default(DEFAULT_READ_TIMEOUT_MS),
});

/**
 * 单次注册：text 为 null 表示节点被删除
 */
interface Registration {
  path: string;
  active: boolean;
  deliver(text: string | null): void;
}

type Decoded<T> =
  | { ok: true; value: T }
  | { ok: false; error: PropertyDecodeError };

class RegistrationSubscription implements SourceSubscription {
  constructor(
    private readonly registration: Registration,
    private readonly release: (registration: Registration) => void
  ) {}

  get closed(): boolean {
    return !this.registration.active;
  }

  close(): void {
    this.release(this.registration);
  }
}

/**
 * 基于可监听存储的属性源
 *
 * 负责：
 * - 通过前缀 watch 维护子树的本地镜像（绝对路径 -> 原始内容）
 * - 把存储事件按路径分发给订阅者，单个订阅者的异常只记录日志
 * - 乐观重试的写入：upsertProperty / putIfAbsent
 * - 绕过镜像、直接访问存储的批量读取（带超时）
 *
 * @example
 * ```typescript
 * const source = new StorePropertySource(new EtcdPropertyStore(client), {
 *   prefix: "/config/order-service",
 * });
 * await source.start();
 *
 * const poolSize = new SourcedProperty(source, "pool.size", z.number(), DefaultValue.of(10));
 * ```
 */
export class StorePropertySource implements DynamicPropertySource {
  private readonly prefix: string;
  private readonly readTimeoutMs: number;
  private readonly marshaller: PropertyMarshaller;
  private readonly logger: PropertyLogger;
  private readonly ownsStore: boolean;

  private state: PropertySourceState = PropertySourceState.LATENT;
  private watch: StoreWatch | null = null;
  private pendingEvents: StoreEvent[] = [];
  private mirror: Map<string, Buffer> = new Map();
  private listeners: Map<string, Set<Registration>> = new Map();

  constructor(
    private readonly store: PropertyStore,
    options: PropertySourceOptions
  ) {
    const config = PropertySourceOptionsSchema.parse({
      prefix: options.prefix,
      readTimeoutMs: options.readTimeoutMs,
    });
    this.prefix = config.prefix;
    this.readTimeoutMs = config.readTimeoutMs;
    this.marshaller = options.marshaller || new EjsonPropertyMarshaller();
    this.logger = options.logger || defaultLogger;
    this.ownsStore = options.ownsStore ?? false;
  }

  get currentState(): PropertySourceState {
    return this.state;
  }

  /**
   * 开始监听并用快照填充本地镜像
   *
   * 快照应用之前到达的事件会被暂存，在快照之后按顺序重放。
   * 只能调用一次，启动过程中的第二次调用会被拒绝
   */
  async start(): Promise<void> {
    this.assertState(PropertySourceState.LATENT, "start");
    this.state = PropertySourceState.STARTING;

    let watch: StoreWatch;
    try {
      watch = await this.store.watchPrefix(`${this.prefix}/`, (event) =>
        this.onStoreEvent(event)
      );
    } catch (error) {
      if (!this.isClosed()) {
        this.state = PropertySourceState.LATENT;
        this.pendingEvents = [];
      }
      throw error;
    }
    if (this.isClosed()) {
      await watch.cancel();
      return;
    }

    this.watch = watch;
    for (const [path, value] of watch.initial) {
      this.mirror.set(path, value);
    }
    this.state = PropertySourceState.STARTED;

    const pending = this.pendingEvents;
    this.pendingEvents = [];
    for (const event of pending) {
      this.applyEvent(event);
    }

    this.logger.info(
      `StorePropertySource: Watching ${this.prefix} (${this.mirror.size} properties loaded)`
    );
  }

  subscribeAndCallListener<T>(
    key: string,
    type: PropertyType<T>,
    defaultValue: OptionalDefaultValue<T>,
    listener: (value: T) => void
  ): SourceSubscription {
    this.assertState(PropertySourceState.STARTED, `subscribe to '${key}'`);
    const path = joinPath(this.prefix, key);

    let initial: { value: T } | undefined;
    const current = this.mirror.get(path);
    if (current) {
      const decoded = this.decode(path, current.toString("utf8"), type);
      if (decoded.ok) {
        initial = { value: decoded.value };
      } else if (defaultValue.present) {
        this.logger.error(
          `Property ${path} holds an undecodable value, using the default`,
          decoded.error
        );
      } else {
        throw decoded.error;
      }
    }
    if (!initial && defaultValue.present) {
      initial = { value: defaultValue.value };
    }
    if (!initial) {
      throw new MissingDefaultValueError(path);
    }

    const registration: Registration = {
      path,
      active: true,
      deliver: (text) => {
        if (text === null) {
          if (defaultValue.present) {
            listener(defaultValue.value);
          } else {
            this.logger.warn(
              `Property ${path} was removed and has no default value, keeping the last value`
            );
          }
          return;
        }

        const decoded = this.decode(path, text, type);
        if (!decoded.ok) {
          this.logger.error(
            `Property ${path} update ignored, keeping the last value`,
            decoded.error
          );
          return;
        }
        listener(decoded.value);
      },
    };

    this.register(registration);
    try {
      listener(initial.value);
    } catch (error) {
      this.release(registration);
      throw error;
    }

    return new RegistrationSubscription(registration, (r) => this.release(r));
  }

  /**
   * 写入属性
   *
   * 内容相同时不产生写入；节点不存在时尝试创建，
   * 创建冲突（其他写入方刚刚创建了节点）会从读取步骤重试，最多 10 次
   */
  async upsertProperty(key: string, value: unknown): Promise<void> {
    this.assertNotClosed(`upsert '${key}'`);
    const path = joinPath(this.prefix, key);
    const text = this.marshaller.marshall(value);
    const data = Buffer.from(text, "utf8");

    for (let attempt = 1; attempt <= UPSERT_PROPERTY_RETRY_COUNT; attempt++) {
      const current = await this.store.read(path);
      if (current) {
        if (!current.equals(data)) {
          await this.store.write(path, data);
        }
        return;
      }

      if (await this.store.create(path, data)) {
        return;
      }
      this.logger.debug(
        `upserting property '${path}'='${text}', iteration ${attempt}`
      );
    }

    throw new PropertyWriteConflictError(path, UPSERT_PROPERTY_RETRY_COUNT);
  }

  async putIfAbsent(key: string, value: unknown): Promise<void> {
    this.assertNotClosed(`put '${key}'`);
    const path = joinPath(this.prefix, key);
    const data = Buffer.from(this.marshaller.marshall(value), "utf8");

    const created = await this.store.create(path, data);
    if (!created) {
      this.logger.debug(`Property ${path} already exists, nothing to do`);
    }
  }

  /**
   * 无条件覆盖属性
   */
  async updateProperty(key: string, value: unknown): Promise<void> {
    this.assertNotClosed(`update '${key}'`);
    const data = Buffer.from(this.marshaller.marshall(value), "utf8");
    await this.store.write(joinPath(this.prefix, key), data);
  }

  getProperty(key: string): string | undefined;
  getProperty<T>(key: string, type: PropertyType<T>): T | undefined;
  getProperty<T>(key: string, type: PropertyType<T>, defaultValue: T): T;
  getProperty<T>(
    key: string,
    type?: PropertyType<T>,
    defaultValue?: T
  ): string | T | undefined {
    this.assertState(PropertySourceState.STARTED, `read '${key}'`);
    const path = joinPath(this.prefix, key);
    const current = this.mirror.get(path);
    if (!current) {
      return defaultValue;
    }

    const text = current.toString("utf8");
    if (!type) {
      return text;
    }

    const decoded = this.decode(path, text, type);
    if (!decoded.ok) {
      this.logger.error(`Failed to read property ${path}`, decoded.error);
      return defaultValue;
    }
    return decoded.value;
  }

  /**
   * 直接从存储读取根路径下的一级属性（键为属性名）
   */
  async readAllProperties(): Promise<Record<string, string>> {
    const base = `${this.prefix}/`;
    const entries = await this.readDirect(base);

    const result: Record<string, string> = {};
    for (const [path, value] of entries) {
      const name = path.slice(base.length);
      if (name && !name.includes("/")) {
        result[name] = value.toString("utf8");
      }
    }
    return result;
  }

  /**
   * 直接从存储读取 root 下的全部属性（键为相对根路径的路径，如 "db/pool.size"）
   */
  async readAllSubtreeProperties(root = ""): Promise<Record<string, string>> {
    const base = `${joinPath(this.prefix, root)}/`;
    const entries = await this.readDirect(base);

    const result: Record<string, string> = {};
    for (const [path, value] of entries) {
      result[path.slice(this.prefix.length + 1)] = value.toString("utf8");
    }
    return result;
  }

  /**
   * 上传初始属性：只写入存储中尚不存在的键，返回写入后的一级属性
   */
  async uploadInitialProperties(
    initial: Record<string, string>
  ): Promise<Record<string, string>> {
    for (const [key, value] of Object.entries(initial)) {
      await this.putIfAbsent(key, value);
    }
    return this.readAllProperties();
  }

  async close(): Promise<void> {
    if (this.state === PropertySourceState.CLOSED) {
      return;
    }
    this.state = PropertySourceState.CLOSED;

    for (const registrations of this.listeners.values()) {
      for (const registration of registrations) {
        registration.active = false;
      }
    }
    this.listeners.clear();
    this.pendingEvents = [];

    if (this.watch) {
      await this.watch.cancel();
      this.watch = null;
    }
    if (this.ownsStore) {
      await this.store.close();
    }

    this.logger.info(`StorePropertySource: Stopped watching ${this.prefix}`);
  }

  private onStoreEvent(event: StoreEvent): void {
    switch (this.state) {
      case PropertySourceState.LATENT:
      case PropertySourceState.STARTING:
        this.pendingEvents.push(event);
        return;
      case PropertySourceState.CLOSED:
        return;
      default:
        this.applyEvent(event);
    }
  }

  private applyEvent(event: StoreEvent): void {
    switch (event.type) {
      case StoreEventType.NODE_ADDED:
      case StoreEventType.NODE_UPDATED: {
        this.mirror.set(event.path, event.value);
        const text = event.value.toString("utf8");
        this.logger.debug(
          `Event type ${event.type} for node '${event.path}'. New value is '${text}'`
        );
        this.fire(event.path, text);
        break;
      }
      case StoreEventType.NODE_REMOVED:
        this.mirror.delete(event.path);
        this.logger.debug(`Event type ${event.type} for node '${event.path}'`);
        this.fire(event.path, null);
        break;
    }
  }

  private fire(path: string, text: string | null): void {
    const registrations = this.listeners.get(path);
    if (!registrations) {
      return;
    }

    for (const registration of [...registrations]) {
      if (!registration.active) {
        continue;
      }
      try {
        registration.deliver(text);
      } catch (error) {
        this.logger.error(`Failed to update property ${path}`, error);
      }
    }
  }

  private decode<T>(
    path: string,
    text: string,
    type: PropertyType<T>
  ): Decoded<T> {
    try {
      return { ok: true, value: this.marshaller.unmarshall(text, type) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : describeValue(error);
      return { ok: false, error: new PropertyDecodeError(path, reason) };
    }
  }

  private register(registration: Registration): void {
    let registrations = this.listeners.get(registration.path);
    if (!registrations) {
      registrations = new Set();
      this.listeners.set(registration.path, registrations);
    }
    registrations.add(registration);
  }

  private release(registration: Registration): void {
    if (!registration.active) {
      return;
    }
    registration.active = false;

    const registrations = this.listeners.get(registration.path);
    if (registrations) {
      registrations.delete(registration);
      if (registrations.size === 0) {
        this.listeners.delete(registration.path);
      }
    }
  }

  private async readDirect(prefix: string): Promise<Map<string, Buffer>> {
    this.assertNotClosed(`read '${prefix}'`);
    return withTimeout(
      this.store.readPrefix(prefix),
      this.readTimeoutMs,
      () => new PropertyReadTimeoutError(prefix, this.readTimeoutMs)
    );
  }

  private assertState(expected: PropertySourceState, operation: string) {
    if (this.state !== expected) {
      throw new PropertySourceStateError(this.state, operation);
    }
  }

  private isClosed(): boolean {
    return this.state === PropertySourceState.CLOSED;
  }

  private assertNotClosed(operation: string) {
    if (this.isClosed()) {
      throw new PropertySourceStateError(this.state, operation);
    }
  }
}
