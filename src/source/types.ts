import type { PropertyLogger } from "../core/logger";
import type { OptionalDefaultValue } from "./default-value";
import type { PropertyMarshaller, PropertyType } from "./marshaller";

/**
 * 属性源订阅句柄
 */
export interface SourceSubscription {
  readonly closed: boolean;
  close(): void;
}

/**
 * 属性源接口
 *
 * SourcedProperty 与注入器只依赖这一接口，测试中可以替换为任意实现
 */
export interface DynamicPropertySource {
  /**
   * 订阅属性并在返回前同步回调一次（存储中的值或默认值），
   * 之后每次变化异步回调
   *
   * @throws MissingDefaultValueError 存储中没有值且没有默认值
   */
  subscribeAndCallListener<T>(
    key: string,
    type: PropertyType<T>,
    defaultValue: OptionalDefaultValue<T>,
    listener: (value: T) => void
  ): SourceSubscription;

  /**
   * 写入属性：内容相同则不写，存在则覆盖，不存在则创建
   */
  upsertProperty(key: string, value: unknown): Promise<void>;

  /**
   * 仅在属性不存在时创建，并发创建冲突视为成功
   */
  putIfAbsent(key: string, value: unknown): Promise<void>;

  getProperty(key: string): string | undefined;
  getProperty<T>(key: string, type: PropertyType<T>): T | undefined;
  getProperty<T>(key: string, type: PropertyType<T>, defaultValue: T): T;

  /**
   * 直接从存储读取前缀下的一级属性（不经过本地镜像）
   */
  readAllProperties(): Promise<Record<string, string>>;

  close(): Promise<void>;
}

/**
 * StorePropertySource 配置选项
 */
export interface PropertySourceOptions {
  /**
   * 属性根路径，如 "/config/order-service"
   */
  prefix: string;

  /**
   * 批量读取的超时时间（毫秒）
   * @default 120000
   */
  readTimeoutMs?: number;

  /**
   * 值转换器
   * @default EjsonPropertyMarshaller
   */
  marshaller?: PropertyMarshaller;

  logger?: PropertyLogger;

  /**
   * close 时是否同时关闭存储
   * @default false
   */
  ownsStore?: boolean;
}

/**
 * 属性源生命周期
 */
export enum PropertySourceState {
  LATENT = "LATENT",
  /**
   * start() 已调用，快照尚未应用
   */
  STARTING = "STARTING",
  STARTED = "STARTED",
  CLOSED = "CLOSED",
}
