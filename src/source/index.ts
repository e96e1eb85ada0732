/**
 * Source 模块
 *
 * 把动态属性绑定到远端可监听的键值存储：
 * - StorePropertySource：维护子树镜像、按 key 分发变更、乐观重试写入
 * - SourcedProperty：绑定单个 key 的属性，带默认值回退
 * - createPropertySource：按配置选择 etcd 或内存存储并启动属性源
 */

export { StorePropertySource } from "./property-source";
export { SourcedProperty } from "./sourced-property";
export { DefaultValue } from "./default-value";
export { EjsonPropertyMarshaller } from "./marshaller";
export { createPropertySource, loadPropertySourceConfig } from "./config";
export { PropertySourceState } from "./types";

export type { SourcedPropertyState } from "./sourced-property";
export type { OptionalDefaultValue } from "./default-value";
export type { PropertyMarshaller, PropertyType } from "./marshaller";
export type { PropertySourceFactoryOptions } from "./config";
export type {
  DynamicPropertySource,
  PropertySourceOptions,
  SourceSubscription,
} from "./types";
