import { Etcd3 } from "etcd3";
import { z } from "zod";

import defaultLogger from "../core/logger";
import { EtcdPropertyStore } from "../store/etcd-store";
import { MemoryPropertyStore } from "../store/memory-store";
import type { PropertyStore } from "../store/types";
import { StorePropertySource } from "./property-source";
import type { PropertySourceOptions } from "./types";

/**
 * createPropertySource 的配置选项
 *
 * 存储选择顺序：useMemoryStore > etcdHosts > 内存存储（带警告）
 */
export interface PropertySourceFactoryOptions extends PropertySourceOptions {
  /**
   * etcd 节点地址，如 ["127.0.0.1:2379"]
   */
  etcdHosts?: string[];

  /**
   * 是否使用内存存储（用于测试和本地开发）
   * @default false
   */
  useMemoryStore?: boolean;
}

const EnvSchema = z.object({
  ETCD_HOSTS: z.string().optional(),
  DYNAMIC_PROPERTY_PREFIX: z.string().default("/config"),
  DYNAMIC_PROPERTY_READ_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DYNAMIC_PROPERTY_USE_MEMORY: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
});

/**
 * 从环境变量读取属性源配置
 *
 * - ETCD_HOSTS：逗号分隔的 etcd 地址
 * - DYNAMIC_PROPERTY_PREFIX：属性根路径，默认 "/config"
 * - DYNAMIC_PROPERTY_READ_TIMEOUT_MS：批量读取超时
 * - DYNAMIC_PROPERTY_USE_MEMORY：为 "true" 时使用内存存储
 */
export function loadPropertySourceConfig(
  env: NodeJS.ProcessEnv = process.env
): PropertySourceFactoryOptions {
  const parsed = EnvSchema.parse(env);

  const etcdHosts = parsed.ETCD_HOSTS?.split(",")
    .map((host) => host.trim())
    .filter((host) => host.length > 0);

  return {
    prefix: parsed.DYNAMIC_PROPERTY_PREFIX,
    readTimeoutMs: parsed.DYNAMIC_PROPERTY_READ_TIMEOUT_MS,
    etcdHosts: etcdHosts && etcdHosts.length > 0 ? etcdHosts : undefined,
    useMemoryStore: parsed.DYNAMIC_PROPERTY_USE_MEMORY,
  };
}

/**
 * 创建并启动属性源
 *
 * 由工厂创建的存储归属于返回的属性源，属性源 close 时一并关闭
 *
 * @example
 * ```typescript
 * const source = await createPropertySource(loadPropertySourceConfig());
 * ```
 */
export async function createPropertySource(
  options: PropertySourceFactoryOptions
): Promise<StorePropertySource> {
  const logger = options.logger || defaultLogger;

  let store: PropertyStore;
  if (options.useMemoryStore) {
    store = new MemoryPropertyStore();
    logger.info(
      "createPropertySource: Using MemoryPropertyStore for local development/testing"
    );
  } else if (options.etcdHosts && options.etcdHosts.length > 0) {
    store = new EtcdPropertyStore(new Etcd3({ hosts: options.etcdHosts }), {
      logger,
    });
    logger.info(
      `createPropertySource: Using EtcdPropertyStore (${options.etcdHosts.join(",")})`
    );
  } else {
    store = new MemoryPropertyStore();
    logger.warn(
      "createPropertySource: No etcd hosts provided, using MemoryPropertyStore"
    );
  }

  const source = new StorePropertySource(store, {
    prefix: options.prefix,
    readTimeoutMs: options.readTimeoutMs,
    marshaller: options.marshaller,
    logger,
    ownsStore: options.ownsStore ?? true,
  });
  await source.start();
  return source;
}
