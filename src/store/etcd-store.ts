import { Etcd3, type IKeyValue } from "etcd3";

import defaultLogger, { type PropertyLogger } from "../core/logger";
import type { PropertyStore, StoreEvent, StoreWatch } from "./types";
import { StoreEventType } from "./types";

/**
 * Etcd 属性存储实现
 *
 * - create 通过事务实现：仅当 key 的 create revision 为 0（不存在）时写入
 * - watchPrefix 先读取快照，再从快照 revision + 1 开始监听，保证事件不丢失
 * - version 为 "1" 的 put 视为新建节点
 */
export class EtcdPropertyStore implements PropertyStore {
  private readonly logger: PropertyLogger;

  constructor(
    private readonly client: Etcd3,
    options?: { logger?: PropertyLogger }
  ) {
    this.logger = options?.logger || defaultLogger;
  }

  async read(path: string): Promise<Buffer | null> {
    return this.client.get(path).buffer();
  }

  async readPrefix(prefix: string): Promise<Map<string, Buffer>> {
    const response = await this.client.getAll().prefix(prefix).buffers();
    return new Map(Object.entries(response));
  }

  async create(path: string, value: Buffer): Promise<boolean> {
    const result = await this.client
      .if(path, "Create", "==", 0)
      .then(this.client.put(path).value(value))
      .commit();
    return result.succeeded;
  }

  async write(path: string, value: Buffer): Promise<void> {
    await this.client.put(path).value(value).exec();
  }

  async remove(path: string): Promise<void> {
    await this.client.delete().key(path).exec();
  }

  async watchPrefix(
    prefix: string,
    listener: (event: StoreEvent) => void
  ): Promise<StoreWatch> {
    const snapshot = await this.client.getAll().prefix(prefix).exec();
    const initial = new Map<string, Buffer>();
    for (const kv of snapshot.kvs) {
      initial.set(kv.key.toString(), kv.value);
    }

    const startRevision = (BigInt(snapshot.header.revision) + 1n).toString();
    const watcher = await this.client
      .watch()
      .prefix(prefix)
      .startRevision(startRevision)
      .create();

    watcher.on("put", (kv: IKeyValue) => {
      listener({
        type:
          kv.version === "1"
            ? StoreEventType.NODE_ADDED
            : StoreEventType.NODE_UPDATED,
        path: kv.key.toString(),
        value: kv.value,
      });
    });
    watcher.on("delete", (kv: IKeyValue) => {
      listener({ type: StoreEventType.NODE_REMOVED, path: kv.key.toString() });
    });
    watcher.on("error", (error: Error) => {
      this.logger.error(`Etcd watch error for prefix: ${prefix}`, error);
    });

    return {
      initial,
      cancel: () => watcher.cancel(),
    };
  }

  async close(): Promise<void> {
    this.client.close();
  }
}
