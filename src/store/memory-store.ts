import type { PropertyStore, StoreEvent, StoreWatch } from "./types";
import { StoreEventType } from "./types";

interface MemoryWatcher {
  prefix: string;
  listener: (event: StoreEvent) => void;
  active: boolean;
}

/**
 * 内存属性存储实现
 *
 * 用于测试和本地开发环境，不依赖 etcd。
 * 与真实 watch 一样，事件在写入完成后异步投递，并保持写入顺序；
 * 数据存储在内存中，进程重启后会丢失
 */
export class MemoryPropertyStore implements PropertyStore {
  private entries: Map<string, Buffer> = new Map();
  private watchers: Set<MemoryWatcher> = new Set();
  private mutations = 0;

  /**
   * 已产生的变更事件数量
   */
  get mutationCount(): number {
    return this.mutations;
  }

  async read(path: string): Promise<Buffer | null> {
    const value = this.entries.get(path);
    return value ? Buffer.from(value) : null;
  }

  async readPrefix(prefix: string): Promise<Map<string, Buffer>> {
    const result = new Map<string, Buffer>();
    for (const [path, value] of this.entries.entries()) {
      if (path.startsWith(prefix)) {
        result.set(path, Buffer.from(value));
      }
    }
    return result;
  }

  async create(path: string, value: Buffer): Promise<boolean> {
    if (this.entries.has(path)) {
      return false;
    }
    this.entries.set(path, Buffer.from(value));
    this.emit({ type: StoreEventType.NODE_ADDED, path, value: Buffer.from(value) });
    return true;
  }

  async write(path: string, value: Buffer): Promise<void> {
    const type = this.entries.has(path)
      ? StoreEventType.NODE_UPDATED
      : StoreEventType.NODE_ADDED;
    this.entries.set(path, Buffer.from(value));
    this.emit({ type, path, value: Buffer.from(value) });
  }

  async remove(path: string): Promise<void> {
    if (!this.entries.delete(path)) {
      return;
    }
    this.emit({ type: StoreEventType.NODE_REMOVED, path });
  }

  async watchPrefix(
    prefix: string,
    listener: (event: StoreEvent) => void
  ): Promise<StoreWatch> {
    const watcher: MemoryWatcher = { prefix, listener, active: true };
    this.watchers.add(watcher);

    return {
      initial: await this.readPrefix(prefix),
      cancel: async () => {
        watcher.active = false;
        this.watchers.delete(watcher);
      },
    };
  }

  async close(): Promise<void> {
    for (const watcher of this.watchers) {
      watcher.active = false;
    }
    this.watchers.clear();
  }

  private emit(event: StoreEvent): void {
    this.mutations++;
    for (const watcher of this.watchers) {
      if (!event.path.startsWith(watcher.prefix)) {
        continue;
      }
      // 模拟 watch 的异步投递
      setTimeout(() => {
        if (watcher.active) {
          watcher.listener(event);
        }
      }, 0);
    }
  }
}
