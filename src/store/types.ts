/**
 * 存储事件类型
 */
export enum StoreEventType {
  /**
   * 节点被创建
   */
  NODE_ADDED = "NODE_ADDED",

  /**
   * 节点内容被修改
   */
  NODE_UPDATED = "NODE_UPDATED",

  /**
   * 节点被删除
   */
  NODE_REMOVED = "NODE_REMOVED",
}

export type StoreEvent =
  | {
      type: StoreEventType.NODE_ADDED | StoreEventType.NODE_UPDATED;
      path: string;
      value: Buffer;
    }
  | {
      type: StoreEventType.NODE_REMOVED;
      path: string;
    };

/**
 * 前缀监听句柄
 *
 * initial 是开始监听那一刻的快照，之后的事件紧接着该快照，不会遗漏
 */
export interface StoreWatch {
  initial: Map<string, Buffer>;
  cancel(): Promise<void>;
}

/**
 * 属性存储接口
 *
 * 对远端分层键值存储的最小抽象，键为绝对路径（如 /config/app/pool.size），
 * 值为原始字节。支持 etcd 和内存两种实现
 */
export interface PropertyStore {
  /**
   * 读取单个节点，不存在时返回 null
   */
  read(path: string): Promise<Buffer | null>;

  /**
   * 读取前缀下的全部节点（绝对路径 -> 内容）
   */
  readPrefix(prefix: string): Promise<Map<string, Buffer>>;

  /**
   * 仅在节点不存在时创建
   *
   * @returns 节点已存在（被其他写入方抢先创建）时返回 false
   */
  create(path: string, value: Buffer): Promise<boolean>;

  /**
   * 无条件写入（不存在则创建）
   */
  write(path: string, value: Buffer): Promise<void>;

  remove(path: string): Promise<void>;

  /**
   * 监听前缀下的变化，事件按存储产生的顺序投递
   */
  watchPrefix(
    prefix: string,
    listener: (event: StoreEvent) => void
  ): Promise<StoreWatch>;

  close(): Promise<void>;
}
