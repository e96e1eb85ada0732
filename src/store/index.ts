export { EtcdPropertyStore } from "./etcd-store";
export { MemoryPropertyStore } from "./memory-store";
export { StoreEventType } from "./types";

export type { PropertyStore, StoreEvent, StoreWatch } from "./types";
