import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  MissingDefaultValueError,
  PropertyDecodeError,
  PropertyReadTimeoutError,
  PropertySourceStateError,
  PropertyWriteConflictError,
} from "../core/errors";
import { Testing } from "../core/testing";
import { MemoryPropertyStore } from "../store/memory-store";
import { StoreEventType } from "../store/types";
import { DefaultValue } from "./default-value";
import { StorePropertySource } from "./property-source";
import { PropertySourceState } from "./types";

function createMockLogger() {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

describe("StorePropertySource", () => {
  describe("生命周期", () => {
    it("启动时应该加载已有属性", async () => {
      const store = new MemoryPropertyStore();
      await store.write("/test/config/pool.size", Buffer.from("10"));
      const source = new StorePropertySource(store, { prefix: "/test/config" });

      expect(source.currentState).toBe(PropertySourceState.LATENT);
      await source.start();

      expect(source.currentState).toBe(PropertySourceState.STARTED);
      expect(source.getProperty("pool.size")).toBe("10");
      expect(source.getProperty("pool.size", z.number())).toBe(10);
      await source.close();
    });

    it("启动前到达的事件应该在快照之后重放", async () => {
      const store = new MemoryPropertyStore();
      const watchPrefix = store.watchPrefix.bind(store);
      vi.spyOn(store, "watchPrefix").mockImplementation(
        async (prefix, listener) => {
          const watch = await watchPrefix(prefix, listener);
          listener({
            type: StoreEventType.NODE_ADDED,
            path: "/test/config/late",
            value: Buffer.from("arrived"),
          });
          return watch;
        }
      );
      const source = new StorePropertySource(store, { prefix: "/test/config" });

      await source.start();

      expect(source.getProperty("late")).toBe("arrived");
      await source.close();
    });

    it("非法的根路径应该在构造时被拒绝", () => {
      const store = new MemoryPropertyStore();
      expect(() => new StorePropertySource(store, { prefix: "config" })).toThrow();
      expect(() => new StorePropertySource(store, { prefix: "/config/" })).toThrow();
    });

    it("未启动时订阅应该抛出异常", () => {
      const source = new StorePropertySource(new MemoryPropertyStore(), {
        prefix: "/test/config",
      });

      expect(() =>
        source.subscribeAndCallListener("k", z.string(), DefaultValue.of("d"), () => {})
      ).toThrow(PropertySourceStateError);
    });

    it("重复启动应该抛出异常", async () => {
      const { source } = await Testing.createTestSource();

      await expect(source.start()).rejects.toThrow(
        "Property source is STARTED, cannot start"
      );
      await source.close();
    });

    it("并发启动时只有第一次生效，每次变化只投递一次", async () => {
      const store = new MemoryPropertyStore();
      const source = new StorePropertySource(store, { prefix: "/test/config" });

      const results = await Promise.allSettled([source.start(), source.start()]);

      expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
      const listener = vi.fn();
      source.subscribeAndCallListener("k", z.string(), DefaultValue.of("a"), listener);
      await store.write("/test/config/k", Buffer.from("b"));
      await Testing.waitFor(() => listener.mock.calls.length === 2);
      await Testing.wait(20);

      expect(listener).toHaveBeenCalledTimes(2);
      expect(listener).toHaveBeenLastCalledWith("b");
      await source.close();
    });

    it("启动中的第二次调用应该被拒绝", async () => {
      const pending = new StorePropertySource(new MemoryPropertyStore(), {
        prefix: "/test/config",
      });

      const first = pending.start();
      expect(pending.currentState).toBe(PropertySourceState.STARTING);
      await expect(pending.start()).rejects.toThrow(
        "Property source is STARTING, cannot start"
      );

      await first;
      expect(pending.currentState).toBe(PropertySourceState.STARTED);
      await pending.close();
    });

    it("监听失败后应该回到 LATENT 并允许重新启动", async () => {
      const store = new MemoryPropertyStore();
      vi.spyOn(store, "watchPrefix").mockRejectedValueOnce(new Error("etcd unavailable"));
      const source = new StorePropertySource(store, { prefix: "/test/config" });

      await expect(source.start()).rejects.toThrow("etcd unavailable");
      expect(source.currentState).toBe(PropertySourceState.LATENT);

      await source.start();
      expect(source.currentState).toBe(PropertySourceState.STARTED);
      await source.close();
    });

    it("close 应该是幂等的，之后的写入被拒绝", async () => {
      const { source } = await Testing.createTestSource();

      await source.close();
      await source.close();

      expect(source.currentState).toBe(PropertySourceState.CLOSED);
      await expect(source.upsertProperty("k", "v")).rejects.toThrow(
        PropertySourceStateError
      );
    });

    it("ownsStore 为 true 时 close 应该同时关闭存储", async () => {
      const store = new MemoryPropertyStore();
      const closeStore = vi.spyOn(store, "close");
      const source = new StorePropertySource(store, {
        prefix: "/test/config",
        ownsStore: true,
      });
      await source.start();

      await source.close();

      expect(closeStore).toHaveBeenCalledTimes(1);
    });

    it("默认不应该关闭存储", async () => {
      const { store, source } = await Testing.createTestSource();
      const closeStore = vi.spyOn(store, "close");

      await source.close();

      expect(closeStore).not.toHaveBeenCalled();
    });
  });

  describe("subscribeAndCallListener", () => {
    it("应该在返回前同步回调存储中的值", async () => {
      const { source } = await Testing.createTestSource();
      await source.upsertProperty("pool.size", 159);
      await Testing.waitFor(() => source.getProperty("pool.size") === "159");

      const values: number[] = [];
      source.subscribeAndCallListener(
        "pool.size",
        z.number(),
        DefaultValue.of(1),
        (value) => values.push(value)
      );

      expect(values).toEqual([159]);
      await source.close();
    });

    it("存储中没有值时应该回调默认值", async () => {
      const { source } = await Testing.createTestSource();
      const listener = vi.fn();

      source.subscribeAndCallListener("missing", z.string(), DefaultValue.of("zzz"), listener);

      expect(listener).toHaveBeenCalledWith("zzz");
      await source.close();
    });

    it("没有值也没有默认值时应该抛出 MissingDefaultValueError", async () => {
      const { source } = await Testing.createTestSource();

      expect(() =>
        source.subscribeAndCallListener("missing", z.string(), DefaultValue.none(), () => {})
      ).toThrow(MissingDefaultValueError);
      await source.close();
    });

    it("之后的变化应该异步回调", async () => {
      const { source } = await Testing.createTestSource();
      const values: string[] = [];
      source.subscribeAndCallListener("name", z.string(), DefaultValue.of("zzz"), (value) =>
        values.push(value)
      );

      await source.upsertProperty("name", "some Value");
      expect(values).toEqual(["zzz"]);

      await Testing.waitFor(() => values.length === 2);
      expect(values).toEqual(["zzz", "some Value"]);
      await source.close();
    });

    it("属性被删除时应该回调默认值", async () => {
      const { store, source } = await Testing.createTestSource();
      const values: string[] = [];
      source.subscribeAndCallListener("name", z.string(), DefaultValue.of("zzz"), (value) =>
        values.push(value)
      );
      await source.upsertProperty("name", "some Value");
      await Testing.waitFor(() => values.length === 2);

      await store.remove("/test/config/name");
      await Testing.waitFor(() => values.length === 3);

      expect(values).toEqual(["zzz", "some Value", "zzz"]);
      await source.close();
    });

    it("没有默认值的属性被删除时应该记录警告并保留最后的值", async () => {
      const logger = createMockLogger();
      const { store, source } = await Testing.createTestSource({ logger });
      await source.upsertProperty("name", "v1");
      await Testing.waitFor(() => source.getProperty("name") === "v1");
      const listener = vi.fn();
      source.subscribeAndCallListener("name", z.string(), DefaultValue.none(), listener);

      await store.remove("/test/config/name");
      await Testing.waitFor(() => logger.warn.mock.calls.length === 1);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "Property /test/config/name was removed and has no default value, keeping the last value"
      );
      await source.close();
    });

    it("存储中的值无法解码时应该使用默认值并记录错误", async () => {
      const logger = createMockLogger();
      const { source } = await Testing.createTestSource({ logger });
      await source.upsertProperty("port", "not-a-number");
      await Testing.waitFor(() => source.getProperty("port") === "not-a-number");
      const listener = vi.fn();

      source.subscribeAndCallListener("port", z.number(), DefaultValue.of(8080), listener);

      expect(listener).toHaveBeenCalledWith(8080);
      expect(logger.error.mock.calls[0][1]).toBeInstanceOf(PropertyDecodeError);
      await source.close();
    });

    it("无法解码且没有默认值时应该抛出 PropertyDecodeError", async () => {
      const { source } = await Testing.createTestSource();
      await source.upsertProperty("port", "not-a-number");
      await Testing.waitFor(() => source.getProperty("port") === "not-a-number");

      expect(() =>
        source.subscribeAndCallListener("port", z.number(), DefaultValue.none(), () => {})
      ).toThrow(PropertyDecodeError);
      await source.close();
    });

    it("无法解码的更新应该被忽略", async () => {
      const logger = createMockLogger();
      const { source } = await Testing.createTestSource({ logger });
      const values: number[] = [];
      source.subscribeAndCallListener("port", z.number(), DefaultValue.of(8080), (value) =>
        values.push(value)
      );

      await source.upsertProperty("port", "oops");
      await source.upsertProperty("port", 9090);
      await Testing.waitFor(() => values.length === 2);

      expect(values).toEqual([8080, 9090]);
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error.mock.calls[0][0]).toBe(
        "Property /test/config/port update ignored, keeping the last value"
      );
      await source.close();
    });

    it("单个订阅者抛出异常不应该影响其他订阅者", async () => {
      const logger = createMockLogger();
      const { source } = await Testing.createTestSource({ logger });
      let calls = 0;
      source.subscribeAndCallListener("k", z.string(), DefaultValue.of("a"), () => {
        calls++;
        if (calls > 1) {
          throw new Error("boom");
        }
      });
      const other = vi.fn();
      source.subscribeAndCallListener("k", z.string(), DefaultValue.of("a"), other);

      await source.upsertProperty("k", "b");
      await Testing.waitFor(() => other.mock.calls.length === 2);

      expect(other).toHaveBeenLastCalledWith("b");
      expect(logger.error).toHaveBeenCalledWith(
        "Failed to update property /test/config/k",
        expect.any(Error)
      );
      await source.close();
    });

    it("首次回调抛出异常时应该取消注册并抛出", async () => {
      const { source } = await Testing.createTestSource();
      const listener = vi.fn(() => {
        throw new Error("initial failure");
      });

      expect(() =>
        source.subscribeAndCallListener("k", z.string(), DefaultValue.of("a"), listener)
      ).toThrow("initial failure");

      await source.upsertProperty("k", "b");
      await Testing.wait(20);
      expect(listener).toHaveBeenCalledTimes(1);
      await source.close();
    });

    it("关闭订阅后不应该再收到回调", async () => {
      const { source } = await Testing.createTestSource();
      const listener = vi.fn();
      const subscription = source.subscribeAndCallListener(
        "k",
        z.string(),
        DefaultValue.of("a"),
        listener
      );

      subscription.close();
      subscription.close();
      await source.upsertProperty("k", "b");
      await Testing.wait(20);

      expect(subscription.closed).toBe(true);
      expect(listener).toHaveBeenCalledTimes(1);
      await source.close();
    });
  });

  describe("upsertProperty", () => {
    it("内容相同时不应该产生写入", async () => {
      const { store, source } = await Testing.createTestSource();

      await source.upsertProperty("k", "value");
      await source.upsertProperty("k", "value");

      expect(store.mutationCount).toBe(1);
      await source.close();
    });

    it("内容不同时应该覆盖", async () => {
      const { store, source } = await Testing.createTestSource();

      await source.upsertProperty("k", 1);
      await source.upsertProperty("k", 2);

      expect(store.mutationCount).toBe(2);
      expect((await store.read("/test/config/k"))?.toString()).toBe("2");
      await source.close();
    });

    it("创建冲突时应该重试", async () => {
      const logger = createMockLogger();
      const { store, source } = await Testing.createTestSource({ logger });
      const create = vi.spyOn(store, "create").mockResolvedValueOnce(false);

      await source.upsertProperty("k", "v");

      expect(create).toHaveBeenCalledTimes(2);
      expect(logger.debug).toHaveBeenCalledWith(
        "upserting property '/test/config/k'='v', iteration 1"
      );
      expect((await store.read("/test/config/k"))?.toString()).toBe("v");
      await source.close();
    });

    it("重试 10 次仍冲突时应该抛出 PropertyWriteConflictError", async () => {
      const { store, source } = await Testing.createTestSource();
      const create = vi.spyOn(store, "create").mockResolvedValue(false);

      await expect(source.upsertProperty("k", "v")).rejects.toThrow(
        PropertyWriteConflictError
      );
      expect(create).toHaveBeenCalledTimes(10);
      await source.close();
    });
  });

  describe("putIfAbsent", () => {
    it("属性不存在时应该创建", async () => {
      const { store, source } = await Testing.createTestSource();

      await source.putIfAbsent("k", 5);

      expect((await store.read("/test/config/k"))?.toString()).toBe("5");
      await source.close();
    });

    it("属性已存在时不应该覆盖，也不应该报错", async () => {
      const { store, source } = await Testing.createTestSource();
      await source.upsertProperty("k", "existing");

      await expect(source.putIfAbsent("k", "new")).resolves.toBeUndefined();

      expect((await store.read("/test/config/k"))?.toString()).toBe("existing");
      expect(store.mutationCount).toBe(1);
      await source.close();
    });
  });

  describe("getProperty", () => {
    it("不存在时应该返回默认值", async () => {
      const { source } = await Testing.createTestSource();

      expect(source.getProperty("missing")).toBeUndefined();
      expect(source.getProperty("missing", z.number())).toBeUndefined();
      expect(source.getProperty("missing", z.number(), 5)).toBe(5);
      await source.close();
    });

    it("无法解码时应该返回默认值", async () => {
      const logger = createMockLogger();
      const { source } = await Testing.createTestSource({ logger });
      await source.upsertProperty("n", "abc");
      await Testing.waitFor(() => source.getProperty("n") === "abc");

      expect(source.getProperty("n", z.number(), 7)).toBe(7);
      expect(logger.error).toHaveBeenCalledTimes(1);
      await source.close();
    });
  });

  describe("批量读取", () => {
    it("readAllProperties 应该只返回一级属性", async () => {
      const { source } = await Testing.createTestSource();
      await source.upsertProperty("a", "1");
      await source.upsertProperty("b", "2");
      await source.upsertProperty("db/pool.size", "3");

      expect(await source.readAllProperties()).toEqual({ a: "1", b: "2" });
      await source.close();
    });

    it("readAllSubtreeProperties 应该返回相对根路径的全部属性", async () => {
      const { source } = await Testing.createTestSource();
      await source.upsertProperty("a", "1");
      await source.upsertProperty("db/pool.size", "3");
      await source.upsertProperty("db/replica/host", "h");

      expect(await source.readAllSubtreeProperties()).toEqual({
        a: "1",
        "db/pool.size": "3",
        "db/replica/host": "h",
      });
      expect(await source.readAllSubtreeProperties("db")).toEqual({
        "db/pool.size": "3",
        "db/replica/host": "h",
      });
      await source.close();
    });

    it("读取超时应该抛出 PropertyReadTimeoutError", async () => {
      const { store, source } = await Testing.createTestSource({
        readTimeoutMs: 20,
      });
      vi.spyOn(store, "readPrefix").mockReturnValue(new Promise<Map<string, Buffer>>(() => {}));

      await expect(source.readAllProperties()).rejects.toThrow(
        PropertyReadTimeoutError
      );
      await source.close();
    });

    it("uploadInitialProperties 应该只写入缺失的属性", async () => {
      const { source } = await Testing.createTestSource();
      await source.upsertProperty("a", "existing");

      const result = await source.uploadInitialProperties({ a: "new", b: "2" });

      expect(result).toEqual({ a: "existing", b: "2" });
      await source.close();
    });
  });
});
