/**
 * Dynamic Property Engine - 动态属性框架
 */

// 异常
export * from "./core/errors";

// 属性：atomic / mapped / combined / constant / delegated
export * from "./property";

// 属性源与 SourcedProperty
export * from "./source";

// 存储：etcd 与内存实现
export * from "./store";

// @PropertyId 与注入器
export * from "./injection";

// 字段元数据工具
export { createFieldDecorator, FieldMetadataStore } from "./metadata/metadata";

// 测试辅助工具（仅在测试环境中使用）
export * from "./core/testing";

// 导出 zod（固定版本，用户可以直接从主包导入）
export { z } from "zod";

// 导出 logger
export { default as logger, createLogger, setTestHook } from "./core/logger";
export type { PropertyLogger } from "./core/logger";
