/**
 * 核心异常类型定义
 */

/**
 * 远端内容无法按声明的类型解码
 */
export class PropertyDecodeError extends Error {
  constructor(key: string, reason: string) {
    super(`Failed to decode property '${key}': ${reason}`);
    this.name = "PropertyDecodeError";
  }
}

/**
 * 属性在存储中不存在，且没有提供默认值
 */
export class MissingDefaultValueError extends Error {
  constructor(key: string) {
    super(
      `Property '${key}' is absent in the source and no default value was provided`
    );
    this.name = "MissingDefaultValueError";
  }
}

export class DefaultValueNotFoundError extends Error {
  constructor(fieldName: string, ownerName: string) {
    super(
      `Illegal default property value '${fieldName}' of '${ownerName}'. ` +
        `A field marked with @PropertyId must hold a property with a value other than null`
    );
    this.name = "DefaultValueNotFoundError";
  }
}

export class InvalidDefaultValueError extends Error {
  constructor(key: string, reason: string) {
    super(`Default value of property '${key}' does not match its type: ${reason}`);
    this.name = "InvalidDefaultValueError";
  }
}

/**
 * 并发创建冲突在重试上限内仍未解决
 */
export class PropertyWriteConflictError extends Error {
  constructor(path: string, attempts: number) {
    super(
      `Failed to upsert property '${path}': conflicting writers after ${attempts} attempts`
    );
    this.name = "PropertyWriteConflictError";
  }
}

export class PropertyReadTimeoutError extends Error {
  constructor(path: string, timeoutMs: number) {
    super(`Reading properties under '${path}' timed out after ${timeoutMs}ms`);
    this.name = "PropertyReadTimeoutError";
  }
}

/**
 * 在属性通知监听器的过程中再次调用同一属性的 set
 */
export class ReentrantPropertyUpdateError extends Error {
  constructor(name: string) {
    super(
      `Property '${name}' was updated from inside one of its own listeners`
    );
    this.name = "ReentrantPropertyUpdateError";
  }
}

export class PropertySourceStateError extends Error {
  constructor(state: string, operation: string) {
    super(`Property source is ${state}, cannot ${operation}`);
    this.name = "PropertySourceStateError";
  }
}
