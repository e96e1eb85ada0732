import {
  DefaultValueNotFoundError,
  InvalidDefaultValueError,
} from "../core/errors";
import defaultLogger, {
  describeValue,
  type PropertyLogger,
} from "../core/logger";
import { isDynamicProperty } from "../property";
import { DefaultValue } from "../source/default-value";
import { SourcedProperty } from "../source/sourced-property";
import type { DynamicPropertySource } from "../source/types";
import { propertyIdMetadata } from "./decorator";

/**
 * 动态属性注入器
 *
 * 处理带 @PropertyId 的字段：
 * 1. 读取字段当前持有属性的值作为默认值（缺失或为 null 时抛出 DefaultValueNotFoundError）
 * 2. 用字段声明的 Schema 校验默认值
 * 3. 默认值写入属性源（若不存在），失败只记录日志
 * 4. 用 SourcedProperty 替换字段
 *
 * inject 返回时所有字段都已替换完毕，可以直接使用
 */
export class DynamicPropertyInjector {
  private readonly logger: PropertyLogger;
  private readonly properties: SourcedProperty<unknown>[] = [];
  private processingTime = 0;

  constructor(
    private readonly source: DynamicPropertySource,
    options?: { logger?: PropertyLogger }
  ) {
    this.logger = options?.logger || defaultLogger;
  }

  async inject<T extends object>(
    instance: T,
    beanName: string = instance.constructor.name
  ): Promise<T> {
    const startTime = Date.now();

    for (const [fieldName, metadata] of propertyIdMetadata.getAll(instance)) {
      const holder: unknown = Reflect.get(instance, fieldName);
      if (!isDynamicProperty(holder)) {
        this.logger.warn(
          `@PropertyId is applicable only on fields of DynamicProperty type, field '${fieldName}' of '${beanName}' is left unchanged`
        );
        continue;
      }

      const defaultValue = holder.get();
      if (defaultValue === null || defaultValue === undefined) {
        throw new DefaultValueNotFoundError(fieldName, beanName);
      }

      const checked = metadata.type.safeParse(defaultValue);
      if (!checked.success) {
        throw new InvalidDefaultValueError(metadata.key, checked.error.message);
      }

      try {
        await this.source.putIfAbsent(metadata.key, checked.data);
      } catch (error) {
        this.logger.error(
          `Failed to put default value '${describeValue(checked.data)}' to property '${metadata.key}'`,
          error
        );
      }

      const property = new SourcedProperty(
        this.source,
        metadata.key,
        metadata.type,
        DefaultValue.of(checked.data),
        { logger: this.logger }
      );
      holder.close();
      Reflect.set(instance, fieldName, property);
      this.properties.push(property);
    }

    const currentProcessingTime = Date.now() - startTime;
    this.processingTime += currentProcessingTime;
    this.logger.debug(
      `Resolving @PropertyId fields for '${beanName}' took ${currentProcessingTime} ms. ` +
        `Sum of processing times is ${this.processingTime} ms now.`
    );

    return instance;
  }

  /**
   * 关闭所有由注入器创建的属性
   */
  close(): void {
    for (const property of this.properties) {
      property.close();
    }
    this.properties.length = 0;
  }
}
