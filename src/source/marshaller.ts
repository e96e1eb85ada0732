import * as ejson from "ejson";
import { z } from "zod";

/**
 * 属性类型描述（Zod Schema）
 */
export type PropertyType<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * 属性值与存储文本之间的转换器
 */
export interface PropertyMarshaller {
  marshall(value: unknown): string;

  /**
   * @throws 文本无法转换为目标类型时抛出异常
   */
  unmarshall<T>(text: string, type: PropertyType<T>): T;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`)
    .join("; ");
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: ejson.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * 基于 ejson 的默认转换器
 *
 * 字符串按原文存储，其余值序列化为 ejson；
 * 解码时先把原文本身作为值校验，Schema 不接受原文时再按 ejson 解析后校验，
 * 因此 "some Value"、"123" 与 "\"quoted\"" 都能按 z.string() 原样读回
 */
export class EjsonPropertyMarshaller implements PropertyMarshaller {
  marshall(value: unknown): string {
    if (typeof value === "string") {
      return value;
    }
    return ejson.stringify(value);
  }

  unmarshall<T>(text: string, type: PropertyType<T>): T {
    const raw = type.safeParse(text);
    if (raw.success) {
      return raw.data;
    }

    const parsed = tryParse(text);
    if (!parsed.ok) {
      throw new Error(describeIssues(raw.error));
    }

    const result = type.safeParse(parsed.value);
    if (!result.success) {
      throw new Error(describeIssues(result.error));
    }
    return result.data;
  }
}
