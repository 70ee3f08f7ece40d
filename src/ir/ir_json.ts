import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import type { IR } from '../types.js';

/**
 * IR JSON 序列化封装（版本化）
 *
 * 提供 IR 模块的 JSON 序列化和反序列化功能，
 * 反序列化时按 schema/ir-module.schema.json 校验结构。
 */

/**
 * IR JSON 封装接口
 * 包含版本信息和可选元数据
 */
export interface IREnvelope {
  /** JSON schema 版本 */
  version: '1.0';
  /** IR 模块定义 */
  module: IR.Module;
  /** 可选元数据 */
  metadata?: {
    /** 生成时间（ISO 8601 格式） */
    generatedAt?: string;
    /** 源文件路径或描述 */
    source?: string;
    /** 编译器版本 */
    compilerVersion?: string;
  };
}

// schema 位于项目根目录：源码运行时为 src/ir/../../，编译产物为 dist/src/ir/../../../
const here = dirname(fileURLToPath(import.meta.url));
const schemaPath =
  [join(here, '..', '..', 'schema', 'ir-module.schema.json'), join(here, '..', '..', '..', 'schema', 'ir-module.schema.json')].find(
    candidate => existsSync(candidate)
  ) ?? join(here, '..', '..', 'schema', 'ir-module.schema.json');

let validator: ValidateFunction<IREnvelope> | null = null;

function getValidator(): ValidateFunction<IREnvelope> {
  if (!validator) {
    const ajv = new Ajv({ strict: true, allErrors: true, allowUnionTypes: true });
    validator = ajv.compile<IREnvelope>(JSON.parse(readFileSync(schemaPath, 'utf-8')));
  }
  return validator;
}

function formatSchemaError(error: ErrorObject): string {
  return `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`;
}

/**
 * 将 IR 模块序列化为 JSON 字符串
 *
 * @param module - IR 模块对象
 * @param metadata - 可选元数据
 * @returns 格式化的 JSON 字符串（2 空格缩进）
 *
 * @example
 * ```typescript
 * const { module } = generate(program);
 * const json = serializeModule(module, { source: 'main.cnd' });
 * ```
 */
export function serializeModule(module: IR.Module, metadata?: IREnvelope['metadata']): string {
  const envelope: IREnvelope = {
    version: '1.0',
    module,
    ...(metadata ? { metadata } : {}),
  };
  return JSON.stringify(envelope, null, 2);
}

/**
 * 从 JSON 字符串反序列化为 IR 模块
 *
 * @throws {Error} 如果 JSON 无效、版本不支持或结构不符合 schema
 */
export function deserializeModule(json: string): IR.Module {
  let envelope: unknown;

  try {
    envelope = JSON.parse(json);
  } catch (e) {
    throw new Error(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (!envelope || typeof envelope !== 'object' || Array.isArray(envelope)) {
    throw new Error('Invalid IR JSON: expected object');
  }

  if (!('version' in envelope) || envelope.version !== '1.0') {
    const version = 'version' in envelope ? String(envelope.version) : 'missing';
    throw new Error(`Unsupported IR JSON version: ${version}. Expected: 1.0`);
  }

  const validate = getValidator();
  if (!validate(envelope)) {
    const details = (validate.errors ?? []).map(formatSchemaError).join('; ');
    throw new Error(`Invalid IR JSON: ${details}`);
  }
  return envelope.module;
}

/**
 * 验证 JSON 字符串是否为有效的 IR 格式
 */
export function isValidModuleJson(json: string): boolean {
  try {
    deserializeModule(json);
    return true;
  } catch {
    return false;
  }
}
