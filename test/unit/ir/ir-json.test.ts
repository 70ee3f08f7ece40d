import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { serializeModule, deserializeModule, isValidModuleJson } from '../../../src/ir/ir_json.js';
import { compile } from '../../../src/pipeline/compile.js';
import type { IR } from '../../../src/types.js';

function sampleModule(): IR.Module {
  const result = compile(
    'function half(x: int): float { return x / 2.0; }\nvar s: string = "hi";\nif (half(3) > 1.0) { print(s); }',
    { moduleName: 'sample' }
  );
  assert.ok(result.module);
  return result.module;
}

describe('IR JSON 封装', () => {
  it('序列化结果带版本号与可选元数据', () => {
    const json = serializeModule(sampleModule(), { source: 'sample.cnd' });
    const parsed: unknown = JSON.parse(json);
    assert.ok(parsed && typeof parsed === 'object');
    assert.equal('version' in parsed ? parsed.version : null, '1.0');
    assert.deepEqual('metadata' in parsed ? parsed.metadata : null, { source: 'sample.cnd' });
    assert.equal(json.split('\n')[1], '  "version": "1.0",');
  });

  it('反序列化得到等价的模块', () => {
    const module = sampleModule();
    assert.deepEqual(module.globals, [{ name: 's', type: 'ptr', initializer: { kind: 'ConstString', type: 'ptr', value: '' } }]);
    assert.deepEqual(deserializeModule(serializeModule(module)), module);
    assert.equal(isValidModuleJson(serializeModule(module)), true);
  });

  it('非法 JSON', () => {
    assert.throws(() => deserializeModule('{'), /^Error: Invalid JSON: /);
    assert.equal(isValidModuleJson('{'), false);
  });

  it('顶层必须是对象', () => {
    assert.throws(() => deserializeModule('[]'), { message: 'Invalid IR JSON: expected object' });
  });

  it('不支持的版本', () => {
    assert.throws(() => deserializeModule('{"version":"2.0","module":{}}'), {
      message: 'Unsupported IR JSON version: 2.0. Expected: 1.0',
    });
    assert.throws(() => deserializeModule('{"module":{}}'), {
      message: 'Unsupported IR JSON version: missing. Expected: 1.0',
    });
  });

  it('结构不符合 schema', () => {
    assert.throws(() => deserializeModule('{"version":"1.0","module":{"name":"m","globals":[]}}'), {
      message: "Invalid IR JSON: /module must have required property 'functions'",
    });
    assert.throws(
      () => deserializeModule('{"version":"1.0","module":{"name":"m","globals":[{"name":"g","type":"i32"}],"functions":[]}}'),
      { message: "Invalid IR JSON: /module/globals/0 must have required property 'initializer'" }
    );
    assert.equal(
      isValidModuleJson('{"version":"1.0","module":{"name":"m","functions":[{"name":"f"}]}}'),
      false
    );
  });
});
