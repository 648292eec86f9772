import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadLayerManifest, parseLayerManifest } from '../../../src/config/layering.js';
import { DiagnosticCode, isDiagnosticArray } from '../../../src/diagnostics/diagnostics.js';

describe('parseLayerManifest', () => {
  it('应该返回按清单顺序排列的包名', () => {
    const layers = parseLayerManifest('{"version":1,"layers":["ApplicationSuite","ContosoExtensions"]}');

    assert.deepEqual(layers, ['ApplicationSuite', 'ContosoExtensions']);
    assert.ok(Object.isFrozen(layers));
  });

  it('应该接受空的分层列表', () => {
    assert.deepEqual(parseLayerManifest('{"version":1,"layers":[]}'), []);
  });

  it('应该在 JSON 无效时返回诊断', () => {
    const result = parseLayerManifest('{ "layers": ');

    assert.ok(isDiagnosticArray(result));
    assert.equal(result.length, 1);
    assert.equal(result[0]?.code, DiagnosticCode.LBL101_LayerManifestInvalid);
    assert.ok(result[0]?.message.startsWith('分层清单 JSON 解析失败：'));
  });

  it('应该拒绝不支持的版本', () => {
    const result = parseLayerManifest('{"version":2,"layers":["A"]}');

    assert.ok(isDiagnosticArray(result));
    assert.equal(result.length, 1);
    assert.ok(result[0]?.message.startsWith('分层清单字段 /version 无效：'));
  });

  it('应该拒绝包含路径分隔符或重复的包名', () => {
    const withSeparator = parseLayerManifest('{"version":1,"layers":["../escape"]}');
    assert.ok(isDiagnosticArray(withSeparator));
    assert.ok(withSeparator[0]?.message.startsWith('分层清单字段 /layers/0 无效：'));

    const duplicated = parseLayerManifest('{"version":1,"layers":["A","A"]}');
    assert.ok(isDiagnosticArray(duplicated));
    assert.ok(duplicated[0]?.message.startsWith('分层清单字段 /layers 无效：'));
  });

  it('应该为每个字段错误生成一条诊断', () => {
    const result = parseLayerManifest('{"layers":"A","extra":true}');

    assert.ok(isDiagnosticArray(result));
    assert.equal(result.length, 3);
    assert.ok(result.every((diag) => diag.code === DiagnosticCode.LBL101_LayerManifestInvalid));
  });
});

describe('loadLayerManifest', () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'layering-test-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('应该读取清单文件', async () => {
    const filePath = join(dir, 'layers.json');
    writeFileSync(filePath, JSON.stringify({ version: 1, layers: ['Base', 'Custom'] }), 'utf-8');

    assert.deepEqual(await loadLayerManifest(filePath), ['Base', 'Custom']);
  });

  it('应该在文件不存在时返回 LBL102', async () => {
    const result = await loadLayerManifest(join(dir, 'missing.json'));

    assert.ok(isDiagnosticArray(result));
    assert.equal(result[0]?.code, DiagnosticCode.LBL102_LayerManifestNotFound);
  });

  it('应该在路径是目录时返回 LBL101', async () => {
    const result = await loadLayerManifest(dir);

    assert.ok(isDiagnosticArray(result));
    assert.equal(result[0]?.code, DiagnosticCode.LBL101_LayerManifestInvalid);
  });
});
