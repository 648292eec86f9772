import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseLabelReference, formatLabelReference } from '../../../src/labels/reference.js';
import { DiagnosticCode, DiagnosticSeverity, isDiagnosticArray } from '../../../src/diagnostics/diagnostics.js';

describe('parseLabelReference', () => {
  it('解析规范格式 @FileId:LabelId', () => {
    assert.deepEqual(parseLabelReference('@SYS:13342'), { fileId: 'SYS', labelId: '13342' });
    assert.deepEqual(parseLabelReference('@Fleet_2:Title_A'), { fileId: 'Fleet_2', labelId: 'Title_A' });
  });

  it('格式错误时返回 InvalidReference 警告而不抛出', () => {
    for (const input of ['SYS:1', '@SYS', '@SYS:', '@:1', '@SYS:1:2', '@SY-S:1', '@SYS:1 ', '', '@SYS13342']) {
      const result = parseLabelReference(input);
      assert.ok(isDiagnosticArray(result), `应拒绝 ${JSON.stringify(input)}`);
      assert.equal(result.length, 1);
      assert.equal(result[0]?.code, DiagnosticCode.LBL002_InvalidReference);
      assert.equal(result[0]?.severity, DiagnosticSeverity.Warning);
    }
  });

  it('诊断范围覆盖整个输入', () => {
    const result = parseLabelReference('bad ref');
    assert.ok(isDiagnosticArray(result));
    assert.deepEqual(result[0]?.span, { start: { line: 1, col: 1 }, end: { line: 1, col: 8 } });
  });

  it('启用旧式格式后按大写前缀拆分', () => {
    assert.deepEqual(parseLabelReference('@SYS13342', { allowLegacy: true }), { fileId: 'SYS', labelId: '13342' });
    assert.deepEqual(parseLabelReference('@GLS100_a', { allowLegacy: true }), { fileId: 'GLS', labelId: '100_a' });
  });

  it('旧式格式开启时规范格式仍优先', () => {
    assert.deepEqual(parseLabelReference('@SYS:13342', { allowLegacy: true }), { fileId: 'SYS', labelId: '13342' });
  });

  it('旧式格式要求前缀后紧跟数字', () => {
    for (const input of ['@Sys123', '@SYS', '@SYSabc', '@123']) {
      assert.ok(isDiagnosticArray(parseLabelReference(input, { allowLegacy: true })), input);
    }
  });

  it('formatLabelReference 生成规范格式', () => {
    assert.equal(formatLabelReference({ fileId: 'SYS', labelId: '42' }), '@SYS:42');
  });
});
