import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseLabelFileContent, readLabelFile } from '../../../src/labels/label-file-parser.js';

describe('parseLabelFileContent', () => {
  it('解析标签行，文本保留冒号后的原始内容', () => {
    const table = parseLabelFileContent('Company:Company\nSpaced: leading space \nEmpty:');
    assert.deepEqual(table.get('Company'), { labelId: 'Company', text: 'Company' });
    assert.equal(table.get('Spaced')?.text, ' leading space ');
    assert.equal(table.get('Empty')?.text, '');
  });

  it('只在第一个冒号处拆分', () => {
    const table = parseLabelFileContent('Url:http://example.test:8080');
    assert.equal(table.get('Url')?.text, 'http://example.test:8080');
  });

  it('重复的 labelId 以最后一次为准', () => {
    const table = parseLabelFileContent('A:text1\nA:text2');
    assert.equal(table.size, 1);
    assert.equal(table.get('A')?.text, 'text2');
  });

  it('说明紧跟标签行时附加到该标签', () => {
    const table = parseLabelFileContent('A:hello\n;desc\n\nB:world\n;orphan');
    assert.equal(table.get('A')?.description, 'desc');
    assert.equal(table.get('B')?.description, 'orphan');
  });

  it('空行之后的说明不附加到任何标签', () => {
    const table = parseLabelFileContent('A:hello\n\n;stray\nB:world');
    assert.equal(table.get('A')?.description, undefined);
    assert.equal(table.get('B')?.description, undefined);
    assert.equal(table.size, 2);
  });

  it('只含空白的行同样切断关联', () => {
    const table = parseLabelFileContent('A:hello\n   \t\n;stray');
    assert.equal(table.get('A')?.description, undefined);
  });

  it('无法识别的行切断关联且不产生条目', () => {
    const table = parseLabelFileContent('A:hello\n# comment\n;stray\nnot a label');
    assert.deepEqual([...table.keys()], ['A']);
    assert.equal(table.get('A')?.description, undefined);
  });

  it('重复的说明行覆盖之前的说明', () => {
    const table = parseLabelFileContent('A:hello\n;first\n;second');
    assert.equal(table.get('A')?.description, 'second');
  });

  it('重新定义的标签丢弃旧说明', () => {
    const table = parseLabelFileContent('A:one\n;old\nA:two');
    assert.deepEqual(table.get('A'), { labelId: 'A', text: 'two' });
  });

  it('兼容 CRLF 换行与 BOM', () => {
    const table = parseLabelFileContent('\uFEFFFirst:Erste\r\n;Beschreibung\r\nSecond:Zweite\r\n');
    assert.deepEqual(table.get('First'), { labelId: 'First', text: 'Erste', description: 'Beschreibung' });
    assert.equal(table.get('Second')?.text, 'Zweite');
  });

  it('相同内容重复解析得到相等的表', () => {
    const content = 'A:hello\n;desc\n\nB:world\nA:again\n;more';
    const first = parseLabelFileContent(content);
    const second = parseLabelFileContent(content);
    assert.deepEqual([...first.entries()], [...second.entries()]);
  });

  it('条目被冻结', () => {
    const entry = parseLabelFileContent('A:hello').get('A');
    assert.ok(entry);
    assert.ok(Object.isFrozen(entry));
  });

  it('空内容得到空表', () => {
    assert.equal(parseLabelFileContent('').size, 0);
  });
});

describe('readLabelFile', () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'label-parser-test-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('以 UTF-8 读取并解析文件', async () => {
    const filePath = join(dir, 'SYS.de-DE.label.txt');
    writeFileSync(filePath, 'Street:Straße\n;Adresszeile', 'utf-8');
    const table = await readLabelFile(filePath);
    assert.deepEqual(table.get('Street'), { labelId: 'Street', text: 'Straße', description: 'Adresszeile' });
  });

  it('文件不存在时抛出 I/O 错误', async () => {
    await assert.rejects(readLabelFile(join(dir, 'missing.label.txt')), { code: 'ENOENT' });
  });
});
