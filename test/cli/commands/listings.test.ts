import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { filesCommand } from '../../../src/cli/commands/files.js';
import { languagesCommand } from '../../../src/cli/commands/languages.js';
import { captureConsole, captureJson } from '../../helpers/console-capture.js';
import { createLabelTree, isolateLabelEnv, type LabelTree } from '../../helpers/label-tree.js';

describe('listing commands', { concurrency: false }, () => {
  let tree: LabelTree;
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = isolateLabelEnv();
    tree = createLabelTree('labels-listing-cli-');
    tree.writeLabelFile('ApplicationSuite', 'Foundation', 'en-US', 'SYS', '1:One');
    tree.writeLabelFile('ApplicationSuite', 'Foundation', 'nl-NL', 'SYS', '1:Een');
    tree.writeLabelFile('ApplicationSuite', 'Foundation', 'en-US', 'GLS', '1:Ledger');
  });

  afterEach(() => {
    tree.cleanup();
    restoreEnv();
  });

  describe('languagesCommand', () => {
    it('JSON 模式输出语言数组', async () => {
      const languages = await captureJson(() =>
        languagesCommand('ApplicationSuite', 'Foundation', 'SYS', { root: tree.root, json: true })
      );

      assert.deepEqual(languages, ['en-US', 'nl-NL']);
    });

    it('文本模式每行输出一个语言', async () => {
      const { stdout } = await captureConsole(() => languagesCommand('ApplicationSuite', 'Foundation', 'GLS', { root: tree.root }));

      assert.deepEqual(stdout, ['en-US']);
    });

    it('没有结果时输出提示', async () => {
      const { stdout } = await captureConsole(() => languagesCommand('ApplicationSuite', 'Foundation', 'Fleet', { root: tree.root }));

      assert.equal(stdout.length, 1);
      assert.ok(stdout[0]?.includes('ApplicationSuite/Foundation 中没有 Fleet 的标签文件'));
    });
  });

  describe('filesCommand', () => {
    it('默认列出 en-US 标签文件', async () => {
      const fileIds = await captureJson(() => filesCommand('ApplicationSuite', 'Foundation', { root: tree.root, json: true }));

      assert.deepEqual(fileIds, ['GLS', 'SYS']);
    });

    it('按语言列出标签文件', async () => {
      const { stdout } = await captureConsole(() =>
        filesCommand('ApplicationSuite', 'Foundation', { root: tree.root, language: 'nl-NL' })
      );

      assert.deepEqual(stdout, ['SYS']);
    });

    it('没有结果时输出提示', async () => {
      const { stdout } = await captureConsole(() =>
        filesCommand('ApplicationSuite', 'Foundation', { root: tree.root, language: 'ja-JP' })
      );

      assert.ok(stdout[0]?.includes('ApplicationSuite/Foundation 中没有 ja-JP 标签文件'));
    });
  });
});
