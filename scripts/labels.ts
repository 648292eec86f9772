#!/usr/bin/env node
import { cac } from 'cac';
import { batchCommand, type BatchOptions } from '../src/cli/commands/batch.js';
import { filesCommand, type FilesOptions } from '../src/cli/commands/files.js';
import { getCommand, type GetOptions } from '../src/cli/commands/get.js';
import { languagesCommand, type LanguagesOptions } from '../src/cli/commands/languages.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function withRoot<T extends { root?: string }>(options: T, raw: Record<string, unknown>): T {
  const root = stringOption(raw.root);
  return root === undefined ? options : { ...options, root };
}

function main(): void {
  const cli = cac('labels');

  cli.option('--root <dir>', '包目录根路径（覆盖 LABELS_PACKAGES_DIR）');

  cli
    .command('get <reference>', '解析单个标签引用，如 @SYS:1234')
    .option('--lang <language>', '标签语言', { default: 'en-US' })
    .option('--description', '同时输出标签说明', { default: false })
    .option('--json', '以 JSON 格式输出', { default: false })
    .action(
      wrapAction(async (reference: string, options: Record<string, unknown>) => {
        const getOptions: GetOptions = {
          description: Boolean(options.description),
          json: Boolean(options.json),
        };
        const language = stringOption(options.lang);
        if (language) {
          getOptions.language = language;
        }
        await getCommand(reference, withRoot(getOptions, options));
      })
    );

  cli
    .command('batch <...references>', '批量解析标签引用')
    .option('--lang <language>', '标签语言', { default: 'en-US' })
    .option('--json', '以 JSON 格式输出', { default: false })
    .action(
      wrapAction(async (references: string[], options: Record<string, unknown>) => {
        const batchOptions: BatchOptions = { json: Boolean(options.json) };
        const language = stringOption(options.lang);
        if (language) {
          batchOptions.language = language;
        }
        await batchCommand(references, withRoot(batchOptions, options));
      })
    );

  cli
    .command('languages <package> <model> <fileId>', '列出标签文件可用的语言')
    .option('--json', '以 JSON 格式输出', { default: false })
    .action(
      wrapAction(async (pkg: string, model: string, fileId: string, options: Record<string, unknown>) => {
        const languagesOptions: LanguagesOptions = { json: Boolean(options.json) };
        await languagesCommand(pkg, model, fileId, withRoot(languagesOptions, options));
      })
    );

  cli
    .command('files <package> <model>', '列出模型中的标签文件')
    .option('--lang <language>', '标签语言', { default: 'en-US' })
    .option('--json', '以 JSON 格式输出', { default: false })
    .action(
      wrapAction(async (pkg: string, model: string, options: Record<string, unknown>) => {
        const filesOptions: FilesOptions = { json: Boolean(options.json) };
        const language = stringOption(options.lang);
        if (language) {
          filesOptions.language = language;
        }
        await filesCommand(pkg, model, withRoot(filesOptions, options));
      })
    );

  cli
    .command('help', '显示使用说明')
    .action(() => {
      cli.outputHelp();
    });

  cli.help();
  cli.parse();
}

try {
  main();
} catch (error) {
  handleError(error);
}
