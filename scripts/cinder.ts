#!/usr/bin/env node
import { cac } from 'cac';
import { tokensCommand } from '../src/cli/commands/tokens.js';
import { parseCommand } from '../src/cli/commands/parse.js';
import { checkCommand } from '../src/cli/commands/check.js';
import { irCommand, type IrOptions } from '../src/cli/commands/ir.js';
import { runCommand, type RunOptions } from '../src/cli/commands/run.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => number) {
  return (...args: Args): void => {
    try {
      process.exitCode = fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function main(): void {
  const cli = cac('cinder');

  cli.option('-v, --verbose', '在诊断下方输出源码摘录与提示', { default: false });

  cli
    .command('tokens <file>', '输出 .cnd 文件的词法单元序列')
    .action(wrapAction((file: string, options: { verbose?: boolean }) => tokensCommand(file, { verbose: Boolean(options.verbose) })));

  cli
    .command('parse <file>', '解析 .cnd 文件为 AST(JSON)')
    .action(wrapAction((file: string, options: { verbose?: boolean }) => parseCommand(file, { verbose: Boolean(options.verbose) })));

  cli
    .command('check <file>', '执行语法与语义检查')
    .action(wrapAction((file: string, options: { verbose?: boolean }) => checkCommand(file, { verbose: Boolean(options.verbose) })));

  cli
    .command('ir <file>', 'Lower AST → IR（文本或 JSON）')
    .option('-o, --output <file>', '输出文件路径（不指定则输出到控制台）')
    .option('--json', '输出版本化的 JSON 封装', { default: false })
    .action(
      wrapAction((file: string, options: Record<string, unknown>) => {
        const irOptions: IrOptions = {
          json: Boolean(options.json),
          verbose: Boolean(options.verbose),
        };
        if (typeof options.output === 'string') {
          irOptions.output = options.output;
        }
        return irCommand(file, irOptions);
      })
    );

  cli
    .command('run <file>', '用 IR 解释器运行程序')
    .option('--entry <name>', '入口函数名（默认先运行顶层语句，再运行 main）')
    .option('--input-file <file>', 'input() 读取的输入文件')
    .action(
      wrapAction((file: string, options: Record<string, unknown>) => {
        const runOptions: RunOptions = { verbose: Boolean(options.verbose) };
        if (typeof options.entry === 'string') {
          runOptions.entry = options.entry;
        }
        if (typeof options.inputFile === 'string') {
          runOptions.inputFile = options.inputFile;
        }
        return runCommand(file, runOptions);
      })
    );

  cli.help();
  cli.version('0.1.0', '-V, --version');
  cli.parse();
}

main();
