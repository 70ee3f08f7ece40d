import { writeFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import ora from 'ora';
import { compile } from '../../pipeline/compile.js';
import { formatModule } from '../../ir/pretty_ir.js';
import { serializeModule } from '../../ir/ir_json.js';
import { verifyModule } from '../../ir/verify.js';
import { printDiagnostics } from '../utils/error-handler.js';
import { error as logError } from '../utils/logger.js';
import { readSource, type VerboseOptions } from '../utils/source.js';

export interface IrOptions extends VerboseOptions {
  /** 输出文件路径（不指定则输出到控制台） */
  output?: string;
  /** 输出 JSON 封装而非文本 IR */
  json?: boolean;
}

/**
 * 编译源文件并输出 IR。模块名取自文件名（去掉扩展名）。
 */
export function irCommand(file: string, options: IrOptions = {}): number {
  const source = readSource(file);
  const spinner = ora(`编译 ${file}...`).start();

  const result = compile(source, { moduleName: basename(file, extname(file)) });
  if (!result.module || !result.success) {
    spinner.fail('编译失败');
    printDiagnostics(result.diagnostics, { source, ...options });
    return 1;
  }

  const issues = verifyModule(result.module);
  if (issues.length > 0) {
    spinner.fail('IR 校验失败');
    for (const issue of issues) {
      logError(`${issue.function}${issue.block !== null ? `:${issue.block}` : ''}: ${issue.message}`);
    }
    return 1;
  }

  const text = options.json
    ? serializeModule(result.module, { source: file, generatedAt: new Date().toISOString() })
    : formatModule(result.module);

  if (options.output) {
    writeFileSync(options.output, options.json ? `${text}\n` : text, 'utf8');
    spinner.succeed(`IR 已写入 ${options.output}`);
  } else {
    spinner.stop();
    console.log(text.replace(/\n$/, ''));
  }
  // 警告（如 G004）不影响退出码
  printDiagnostics(result.diagnostics, { source, ...options });
  return 0;
}
