import { readFileSync } from 'node:fs';

/** 读取源文件；文件系统错误原样抛出，由 handleError 统一处理 */
export function readSource(file: string): string {
  return readFileSync(file, 'utf8');
}

/** 所有命令共享的诊断输出选项 */
export interface VerboseOptions {
  verbose?: boolean;
}
