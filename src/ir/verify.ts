/**
 * @module ir/verify
 *
 * IR 结构校验：每个基本块恰好一条终结指令且位于末尾、alloca 只出现在入口块、
 * 分支目标存在且与后继列表一致、gload/gstore 引用已声明的全局变量、
 * 全局变量与函数的名称互不重复。
 */

import type { IR } from '../types.js';
import { isTerminator, terminatorOf } from './ir.js';

export interface VerifyIssue {
  readonly function: string;
  readonly block: string | null;
  readonly message: string;
}

function targetsOf(term: IR.Terminator): number[] {
  switch (term.op) {
    case 'br':
      return [term.target];
    case 'condbr':
      return [term.ifTrue, term.ifFalse];
    case 'ret':
      return [];
  }
}

export function verifyFunction(fn: IR.Function, globals: ReadonlySet<string> = new Set()): VerifyIssue[] {
  const issues: VerifyIssue[] = [];
  const report = (block: IR.BasicBlock | null, message: string): void => {
    issues.push({ function: fn.name, block: block ? block.label : null, message });
  };

  if (fn.external) {
    if (fn.blocks.length > 0) report(null, 'external function must not have blocks');
    return issues;
  }
  if (fn.blocks.length === 0) {
    report(null, 'function has no blocks');
    return issues;
  }

  fn.blocks.forEach((block, index) => {
    if (block.id !== index) report(block, `block id ${block.id} does not match position ${index}`);

    const terminators = block.instructions.filter(isTerminator).length;
    const term = terminatorOf(block);
    if (!term) {
      report(block, 'block does not end with a terminator');
    } else if (terminators > 1) {
      report(block, `block has ${terminators} terminators`);
    }

    if (index > 0 && block.instructions.some(inst => inst.op === 'alloca')) {
      report(block, 'alloca outside the entry block');
    }

    for (const inst of block.instructions) {
      if ((inst.op === 'gload' || inst.op === 'gstore') && !globals.has(inst.global)) {
        report(block, `reference to undeclared global @${inst.global}`);
      }
    }

    if (term) {
      const targets = targetsOf(term);
      for (const target of targets) {
        if (!fn.blocks[target]) report(block, `branch to missing block ${target}`);
      }
      const expected = [...new Set(targets)].sort((a, b) => a - b);
      const actual = [...block.successors].sort((a, b) => a - b);
      if (expected.join(',') !== actual.join(',')) {
        report(block, `successors [${actual.join(', ')}] do not match terminator [${expected.join(', ')}]`);
      }
    }
  });

  return issues;
}

/**
 * 校验模块中的全部函数；返回空数组表示结构合法。
 */
export function verifyModule(m: IR.Module): VerifyIssue[] {
  const issues: VerifyIssue[] = [];
  const globals = new Set<string>();
  for (const g of m.globals) {
    if (globals.has(g.name)) issues.push({ function: g.name, block: null, message: 'duplicate global name' });
    globals.add(g.name);
  }
  const names = new Set<string>();
  for (const fn of m.functions) {
    if (names.has(fn.name)) issues.push({ function: fn.name, block: null, message: 'duplicate function name' });
    if (globals.has(fn.name)) issues.push({ function: fn.name, block: null, message: 'function name clashes with a global' });
    names.add(fn.name);
    issues.push(...verifyFunction(fn, globals));
  }
  return issues;
}
