/**
 * @module ir/interpreter
 *
 * 低层 IR 解释器：逐基本块执行已降级的模块，作为后端之外的参考求值器。
 *
 * 支持：
 * - 栈槽（alloca/load/store）、全局变量（gload/gstore）与临时值
 * - i32 环绕算术、f64 运算、比较与逻辑运算
 * - br/condbr/ret 控制流与递归调用
 * - 内置函数（print/printInt/printFloat/input/sqrt）与简单的 printf
 */

import type { IR } from '../types.js';
import { ConfigService } from '../config/config-service.js';

// ============================================================================
// 公共接口
// ============================================================================

/** IR 运行时值：i32/f64/i1 为 number，ptr 为 string，void 为 null */
export type RuntimeValue = number | string | null;

/** 调用参数；布尔值按 i1 传入 */
export type RuntimeArgument = number | string | boolean;

/** 全局变量存储，按全局变量名索引 */
export type GlobalStore = Map<string, RuntimeValue>;

export interface ExecuteOptions {
  /** input() 依次读取的输入行 */
  input?: readonly string[];
  /** 执行步数上限（默认取自配置） */
  maxSteps?: number;
  /**
   * 全局变量存储。多次 execute 传入同一个存储即可共享全局状态
   * （例如先运行顶层函数再运行 main）；缺失的条目按初值补齐。
   */
  globals?: GlobalStore;
}

/** 求值结果 */
export interface EvalResult {
  /** 是否执行成功 */
  success: boolean;
  /** 返回值（成功且非 void 时）；i1 返回值转换为 boolean */
  value?: number | string | boolean;
  /** 内置输出函数写出的文本 */
  output: string;
  /** 错误信息（失败时） */
  error?: string;
  /** 已执行的指令数 */
  steps: number;
  /** 执行耗时（毫秒） */
  executionTimeMs: number;
}

/**
 * 执行模块中的指定函数。
 *
 * @param module - 已降级的 IR 模块
 * @param functionName - 入口函数名
 * @param args - 按位置传入的参数
 */
export function execute(
  module: IR.Module,
  functionName: string,
  args: readonly RuntimeArgument[] = [],
  options: ExecuteOptions = {}
): EvalResult {
  const start = performance.now();
  const interp = new Interpreter(module, options);
  const elapsed = (): number => Math.round((performance.now() - start) * 100) / 100;
  try {
    const value = interp.run(functionName, args);
    return {
      success: true,
      ...(value !== undefined ? { value } : {}),
      output: interp.output,
      steps: interp.steps,
      executionTimeMs: elapsed(),
    };
  } catch (err) {
    if (err instanceof InterpreterError) {
      return { success: false, error: err.message, output: interp.output, steps: interp.steps, executionTimeMs: elapsed() };
    }
    throw err;
  }
}

// ============================================================================
// 内部实现
// ============================================================================

/** 解释器错误 */
class InterpreterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InterpreterError';
  }
}

const MAX_CALL_DEPTH = 1_000;

interface Frame {
  readonly fn: IR.Function;
  readonly args: readonly RuntimeValue[];
  readonly temps: Map<number, RuntimeValue>;
  readonly slots: Map<number, RuntimeValue>;
}

function formatPrintf(format: string, args: readonly RuntimeValue[]): string {
  let next = 0;
  return format.replace(/%([%dicfs])/g, (_match, conversion: string) => {
    if (conversion === '%') return '%';
    const arg = args[next++];
    switch (conversion) {
      case 'd':
      case 'i':
        return String(Math.trunc(Number(arg)) | 0);
      case 'c':
        return String.fromCharCode(Number(arg));
      case 'f':
        return Number(arg).toFixed(6);
      default:
        return String(arg ?? '');
    }
  });
}

/** 同类值的三路比较；字符串按码点序 */
function order(a: number | string, b: number | string): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const x = String(a);
  const y = String(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

class Interpreter {
  private readonly funcs = new Map<string, IR.Function>();
  private readonly input: string[];
  private readonly maxSteps: number;
  private readonly globals: GlobalStore;
  private callDepth = 0;
  output = '';
  steps = 0;

  constructor(module: IR.Module, options: ExecuteOptions) {
    for (const fn of module.functions) this.funcs.set(fn.name, fn);
    this.input = [...(options.input ?? [])];
    this.maxSteps = options.maxSteps ?? ConfigService.getInstance().maxSteps;
    this.globals = options.globals ?? new Map();
    for (const global of module.globals) {
      if (!this.globals.has(global.name)) this.globals.set(global.name, global.initializer.value);
    }
  }

  run(name: string, args: readonly RuntimeArgument[]): number | string | boolean | undefined {
    const fn = this.funcs.get(name);
    if (!fn) {
      const available = [...this.funcs.values()].filter(f => !f.external).map(f => f.name).join(', ');
      throw new InterpreterError(`Function '${name}' not found in module. Available: ${available || 'none'}`);
    }
    if (args.length !== fn.params.length) {
      throw new InterpreterError(`Function '${name}' expects ${fn.params.length} arguments, got ${args.length}`);
    }
    const converted = args.map((arg, i) => this.toRuntime(arg, fn.params[i]?.type ?? 'i32'));
    const result = this.call(fn, converted);
    if (fn.returnType === 'void' || result === null) return undefined;
    return fn.returnType === 'i1' ? result !== 0 : result;
  }

  private toRuntime(arg: RuntimeArgument, type: IR.Type): RuntimeValue {
    if (typeof arg === 'boolean') return arg ? 1 : 0;
    if (type === 'i32' && typeof arg === 'number') return Math.trunc(arg) | 0;
    return arg;
  }

  private tick(): void {
    this.steps++;
    if (this.steps > this.maxSteps) {
      throw new InterpreterError(`Maximum step count (${this.maxSteps}) exceeded`);
    }
  }

  private call(fn: IR.Function, args: readonly RuntimeValue[]): RuntimeValue {
    if (fn.external) return this.callBuiltin(fn.name, args);

    this.callDepth++;
    if (this.callDepth > MAX_CALL_DEPTH) {
      throw new InterpreterError(`Maximum call depth (${MAX_CALL_DEPTH}) exceeded`);
    }
    try {
      return this.execFunction({ fn, args, temps: new Map(), slots: new Map() });
    } finally {
      this.callDepth--;
    }
  }

  private execFunction(frame: Frame): RuntimeValue {
    let block = frame.fn.blocks[0];
    while (block) {
      let next: IR.BasicBlock | undefined;
      for (const inst of block.instructions) {
        this.tick();
        switch (inst.op) {
          case 'br':
            next = this.block(frame, inst.target);
            break;
          case 'condbr':
            next = this.block(frame, this.read(frame, inst.condition) !== 0 ? inst.ifTrue : inst.ifFalse);
            break;
          case 'ret':
            return inst.value ? this.read(frame, inst.value) : null;
          default:
            this.execInstruction(frame, inst);
        }
        if (next) break;
      }
      if (!next) throw new InterpreterError(`Block ${block.label} in '${frame.fn.name}' has no terminator`);
      block = next;
    }
    throw new InterpreterError(`Function '${frame.fn.name}' has no entry block`);
  }

  private block(frame: Frame, id: number): IR.BasicBlock {
    const block = frame.fn.blocks[id];
    if (!block) throw new InterpreterError(`Branch to missing block ${id} in '${frame.fn.name}'`);
    return block;
  }

  private read(frame: Frame, value: IR.Value): RuntimeValue {
    switch (value.kind) {
      case 'ConstInt':
      case 'ConstFloat':
      case 'ConstString':
        return value.value;
      case 'Param': {
        const arg = frame.args[value.index];
        if (arg === undefined) throw new InterpreterError(`Missing argument %${value.name}`);
        return arg;
      }
      case 'Temp': {
        const temp = frame.temps.get(value.id);
        if (temp === undefined) throw new InterpreterError(`Use of undefined temporary %${value.id}`);
        return temp;
      }
      case 'Void':
        return null;
    }
  }

  private num(frame: Frame, value: IR.Value): number {
    const v = this.read(frame, value);
    if (typeof v !== 'number') throw new InterpreterError(`Expected a numeric operand, got ${JSON.stringify(v)}`);
    return v;
  }

  private execInstruction(frame: Frame, inst: Exclude<IR.Instruction, IR.Terminator>): void {
    switch (inst.op) {
      case 'alloca':
        return;
      case 'load': {
        const value = frame.slots.get(inst.slot);
        if (value === undefined) {
          const slot = frame.fn.slots[inst.slot];
          throw new InterpreterError(`Load from uninitialized slot ${slot ? slot.name : inst.slot}`);
        }
        frame.temps.set(inst.result.id, value);
        return;
      }
      case 'store':
        frame.slots.set(inst.slot, this.read(frame, inst.value));
        return;
      case 'gload': {
        const value = this.globals.get(inst.global);
        if (value === undefined) throw new InterpreterError(`Load from undeclared global @${inst.global}`);
        frame.temps.set(inst.result.id, value);
        return;
      }
      case 'gstore':
        if (!this.globals.has(inst.global)) throw new InterpreterError(`Store to undeclared global @${inst.global}`);
        this.globals.set(inst.global, this.read(frame, inst.value));
        return;
      case 'binary':
        frame.temps.set(inst.result.id, this.binary(inst.opcode, this.num(frame, inst.lhs), this.num(frame, inst.rhs)));
        return;
      case 'icmp':
      case 'fcmp':
        frame.temps.set(inst.result.id, this.compare(inst.predicate, this.read(frame, inst.lhs), this.read(frame, inst.rhs)));
        return;
      case 'unary': {
        const operand = this.num(frame, inst.operand);
        const value = inst.opcode === 'neg' ? -operand | 0 : inst.opcode === 'fneg' ? -operand : operand !== 0 ? 0 : 1;
        frame.temps.set(inst.result.id, value);
        return;
      }
      case 'cast': {
        const value = this.num(frame, inst.value);
        frame.temps.set(inst.result.id, inst.opcode === 'sitofp' ? value : Math.trunc(value) | 0);
        return;
      }
      case 'call': {
        const callee = this.funcs.get(inst.callee);
        if (!callee) throw new InterpreterError(`Call to undefined function '${inst.callee}'`);
        const args = inst.args.map(arg => this.read(frame, arg));
        const result = this.call(callee, args);
        if (inst.result) frame.temps.set(inst.result.id, result);
        return;
      }
    }
  }

  private binary(opcode: IR.BinaryOpcode, a: number, b: number): number {
    switch (opcode) {
      case 'add':
        return (a + b) | 0;
      case 'sub':
        return (a - b) | 0;
      case 'mul':
        return Math.imul(a, b);
      case 'sdiv':
        if (b === 0) throw new InterpreterError('Division by zero');
        return Math.trunc(a / b) | 0;
      case 'srem':
        if (b === 0) throw new InterpreterError('Division by zero');
        return (a % b) | 0;
      case 'fadd':
        return a + b;
      case 'fsub':
        return a - b;
      case 'fmul':
        return a * b;
      case 'fdiv':
        return a / b;
      case 'frem':
        return a % b;
      case 'and':
        return a & b;
      case 'or':
        return a | b;
    }
  }

  private compare(predicate: IR.ComparePredicate, a: RuntimeValue, b: RuntimeValue): number {
    if (a === null || b === null) throw new InterpreterError('Comparison of void value');
    if (typeof a !== typeof b) return predicate === 'ne' ? 1 : 0;
    let result: boolean;
    switch (predicate) {
      case 'eq':
        result = a === b;
        break;
      case 'ne':
        result = a !== b;
        break;
      case 'lt':
        result = order(a, b) < 0;
        break;
      case 'le':
        result = order(a, b) <= 0;
        break;
      case 'gt':
        result = order(a, b) > 0;
        break;
      case 'ge':
        result = order(a, b) >= 0;
        break;
    }
    return result ? 1 : 0;
  }

  private callBuiltin(name: string, args: readonly RuntimeValue[]): RuntimeValue {
    switch (name) {
      case 'print':
        this.output += `${String(args[0] ?? '')}\n`;
        return null;
      case 'printInt':
        this.output += `${Number(args[0])}\n`;
        return null;
      case 'printFloat':
        this.output += `${Number(args[0]).toFixed(6)}\n`;
        return null;
      case 'input':
        return this.input.shift() ?? '';
      case 'sqrt':
        return Math.sqrt(Number(args[0]));
      case 'printf': {
        const text = formatPrintf(String(args[0] ?? ''), args.slice(1));
        this.output += text;
        return text.length;
      }
      default:
        throw new InterpreterError(`No implementation for external function '${name}'`);
    }
  }
}
