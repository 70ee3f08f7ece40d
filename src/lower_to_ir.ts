/**
 * @module lower_to_ir
 *
 * 已检查 AST 到低层 IR 的降级器。
 *
 * **降级模型**：
 * - 每个局部变量与参数对应一个栈槽，alloca 一律位于入口块
 * - 直接位于程序顶层的变量声明降级为模块全局变量（gload/gstore），
 *   函数体与顶层语句都可以访问
 * - 读取变量为 load，赋值为 store 并产出存入的值
 * - `if` 生成 then/else/ifcont 三个块，`while` 生成 loop/while_body/while_cont
 * - int 与 float 相遇处插入 sitofp/fptosi
 * - 顶层的非函数语句收集到合成的 void 函数中（默认名 `__toplevel`）
 *
 * 降级错误作为诊断记录并置失败标志，生成继续进行。
 */

import { DataType } from './types.js';
import type {
  Assignment,
  Binary,
  Block,
  Call,
  ExprStmt,
  Expression,
  FuncDecl,
  If,
  IR,
  Literal,
  Program,
  Return,
  SourceLocation,
  Statement,
  Unary,
  VarDecl,
  Variable,
  While,
} from './types.js';
import type { AstVisitor } from './ast/ast_visitor.js';
import { visitExpression, visitStatement } from './ast/ast_visitor.js';
import { DiagnosticSink, Diagnostics, type Diagnostic, type DiagnosticBuilder } from './diagnostics/diagnostics.js';
import { FunctionBuilder, Values, externalFunction, zeroValue } from './ir/ir.js';
import { BUILTINS, PRINTF } from './typecheck/builtins.js';
import { ConfigService } from './config/config-service.js';
import { START_LOCATION } from './frontend/location.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('lower_to_ir');

export interface GenerateOptions {
  /** IR 模块名（默认 `main`） */
  moduleName?: string;
  /** 合成顶层函数名（默认取自配置） */
  toplevelName?: string;
}

export interface GenerateResult {
  module: IR.Module;
  success: boolean;
  diagnostics: Diagnostic[];
  /** 合成顶层函数的实际名称；没有顶层语句时为 null */
  toplevel: string | null;
}

interface Signature {
  readonly params: readonly IR.Type[];
  readonly returnType: IR.Type;
}

/** 名称解析的结果：局部栈槽或模块全局变量 */
type Storage = { readonly kind: 'slot'; readonly slot: IR.Slot } | { readonly kind: 'global'; readonly global: IR.Global };

/** 给名称追加 `_` 直到不与已占用的名称冲突 */
function freeName(requested: string, taken: (name: string) => boolean): string {
  let name = requested;
  while (taken(name)) name = `${name}_`;
  return name;
}

/**
 * 数据类型到 IR 类型的映射；unknown（上游检查的缺陷）默认为 i32。
 */
export function toIRType(type: DataType): IR.Type {
  switch (type) {
    case DataType.VOID:
      return 'void';
    case DataType.INT:
      return 'i32';
    case DataType.FLOAT:
      return 'f64';
    case DataType.BOOL:
      return 'i1';
    case DataType.STRING:
      return 'ptr';
    case DataType.FUNCTION:
    case DataType.UNKNOWN:
      return 'i32';
  }
}

const INT_OPCODES: Readonly<Record<'+' | '-' | '*' | '/' | '%', IR.BinaryOpcode>> = {
  '+': 'add',
  '-': 'sub',
  '*': 'mul',
  '/': 'sdiv',
  '%': 'srem',
};

const FLOAT_OPCODES: Readonly<Record<'+' | '-' | '*' | '/' | '%', IR.BinaryOpcode>> = {
  '+': 'fadd',
  '-': 'fsub',
  '*': 'fmul',
  '/': 'fdiv',
  '%': 'frem',
};

const PREDICATES: Readonly<Record<'==' | '!=' | '<' | '<=' | '>' | '>=', IR.ComparePredicate>> = {
  '==': 'eq',
  '!=': 'ne',
  '<': 'lt',
  '<=': 'le',
  '>': 'gt',
  '>=': 'ge',
};

export class IRGenerator implements AstVisitor<IR.Value | null, void> {
  private sink = new DiagnosticSink();
  private failed = false;
  private signatures = new Map<string, Signature>();
  private builder: FunctionBuilder | null = null;
  private scopes: Map<string, IR.Slot>[] = [];
  private globals = new Map<string, IR.Global>();
  private globalDecls = new Map<VarDecl, IR.Global>();

  generate(program: Program, sink: DiagnosticSink = new DiagnosticSink(), options: GenerateOptions = {}): GenerateResult {
    this.sink = sink;
    this.failed = false;
    this.signatures = new Map();
    this.builder = null;
    this.scopes = [];
    this.globals = new Map();
    this.globalDecls = new Map();
    const before = sink.size;

    const funcDecls: FuncDecl[] = [];
    const toplevel: Statement[] = [];
    for (const stmt of program.statements) {
      if (stmt.kind === 'FuncDecl') funcDecls.push(stmt);
      else toplevel.push(stmt);
    }

    const functions: IR.Function[] = [];
    for (const builtin of BUILTINS) {
      const params = builtin.parameterTypes.map((t, i) => ({ name: `arg${i}`, type: toIRType(t) }));
      functions.push(externalFunction(builtin.name, params, toIRType(builtin.returnType)));
    }
    if (!funcDecls.some(f => f.name === PRINTF)) {
      functions.push(externalFunction(PRINTF, [{ name: 'format', type: 'ptr' }], 'i32', true));
    }
    for (const fn of functions) {
      this.signatures.set(fn.name, { params: fn.params.map(p => p.type), returnType: fn.returnType });
    }

    // 先登记全部签名，函数体中的调用与声明顺序无关
    for (const decl of funcDecls) {
      if (this.signatures.has(decl.name)) continue;
      this.signatures.set(decl.name, {
        params: decl.params.map(p => toIRType(p.type)),
        returnType: toIRType(decl.returnType),
      });
    }

    const globals = this.declareGlobals(toplevel);

    // 重复声明只降级第一个，与分析器保留首个符号一致
    const lowered = new Set(functions.map(fn => fn.name));
    for (const decl of funcDecls) {
      if (lowered.has(decl.name)) continue;
      lowered.add(decl.name);
      functions.push(this.lowerFunction(decl));
    }
    let toplevelName: string | null = null;
    if (toplevel.length > 0) {
      const requested = options.toplevelName ?? ConfigService.getInstance().toplevelFunctionName;
      const fn = this.lowerToplevel(
        toplevel,
        freeName(requested, name => this.signatures.has(name) || globals.some(g => g.name === name))
      );
      toplevelName = fn.name;
      functions.push(fn);
    }

    const diagnostics = sink.getDiagnostics().slice(before);
    logger.debug('IR generation finished', {
      functions: functions.length,
      globals: globals.length,
      diagnostics: diagnostics.length,
      success: !this.failed,
    });
    return {
      module: { name: options.moduleName ?? 'main', globals, functions },
      success: !this.failed,
      diagnostics,
      toplevel: toplevelName,
    };
  }

  // ==================== 全局变量 ====================

  /**
   * 顶层变量声明登记为全局变量，初值为类型零值。
   * 与函数同名时追加 `_`；重复声明共用第一个全局变量。
   */
  private declareGlobals(toplevel: readonly Statement[]): IR.Global[] {
    const globals: IR.Global[] = [];
    for (const stmt of toplevel) {
      if (stmt.kind !== 'VarDecl') continue;
      const existing = this.globals.get(stmt.name);
      if (existing) {
        this.globalDecls.set(stmt, existing);
        continue;
      }
      const type = toIRType(stmt.resolvedType);
      const global: IR.Global = {
        name: freeName(stmt.name, name => this.signatures.has(name) || globals.some(g => g.name === name)),
        type,
        initializer: zeroValue(type) ?? Values.int(0),
      };
      globals.push(global);
      this.globals.set(stmt.name, global);
      this.globalDecls.set(stmt, global);
    }
    return globals;
  }

  // ==================== 函数 ====================

  private lowerFunction(decl: FuncDecl): IR.Function {
    const params = decl.params.map(p => ({ name: p.name, type: toIRType(p.type) }));
    const builder = new FunctionBuilder(decl.name, params, toIRType(decl.returnType));
    this.builder = builder;
    this.scopes = [new Map()];

    params.forEach((param, index) => {
      const slot = builder.allocateSlot(param.name, param.type);
      builder.emit({ op: 'store', slot: slot.id, value: Values.param(index, param.name, param.type) });
      this.declare(param.name, slot);
    });
    this.visitBlock(decl.body);
    return this.finishFunction(builder, decl.location);
  }

  private lowerToplevel(statements: readonly Statement[], name: string): IR.Function {
    const builder = new FunctionBuilder(name, [], 'void');
    this.builder = builder;
    this.scopes = [new Map()];
    this.lowerStatements(statements);
    return this.finishFunction(builder, statements[0]?.location ?? START_LOCATION);
  }

  private finishFunction(builder: FunctionBuilder, location: SourceLocation): IR.Function {
    if (!builder.isTerminated() && builder.returnType === 'void') {
      builder.terminate({ op: 'ret', value: null });
    }
    builder.pruneUnreachable();
    for (const block of builder.openBlocks()) {
      this.sink.report(Diagnostics.missingReturn(builder.name, location));
      builder.setInsertPoint(block);
      builder.terminate({ op: 'ret', value: zeroValue(builder.returnType) });
    }
    this.builder = null;
    return builder.build();
  }

  private current(): FunctionBuilder {
    if (!this.builder) throw new Error('no function is being lowered');
    return this.builder;
  }

  private fail(diagnostic: DiagnosticBuilder): null {
    this.sink.report(diagnostic);
    this.failed = true;
    return null;
  }

  // ==================== 作用域 ====================

  private declare(name: string, slot: IR.Slot): void {
    this.scopes[this.scopes.length - 1]?.set(name, slot);
  }

  /** 由内向外查找局部栈槽，最后查找全局变量 */
  private resolve(name: string): Storage | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const slot = this.scopes[i]?.get(name);
      if (slot) return { kind: 'slot', slot };
    }
    const global = this.globals.get(name);
    return global ? { kind: 'global', global } : undefined;
  }

  private typeOf(storage: Storage): IR.Type {
    return storage.kind === 'slot' ? storage.slot.type : storage.global.type;
  }

  private load(storage: Storage): IR.Temp {
    const b = this.current();
    const result = b.newTemp(this.typeOf(storage));
    b.emit(
      storage.kind === 'slot'
        ? { op: 'load', result, slot: storage.slot.id }
        : { op: 'gload', result, global: storage.global.name }
    );
    return result;
  }

  private store(storage: Storage, value: IR.Value): void {
    this.current().emit(
      storage.kind === 'slot'
        ? { op: 'store', slot: storage.slot.id, value }
        : { op: 'gstore', global: storage.global.name, value }
    );
  }

  private withScope(body: () => void): void {
    this.scopes.push(new Map());
    body();
    this.scopes.pop();
  }

  // ==================== 语句 ====================

  /** 终结指令之后的语句不再降级 */
  private lowerStatements(statements: readonly Statement[]): void {
    for (const stmt of statements) {
      if (this.current().isTerminated()) return;
      visitStatement(this, stmt);
    }
  }

  private lowerNested(stmt: Statement): void {
    if (stmt.kind === 'Block') {
      this.visitBlock(stmt);
      return;
    }
    this.withScope(() => visitStatement(this, stmt));
  }

  visitBlock(s: Block): void {
    this.withScope(() => this.lowerStatements(s.statements));
  }

  visitVarDecl(s: VarDecl): void {
    const global = this.globalDecls.get(s);
    const type = global ? global.type : toIRType(s.resolvedType);
    const initial = s.initializer ? this.operand(s.initializer) : zeroValue(type);
    if (global) {
      if (initial) this.store({ kind: 'global', global }, this.coerce(initial, type));
      return;
    }
    const slot = this.current().allocateSlot(s.name, type);
    if (initial) this.store({ kind: 'slot', slot }, this.coerce(initial, type));
    this.declare(s.name, slot);
  }

  visitFuncDecl(s: FuncDecl): void {
    this.fail(Diagnostics.operandFailure(`nested function ${s.name}`, s.location));
  }

  visitIf(s: If): void {
    const b = this.current();
    const condition = this.condition(s.condition);
    const thenBlock = b.createBlock('then');
    const elseBlock = b.createBlock('else');
    const merge = b.createBlock('ifcont');
    b.terminate({ op: 'condbr', condition, ifTrue: thenBlock.id, ifFalse: elseBlock.id });

    b.setInsertPoint(thenBlock);
    this.lowerNested(s.thenBranch);
    if (!b.isTerminated()) b.terminate({ op: 'br', target: merge.id });

    b.setInsertPoint(elseBlock);
    if (s.elseBranch) this.lowerNested(s.elseBranch);
    if (!b.isTerminated()) b.terminate({ op: 'br', target: merge.id });

    b.setInsertPoint(merge);
  }

  visitWhile(s: While): void {
    const b = this.current();
    const loop = b.createBlock('loop');
    const body = b.createBlock('while_body');
    const after = b.createBlock('while_cont');
    b.terminate({ op: 'br', target: loop.id });

    b.setInsertPoint(loop);
    const condition = this.condition(s.condition);
    b.terminate({ op: 'condbr', condition, ifTrue: body.id, ifFalse: after.id });

    b.setInsertPoint(body);
    this.lowerNested(s.body);
    if (!b.isTerminated()) b.terminate({ op: 'br', target: loop.id });

    b.setInsertPoint(after);
  }

  visitReturn(s: Return): void {
    const b = this.current();
    if (b.returnType === 'void') {
      if (s.value) this.lower(s.value);
      b.terminate({ op: 'ret', value: null });
      return;
    }
    const value = s.value ? this.operand(s.value) : null;
    b.terminate({ op: 'ret', value: value ? this.coerce(value, b.returnType) : zeroValue(b.returnType) });
  }

  visitExprStmt(s: ExprStmt): void {
    this.lower(s.expression);
  }

  // ==================== 表达式 ====================

  private lower(e: Expression): IR.Value | null {
    return visitExpression(this, e);
  }

  /** 作为操作数使用的值；void 调用结果不能作为操作数 */
  private operand(e: Expression): IR.Value | null {
    const value = this.lower(e);
    if (value && value.kind === 'Void') {
      return this.fail(Diagnostics.operandFailure('operand: void value used in expression', e.location));
    }
    return value;
  }

  private condition(e: Expression): IR.Value {
    return this.operand(e) ?? Values.bool(false);
  }

  private coerce(value: IR.Value, target: IR.Type): IR.Value {
    if (value.type === target) return value;
    if (value.type === 'i32' && target === 'f64') return this.cast('sitofp', value, target);
    if (value.type === 'f64' && target === 'i32') return this.cast('fptosi', value, target);
    return value;
  }

  private cast(opcode: IR.CastOpcode, value: IR.Value, target: IR.Type): IR.Temp {
    const b = this.current();
    const result = b.newTemp(target);
    b.emit({ op: 'cast', opcode, result, value });
    return result;
  }

  visitLiteral(e: Literal): IR.Value {
    switch (e.literalType) {
      case DataType.INT:
        return Values.int(Number.parseInt(e.value, 10));
      case DataType.FLOAT:
        return Values.float(Number.parseFloat(e.value));
      case DataType.BOOL:
        return Values.bool(e.value === 'true');
      case DataType.STRING:
        return Values.string(e.value);
      default:
        // null
        return Values.int(0);
    }
  }

  visitVariable(e: Variable): IR.Value | null {
    const storage = this.resolve(e.name);
    if (!storage) return this.fail(Diagnostics.unresolvedVariable(e.name, e.location));
    return this.load(storage);
  }

  visitBinary(e: Binary): IR.Value | null {
    const left = this.operand(e.left);
    const right = this.operand(e.right);
    if (!left || !right) return null;
    const b = this.current();

    switch (e.op) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '%': {
        const type = toIRType(e.type) === 'f64' || left.type === 'f64' || right.type === 'f64' ? 'f64' : 'i32';
        const opcode = type === 'f64' ? FLOAT_OPCODES[e.op] : INT_OPCODES[e.op];
        const lhs = this.coerce(left, type);
        const rhs = this.coerce(right, type);
        const result = b.newTemp(type);
        b.emit({ op: 'binary', opcode, result, lhs, rhs });
        return result;
      }
      case '&&':
      case '||': {
        const result = b.newTemp('i1');
        b.emit({ op: 'binary', opcode: e.op === '&&' ? 'and' : 'or', result, lhs: left, rhs: right });
        return result;
      }
      default: {
        const isFloat =
          (left.type === 'f64' && (right.type === 'f64' || right.type === 'i32')) ||
          (right.type === 'f64' && left.type === 'i32');
        const predicate = PREDICATES[e.op];
        if (isFloat) {
          const lhs = this.coerce(left, 'f64');
          const rhs = this.coerce(right, 'f64');
          const result = b.newTemp('i1');
          b.emit({ op: 'fcmp', predicate, result, lhs, rhs });
          return result;
        }
        const result = b.newTemp('i1');
        b.emit({ op: 'icmp', predicate, result, lhs: left, rhs: right });
        return result;
      }
    }
  }

  visitUnary(e: Unary): IR.Value | null {
    const operand = this.operand(e.operand);
    if (!operand) return null;
    const b = this.current();
    const result = b.newTemp(operand.type);
    const opcode: IR.UnaryOpcode = e.op === '!' ? 'not' : operand.type === 'f64' ? 'fneg' : 'neg';
    b.emit({ op: 'unary', opcode, result, operand });
    return result;
  }

  visitAssignment(e: Assignment): IR.Value | null {
    const value = this.operand(e.value);
    const storage = this.resolve(e.name);
    if (!storage) return this.fail(Diagnostics.unresolvedVariable(e.name, e.location));
    if (!value) return null;
    const stored = this.coerce(value, this.typeOf(storage));
    this.store(storage, stored);
    return stored;
  }

  visitCall(e: Call): IR.Value | null {
    const signature = this.signatures.get(e.callee);
    if (!signature) return this.fail(Diagnostics.unresolvedFunction(e.callee, e.location));

    const args: IR.Value[] = [];
    for (const [i, arg] of e.args.entries()) {
      const value = this.operand(arg);
      if (!value) return null;
      const paramType = signature.params[i];
      args.push(paramType ? this.coerce(value, paramType) : value);
    }

    const b = this.current();
    if (signature.returnType === 'void') {
      b.emit({ op: 'call', callee: e.callee, args, returnType: 'void', result: null });
      return Values.void();
    }
    const result = b.newTemp(signature.returnType);
    b.emit({ op: 'call', callee: e.callee, args, returnType: signature.returnType, result });
    return result;
  }
}

/**
 * 将已检查的程序降级为 IR 模块（便捷入口）
 */
export function generate(program: Program, sink?: DiagnosticSink, options?: GenerateOptions): GenerateResult {
  return new IRGenerator().generate(program, sink, options);
}
