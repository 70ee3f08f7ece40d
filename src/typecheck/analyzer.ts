/**
 * @module typecheck/analyzer
 *
 * 语义分析器：一次前序遍历完成名称解析与类型检查。
 *
 * - 表达式的 `type` 字段与 VarDecl 的 `resolvedType` 在遍历中回填
 * - 从不提前终止；所有错误都累积为诊断
 * - 每次 analyze() 使用全新状态，对同一 Program 重复分析得到相同的诊断
 */

import { DataType } from '../types.js';
import type {
  Assignment,
  Binary,
  Block,
  Call,
  ExprStmt,
  Expression,
  FuncDecl,
  If,
  Literal,
  Program,
  Return,
  SourceLocation,
  Statement,
  Unary,
  VarDecl,
  Variable,
  While,
} from '../types.js';
import type { AstVisitor } from '../ast/ast_visitor.js';
import { visitExpression, visitStatement } from '../ast/ast_visitor.js';
import {
  DiagnosticSeverity,
  DiagnosticSink,
  Diagnostics,
  type Diagnostic,
} from '../diagnostics/diagnostics.js';
import { SymbolTable, functionSymbol, variableSymbol, type Symbol } from './symbol_table.js';
import { binaryResultType, isCompatible, unaryResultType } from './type_system.js';
import { BUILTINS } from './builtins.js';
import { START_LOCATION } from '../frontend/location.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('typecheck');

export interface AnalysisResult {
  success: boolean;
  diagnostics: Diagnostic[];
}

interface FunctionContext {
  readonly returnType: DataType;
}

export class SemanticAnalyzer implements AstVisitor<DataType, void> {
  private symbols = new SymbolTable();
  private sink = new DiagnosticSink();
  private currentFunction: FunctionContext | null = null;
  /** 当前函数体（或顶层）中已报告过的未定义变量名 */
  private reportedUndefined = new Set<string>();

  analyze(program: Program, sink: DiagnosticSink = new DiagnosticSink()): AnalysisResult {
    this.symbols = new SymbolTable();
    this.sink = sink;
    this.currentFunction = null;
    this.reportedUndefined = new Set<string>();
    for (const builtin of BUILTINS) {
      this.symbols.insert(
        builtin.name,
        functionSymbol(builtin.name, builtin.parameterTypes, builtin.returnType, START_LOCATION)
      );
    }

    const before = sink.size;
    for (const stmt of program.statements) {
      visitStatement(this, stmt);
    }
    const diagnostics = sink.getDiagnostics().slice(before);
    logger.debug('Semantic analysis finished', {
      statements: program.statements.length,
      diagnostics: diagnostics.length,
    });
    return {
      success: !diagnostics.some(d => d.severity === DiagnosticSeverity.Error),
      diagnostics,
    };
  }

  // ==================== 表达式 ====================

  private check(e: Expression): DataType {
    const type = visitExpression(this, e);
    e.type = type;
    return type;
  }

  visitLiteral(e: Literal): DataType {
    return e.literalType;
  }

  visitVariable(e: Variable): DataType {
    const symbol = this.resolveVariable(e.name, e.location);
    return symbol ? symbol.type : DataType.UNKNOWN;
  }

  visitBinary(e: Binary): DataType {
    const left = this.check(e.left);
    const right = this.check(e.right);
    if (left === DataType.UNKNOWN || right === DataType.UNKNOWN) return DataType.UNKNOWN;

    const result = binaryResultType(e.op, left, right);
    if (result === null) {
      this.sink.report(Diagnostics.invalidOperation(`Invalid operation between types ${left} and ${right}`, e.location));
      return DataType.UNKNOWN;
    }
    return result;
  }

  visitUnary(e: Unary): DataType {
    const operand = this.check(e.operand);
    if (operand === DataType.UNKNOWN) return DataType.UNKNOWN;

    const result = unaryResultType(e.op, operand);
    if (result === null) {
      this.sink.report(Diagnostics.invalidOperation(`Invalid unary operation on type ${operand}`, e.location));
      return DataType.UNKNOWN;
    }
    return result;
  }

  visitAssignment(e: Assignment): DataType {
    const valueType = this.check(e.value);
    const symbol = this.resolveVariable(e.name, e.location);
    if (!symbol) return DataType.UNKNOWN;

    if (symbol.isConstant) {
      this.sink.report(Diagnostics.assignToConstant(e.name, e.location));
    } else if (!isCompatible(valueType, symbol.type)) {
      this.sink.report(
        Diagnostics.typeMismatch(`Cannot assign ${valueType} to variable of type ${symbol.type}`, e.location)
      );
    }
    return symbol.type;
  }

  visitCall(e: Call): DataType {
    const argTypes = e.args.map(arg => this.check(arg));
    const symbol = this.symbols.lookup(e.callee);
    if (!symbol || !symbol.isFunction) {
      this.sink.report(Diagnostics.undefinedFunction(e.callee, e.location));
      return DataType.UNKNOWN;
    }

    if (argTypes.length !== symbol.parameterTypes.length) {
      this.sink.report(
        Diagnostics.arityMismatch(e.callee, symbol.parameterTypes.length, argTypes.length, e.location)
      );
      return symbol.returnType;
    }

    argTypes.forEach((argType, i) => {
      const expected = symbol.parameterTypes[i] ?? DataType.UNKNOWN;
      if (!isCompatible(argType, expected)) {
        this.sink.report(
          Diagnostics.typeMismatch(
            `Argument ${i + 1} type mismatch in call to ${e.callee}: expected ${expected}, got ${argType}`,
            e.args[i]?.location ?? e.location
          )
        );
      }
    });
    return symbol.returnType;
  }

  /**
   * 解析变量引用，由内向外查找作用域。未定义的名称在每个函数体（或顶层）内只报告一次；
   * 函数名不能作为值读写。
   */
  private resolveVariable(name: string, location: SourceLocation): Symbol | undefined {
    const symbol = this.symbols.lookup(name);
    if (!symbol) {
      if (!this.reportedUndefined.has(name)) {
        this.reportedUndefined.add(name);
        this.sink.report(Diagnostics.undefinedVariable(name, location));
      }
      return undefined;
    }
    if (symbol.isFunction) {
      this.sink.report(Diagnostics.functionAsValue(name, location));
      return undefined;
    }
    return symbol;
  }

  // ==================== 语句 ====================

  visitBlock(s: Block): void {
    this.symbols.enterScope();
    for (const stmt of s.statements) visitStatement(this, stmt);
    this.symbols.exitScope();
  }

  visitVarDecl(s: VarDecl): void {
    const initType = s.initializer ? this.check(s.initializer) : DataType.UNKNOWN;
    const isConstant = s.keyword === 'const';

    if (isConstant && !s.initializer) {
      this.sink.report(Diagnostics.invalidValue(`Constant ${s.name} must be initialized`, s.location));
    }

    let resolved = s.declaredType;
    if (resolved === DataType.UNKNOWN) {
      resolved = initType;
    } else if (s.initializer && !isCompatible(initType, resolved)) {
      this.sink.report(Diagnostics.typeMismatch(`Cannot initialize ${resolved} with ${initType}`, s.location));
    }
    if (resolved === DataType.VOID) {
      this.sink.report(Diagnostics.invalidValue(`Variable ${s.name} cannot have type void`, s.location));
    }
    s.resolvedType = resolved;

    const symbol = variableSymbol(s.name, resolved, s.location, isConstant);
    if (this.symbols.lookupCurrentScope(s.name)) {
      // 同一作用域内重复声明：报告后以新符号替换
      this.sink.report(Diagnostics.alreadyDeclared('Variable', s.name, s.location));
      this.symbols.replace(s.name, symbol);
    } else {
      this.symbols.insert(s.name, symbol);
    }
  }

  visitFuncDecl(s: FuncDecl): void {
    // 函数只能直接声明在程序顶层（全局作用域）
    if (this.symbols.depth() > 0) {
      this.sink.report(Diagnostics.misplacedFunction(s.name, s.location));
    }

    const symbol = functionSymbol(
      s.name,
      s.params.map(p => p.type),
      s.returnType,
      s.location
    );
    if (!this.symbols.insert(s.name, symbol)) {
      this.sink.report(Diagnostics.alreadyDeclared('Function', s.name, s.location));
    }

    const savedFunction = this.currentFunction;
    const savedUndefined = this.reportedUndefined;
    this.currentFunction = { returnType: s.returnType };
    this.reportedUndefined = new Set<string>();
    this.symbols.enterScope();

    for (const param of s.params) {
      if (param.type === DataType.VOID) {
        this.sink.report(Diagnostics.invalidValue(`Parameter ${param.name} cannot have type void`, param.location));
      }
      if (!this.symbols.insert(param.name, variableSymbol(param.name, param.type, param.location))) {
        this.sink.report(Diagnostics.alreadyDeclared('Parameter', param.name, param.location));
      }
    }
    this.visitBlock(s.body);

    this.symbols.exitScope();
    this.currentFunction = savedFunction;
    this.reportedUndefined = savedUndefined;
  }

  visitIf(s: If): void {
    const conditionType = this.check(s.condition);
    if (conditionType !== DataType.BOOL && conditionType !== DataType.UNKNOWN) {
      this.sink.report(Diagnostics.nonBooleanCondition('If', s.condition.location));
    }
    this.checkNested(s.thenBranch);
    if (s.elseBranch) this.checkNested(s.elseBranch);
  }

  visitWhile(s: While): void {
    const conditionType = this.check(s.condition);
    if (conditionType !== DataType.BOOL && conditionType !== DataType.UNKNOWN) {
      this.sink.report(Diagnostics.nonBooleanCondition('While', s.condition.location));
    }
    this.checkNested(s.body);
  }

  visitReturn(s: Return): void {
    const valueType = s.value ? this.check(s.value) : DataType.VOID;
    if (!this.currentFunction) {
      this.sink.report(Diagnostics.returnOutsideFunction(s.location));
      return;
    }
    const expected = this.currentFunction.returnType;
    if (!isCompatible(valueType, expected)) {
      this.sink.report(
        Diagnostics.typeMismatch(`Return type mismatch: expected ${expected}, got ${valueType}`, s.location)
      );
    }
  }

  visitExprStmt(s: ExprStmt): void {
    this.check(s.expression);
  }

  /**
   * 分支与循环体中的单条语句。非块语句的声明同样只在该分支内可见。
   */
  private checkNested(stmt: Statement): void {
    if (stmt.kind === 'Block') {
      this.visitBlock(stmt);
      return;
    }
    this.symbols.enterScope();
    visitStatement(this, stmt);
    this.symbols.exitScope();
  }
}

/**
 * 对程序执行语义分析（便捷入口）
 */
export function analyze(program: Program, sink?: DiagnosticSink): AnalysisResult {
  return new SemanticAnalyzer().analyze(program, sink);
}
