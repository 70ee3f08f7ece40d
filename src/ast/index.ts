/**
 * @module ast
 *
 * AST（抽象语法树）模块。
 *
 * 包含：
 * - AST 节点构造器 (Node)
 * - AST 访问者接口与分派函数 (AstVisitor, visitExpression, visitStatement)
 */

export { Node } from './ast.js';
export { visitExpression, visitStatement } from './ast_visitor.js';
export type { AstVisitor } from './ast_visitor.js';
