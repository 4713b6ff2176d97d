/**
 * @module ast
 *
 * AAST（带标注的抽象语法树）模块。
 *
 * 包含：
 * - AAST 节点构造器 (Node)
 * - 基础改写遍历器 (AastEndo, aastEndoDefaults)
 */

export { Node } from './ast.js';
export { aastEndoDefaults } from './ast_visitor.js';
export type { AastEndo, AastEndoBase } from './ast_visitor.js';
