/**
 * @module aast-elab
 *
 * 编译器前端的 AAST 细化层：在基础改写遍历器之上提供字段级、序列级与位置级的覆写点，
 * 让每个细化 pass 只覆写自己关心的部分。
 *
 * @example 基础用法
 * ```typescript
 * import { createElabEndo, Node } from 'aast-elab';
 *
 * const v2 = createElabEndo<null, null, null>((_self, inherited) => ({
 *   onClassExtends: (env, hints) => inherited.onClassExtends(env, hints).map(renameToV2),
 * }));
 * const out = v2.onClass(null, Node.Class(null, 'C', { extends: [Node.Happly('A')] }));
 * ```
 */

// AAST 构造器与基础遍历器
export { Node, aastEndoDefaults } from './ast/index.js';
export type { AastEndo, AastEndoBase } from './ast/index.js';

// 细化遍历器与 pass
export * from './elab/index.js';

// 配置、日志与诊断
export { ConfigService } from './config/config-service.js';
export { Logger, LogLevel, createLogger, logPerformance } from './utils/logger.js';
export type { LogMetadata, LogSink, PerformanceMetrics } from './utils/logger.js';
export * from './diagnostics/index.js';

// 类型定义重导出
export type * from './types.js';
