import { ConfigService } from '../config/config-service.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { createLogger, logPerformance } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { Program } from '../types.js';
import type { ElabEndo } from './elab_visitor.js';
import { elabClassNames } from './passes/elab_class_names.js';
import { elabContexts } from './passes/elab_contexts.js';
import { elabHapplyHint } from './passes/elab_happly_hint.js';
import { elabUserAttributes } from './passes/elab_user_attributes.js';

/** 细化 pass 工厂：对环境与两个元数据槽均无要求 */
export type PassFactory = <Env, Ex, En>() => ElabEndo<Env, Ex, En>;

export const PASS_REGISTRY = {
  elab_happly_hint: elabHapplyHint,
  elab_class_names: elabClassNames,
  elab_contexts: elabContexts,
  elab_user_attributes: elabUserAttributes,
} satisfies Record<string, PassFactory>;

export type PassName = keyof typeof PASS_REGISTRY;

export const DEFAULT_PASS_ORDER: readonly PassName[] = [
  'elab_happly_hint',
  'elab_class_names',
  'elab_contexts',
  'elab_user_attributes',
];

export interface ResolvedPass {
  readonly name: PassName;
  readonly factory: PassFactory;
}

export function isPassName(name: string): name is PassName {
  return Object.prototype.hasOwnProperty.call(PASS_REGISTRY, name);
}

/**
 * 按给定顺序解析 pass 名称。
 *
 * @throws {DiagnosticError} 名称未注册（E001）或重复出现（E002）
 */
export function resolvePasses(names: readonly string[]): readonly ResolvedPass[] {
  const seen = new Set<PassName>();
  return names.map(name => {
    if (!isPassName(name)) {
      return Diagnostics.unknownPass(name, DEFAULT_PASS_ORDER).throw();
    }
    if (seen.has(name)) {
      return Diagnostics.duplicatePass(name).throw();
    }
    seen.add(name);
    return { name, factory: PASS_REGISTRY[name] };
  });
}

export interface ElaborateOptions {
  /** pass 名称列表；缺省时取 ELAB_PASSES 配置，再缺省时取 DEFAULT_PASS_ORDER */
  readonly passes?: readonly string[];
  readonly logger?: Logger;
}

/**
 * 依次运行细化 pass，每个 pass 都以上一个 pass 的输出为输入。
 *
 * 每个 pass 的遍历器在运行前构造、运行后丢弃；同一个 env 传给所有 pass。
 */
export function elaborateProgram<Env, Ex, En>(
  env: Env,
  program: Program<Ex, En>,
  options: ElaborateOptions = {}
): Program<Ex, En> {
  const logger = options.logger ?? createLogger('elab');
  const names = options.passes ?? ConfigService.getInstance().elabPasses ?? DEFAULT_PASS_ORDER;
  const passes = resolvePasses(names);

  const start = performance.now();
  let current = program;
  for (const pass of passes) {
    const passStart = performance.now();
    const visitor = pass.factory<Env, Ex, En>();
    current = visitor.onProgram(env, current);
    logPerformance(
      {
        component: 'elab',
        operation: pass.name,
        duration: performance.now() - passStart,
        metadata: { defs: current.length },
      },
      logger
    );
  }

  logger.info('elaboration finished', {
    passes: passes.map(p => p.name),
    defs: current.length,
    duration_ms: performance.now() - start,
  });
  return current;
}
