import { createElabEndo } from '../elab_visitor.js';
import type { ElabEndo } from '../elab_visitor.js';

/**
 * 只改写元数据的遍历器：结构部分全部沿用默认实现。
 *
 * @param onEx - 表达式级标注的改写函数
 * @param onEn - 声明级标注的改写函数
 */
export function relabelAnnotations<Env, Ex, En>(
  onEx: (env: Env, ex: Ex) => Ex,
  onEn: (env: Env, en: En) => En
): ElabEndo<Env, Ex, En> {
  return createElabEndo<Env, Ex, En>(() => ({
    onExprAnnotation: onEx,
    onDeclAnnotation: onEn,
  }));
}
