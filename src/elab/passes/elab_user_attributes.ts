import { createElabEndo } from '../elab_visitor.js';
import type { ElabEndo } from '../elab_visitor.js';
import type { UserAttribute } from '../../types.js';

/**
 * 去除同一属性列表中重名的用户属性，保留首次出现的项，其余项的相对顺序不变。
 *
 * 只覆写 `onUserAttributes`，因此类、类变量、函数、方法、参数以及文件属性上的
 * 每一个属性列表都会经过这里。
 */
export function elabUserAttributes<Env, Ex, En>(): ElabEndo<Env, Ex, En> {
  return createElabEndo<Env, Ex, En>((_self, inherited) => ({
    onUserAttributes(env, attrs) {
      return dedupeUserAttributes(inherited.onUserAttributes(env, attrs));
    },
  }));
}

export function dedupeUserAttributes<Ex, En>(
  attrs: readonly UserAttribute<Ex, En>[]
): readonly UserAttribute<Ex, En>[] {
  const seen = new Set<string>();
  return attrs.filter(attr => {
    if (seen.has(attr.name.name)) return false;
    seen.add(attr.name.name);
    return true;
  });
}
