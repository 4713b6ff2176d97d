import { createElabEndo } from '../elab_visitor.js';
import type { ElabEndo } from '../elab_visitor.js';
import type { Hint } from '../../types.js';

/**
 * 去掉类继承关系中类名的前导 `\`（`\Foo\Bar` → `Foo\Bar`）。
 *
 * 覆写 extends / implements / uses 三个字段钩子，以及 require 子句经由的
 * `onClassHint`；类体中的其他 hint 不受影响。
 */
export function elabClassNames<Env, Ex, En>(): ElabEndo<Env, Ex, En> {
  return createElabEndo<Env, Ex, En>((_self, inherited) => ({
    onClassExtends: (env, hints) => inherited.onClassExtends(env, hints).map(stripLeadingBackslash),
    onClassImplements: (env, hints) => inherited.onClassImplements(env, hints).map(stripLeadingBackslash),
    onClassUses: (env, hints) => inherited.onClassUses(env, hints).map(stripLeadingBackslash),
    onClassHint: (env, hint) => stripLeadingBackslash(inherited.onClassHint(env, hint)),
  }));
}

export function stripLeadingBackslash([span, kind]: Hint): Hint {
  if (kind.kind !== 'Happly' || !kind.id.name.startsWith('\\')) return [span, kind];
  return [span, { ...kind, id: { ...kind.id, name: kind.id.name.slice(1) } }];
}
