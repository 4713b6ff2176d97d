import { createElabEndo } from '../elab_visitor.js';
import type { ElabEndo } from '../elab_visitor.js';
import type { Hint } from '../../types.js';

export const CONTEXTS_NAMESPACE = '\\HH\\Contexts\\';

/**
 * 将上下文位置上未限定的上下文名补全为 `\HH\Contexts\<name>`。
 *
 * 只覆写 `onContext`：与上下文同构的类型位置 hint（例如同名的类名）不受影响。
 */
export function elabContexts<Env, Ex, En>(): ElabEndo<Env, Ex, En> {
  return createElabEndo<Env, Ex, En>((_self, inherited) => ({
    onContext(env, hint) {
      return qualifyContext(inherited.onContext(env, hint));
    },
  }));
}

export function qualifyContext([span, kind]: Hint): Hint {
  if (kind.kind !== 'Happly' || kind.id.name.startsWith('\\')) return [span, kind];
  return [span, { ...kind, id: { ...kind.id, name: `${CONTEXTS_NAMESPACE}${kind.id.name}` } }];
}
