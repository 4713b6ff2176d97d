import { createElabEndo } from '../elab_visitor.js';
import type { ElabEndo } from '../elab_visitor.js';
import type { Hint, HintKind, Tprim } from '../../types.js';

// 保留的基本类型名：无类型实参的 Happly 改写为专用的 hint 种类
const PRIMITIVES: ReadonlyMap<string, Tprim> = new Map<string, Tprim>([
  ['null', 'Tnull'],
  ['void', 'Tvoid'],
  ['int', 'Tint'],
  ['bool', 'Tbool'],
  ['float', 'Tfloat'],
  ['string', 'Tstring'],
  ['resource', 'Tresource'],
  ['num', 'Tnum'],
  ['arraykey', 'Tarraykey'],
  ['noreturn', 'Tnoreturn'],
]);

const SPECIAL_HINTS: ReadonlyMap<string, HintKind> = new Map<string, HintKind>([
  ['mixed', { kind: 'Hmixed' }],
  ['nonnull', { kind: 'Hnonnull' }],
  ['this', { kind: 'Hthis' }],
  ['nothing', { kind: 'Hnothing' }],
  ['dynamic', { kind: 'Hdynamic' }],
  ['_', { kind: 'Hwildcard' }],
]);

/**
 * 将内建类型名的 `Happly` 规范化。
 *
 * 只覆写 `onHint`：先按默认实现改写子节点，再规范化当前节点，
 * 因此类型位置与上下文位置上的 hint 都会被处理。带类型实参的 `Happly`
 * 与带命名空间前缀的名字保持原样。
 */
export function elabHapplyHint<Env, Ex, En>(): ElabEndo<Env, Ex, En> {
  return createElabEndo<Env, Ex, En>((_self, inherited) => ({
    onHint(env, hint) {
      return canonicalizeHint(inherited.onHint(env, hint));
    },
  }));
}

export function canonicalizeHint([span, kind]: Hint): Hint {
  if (kind.kind !== 'Happly' || kind.args.length > 0) return [span, kind];
  const name = kind.id.name;
  const prim = PRIMITIVES.get(name);
  if (prim !== undefined) return [span, { kind: 'Hprim', prim }];
  const special = SPECIAL_HINTS.get(name);
  return [span, special ?? kind];
}
