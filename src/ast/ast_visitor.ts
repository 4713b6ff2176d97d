import type {
  Block,
  CallArg,
  Class,
  ClassConst,
  ClassConstKind,
  ClassTypeconst,
  ClassTypeconstDef,
  ClassVar,
  Contexts,
  Def,
  Enum,
  Expr,
  ExprKind,
  FileAttribute,
  Fun,
  FunDef,
  FunParam,
  FuncBody,
  Gconst,
  Hint,
  HintFun,
  HintKind,
  Method,
  Program,
  RequireKind,
  Stmt,
  StmtKind,
  Targ,
  Tparam,
  TparamConstraint,
  TypeHint,
  UserAttribute,
  WhereConstraintHint,
  XhpAttr,
} from '../types.js';

/**
 * AAST 的基础改写遍历器（endo：输入与输出为同一种节点）。
 *
 * - 每种节点一个 `onXxx(env, node)` 方法，默认实现对每个子字段做深度复制式递归
 * - `onList` / `onOption` 为通用组合子，保持元素顺序与个数，并把同一个 env 传给每个元素
 * - `env` 为只读的环境值，遍历只转发，从不修改
 *
 * 所有递归调用都经由 `self()` 取得的“当前生效的”遍历器完成，
 * 因此任何一层对某个方法的覆写，在整棵树的所有调用点都可见。
 */
export interface AastEndo<Env, Ex, En> {
  // 元数据槽：基础层不提供默认实现
  onExprAnnotation(env: Env, ex: Ex): Ex;
  onDeclAnnotation(env: Env, en: En): En;

  onList<A>(f: (env: Env, a: A) => A, env: Env, xs: readonly A[]): readonly A[];
  onOption<A>(f: (env: Env, a: A) => A, env: Env, x: A | null): A | null;

  onProgram(env: Env, p: Program<Ex, En>): Program<Ex, En>;
  onDef(env: Env, d: Def<Ex, En>): Def<Ex, En>;
  onFunDef(env: Env, fd: FunDef<Ex, En>): FunDef<Ex, En>;
  onFun(env: Env, f: Fun<Ex, En>): Fun<Ex, En>;
  onMethod(env: Env, m: Method<Ex, En>): Method<Ex, En>;
  onFunParam(env: Env, p: FunParam<Ex, En>): FunParam<Ex, En>;
  onFuncBody(env: Env, b: FuncBody<Ex, En>): FuncBody<Ex, En>;
  onClass(env: Env, c: Class<Ex, En>): Class<Ex, En>;
  onClassVar(env: Env, cv: ClassVar<Ex, En>): ClassVar<Ex, En>;
  onClassConst(env: Env, cc: ClassConst<Ex, En>): ClassConst<Ex, En>;
  onClassConstKind(env: Env, k: ClassConstKind<Ex, En>): ClassConstKind<Ex, En>;
  onClassTypeconstDef(env: Env, tc: ClassTypeconstDef): ClassTypeconstDef;
  onClassTypeconst(env: Env, k: ClassTypeconst): ClassTypeconst;
  onXhpAttr(env: Env, xa: XhpAttr<Ex, En>): XhpAttr<Ex, En>;
  onEnum(env: Env, e: Enum): Enum;
  onClassHint(env: Env, h: Hint): Hint;
  onRequireKind(env: Env, k: RequireKind): RequireKind;
  onGconst(env: Env, cst: Gconst<Ex, En>): Gconst<Ex, En>;
  onTparam(env: Env, tp: Tparam): Tparam;
  onWhereConstraintHint(env: Env, wc: WhereConstraintHint): WhereConstraintHint;
  onUserAttribute(env: Env, ua: UserAttribute<Ex, En>): UserAttribute<Ex, En>;
  onFileAttribute(env: Env, fa: FileAttribute<Ex, En>): FileAttribute<Ex, En>;
  onTypeHint(env: Env, th: TypeHint<Ex>): TypeHint<Ex>;
  onTarg(env: Env, t: Targ<Ex>): Targ<Ex>;
  onHint(env: Env, h: Hint): Hint;
  onHintFun(env: Env, hf: HintFun): HintFun;
  onContexts(env: Env, ctxs: Contexts): Contexts;
  onBlock(env: Env, b: Block<Ex, En>): Block<Ex, En>;
  onStmt(env: Env, s: Stmt<Ex, En>): Stmt<Ex, En>;
  onExpr(env: Env, e: Expr<Ex, En>): Expr<Ex, En>;
}

/** 基础层实际提供的方法：除两个元数据槽之外的全部方法 */
export type AastEndoBase<Env, Ex, En> = Omit<
  AastEndo<Env, Ex, En>,
  'onExprAnnotation' | 'onDeclAnnotation'
>;

/**
 * 构造基础层的默认递归实现。
 *
 * @param self - 返回最终组合好的遍历器；仅在遍历时调用
 */
export function aastEndoDefaults<Env, Ex, En>(
  self: () => AastEndo<Env, Ex, En>
): AastEndoBase<Env, Ex, En> {
  return {
    onList(f, env, xs) {
      return xs.map(x => f(env, x));
    },

    onOption(f, env, x) {
      return x === null ? null : f(env, x);
    },

    onProgram(env, p) {
      const v = self();
      return v.onList(v.onDef, env, p);
    },

    onDef(env, d) {
      const v = self();
      switch (d.kind) {
        case 'Fun':
          return { kind: 'Fun', def: v.onFunDef(env, d.def) };
        case 'Class':
          return { kind: 'Class', def: v.onClass(env, d.def) };
        case 'Constant':
          return { kind: 'Constant', def: v.onGconst(env, d.def) };
        case 'Stmt':
          return { kind: 'Stmt', def: v.onStmt(env, d.def) };
      }
    },

    onFunDef(env, fd) {
      return { ...fd, fun: self().onFun(env, fd.fun) };
    },

    onFun(env, f) {
      const v = self();
      return {
        ...f,
        annotation: v.onDeclAnnotation(env, f.annotation),
        ret: v.onTypeHint(env, f.ret),
        tparams: v.onList(v.onTparam, env, f.tparams),
        whereConstraints: v.onList(v.onWhereConstraintHint, env, f.whereConstraints),
        params: v.onList(v.onFunParam, env, f.params),
        ctxs: v.onOption(v.onContexts, env, f.ctxs),
        unsafeCtxs: v.onOption(v.onContexts, env, f.unsafeCtxs),
        body: v.onFuncBody(env, f.body),
        userAttributes: v.onList(v.onUserAttribute, env, f.userAttributes),
      };
    },

    onMethod(env, m) {
      const v = self();
      return {
        ...m,
        annotation: v.onDeclAnnotation(env, m.annotation),
        tparams: v.onList(v.onTparam, env, m.tparams),
        whereConstraints: v.onList(v.onWhereConstraintHint, env, m.whereConstraints),
        params: v.onList(v.onFunParam, env, m.params),
        ctxs: v.onOption(v.onContexts, env, m.ctxs),
        unsafeCtxs: v.onOption(v.onContexts, env, m.unsafeCtxs),
        body: v.onFuncBody(env, m.body),
        userAttributes: v.onList(v.onUserAttribute, env, m.userAttributes),
        ret: v.onTypeHint(env, m.ret),
      };
    },

    onFunParam(env, p) {
      const v = self();
      return {
        ...p,
        annotation: v.onExprAnnotation(env, p.annotation),
        typeHint: v.onTypeHint(env, p.typeHint),
        expr: v.onOption(v.onExpr, env, p.expr),
        userAttributes: v.onList(v.onUserAttribute, env, p.userAttributes),
      };
    },

    onFuncBody(env, b) {
      return { ...b, fbAst: self().onBlock(env, b.fbAst) };
    },

    onClass(env, c) {
      const v = self();
      return {
        ...c,
        annotation: v.onDeclAnnotation(env, c.annotation),
        tparams: v.onList(v.onTparam, env, c.tparams),
        extends: v.onList(v.onHint, env, c.extends),
        uses: v.onList(v.onHint, env, c.uses),
        xhpAttrs: v.onList(v.onXhpAttr, env, c.xhpAttrs),
        xhpAttrUses: v.onList(v.onHint, env, c.xhpAttrUses),
        reqs: v.onList(
          (e: Env, [hint, kind]: readonly [Hint, RequireKind]): readonly [Hint, RequireKind] => [
            v.onClassHint(e, hint),
            v.onRequireKind(e, kind),
          ],
          env,
          c.reqs
        ),
        implements: v.onList(v.onHint, env, c.implements),
        whereConstraints: v.onList(v.onWhereConstraintHint, env, c.whereConstraints),
        consts: v.onList(v.onClassConst, env, c.consts),
        typeconsts: v.onList(v.onClassTypeconstDef, env, c.typeconsts),
        vars: v.onList(v.onClassVar, env, c.vars),
        enum: v.onOption(v.onEnum, env, c.enum),
        methods: v.onList(v.onMethod, env, c.methods),
        userAttributes: v.onList(v.onUserAttribute, env, c.userAttributes),
        fileAttributes: v.onList(v.onFileAttribute, env, c.fileAttributes),
      };
    },

    onClassVar(env, cv) {
      const v = self();
      return {
        ...cv,
        userAttributes: v.onList(v.onUserAttribute, env, cv.userAttributes),
        expr: v.onOption(v.onExpr, env, cv.expr),
        type: v.onTypeHint(env, cv.type),
      };
    },

    onClassConst(env, cc) {
      const v = self();
      return {
        ...cc,
        type: v.onOption(v.onHint, env, cc.type),
        kind: v.onClassConstKind(env, cc.kind),
      };
    },

    onClassConstKind(env, k) {
      const v = self();
      switch (k.kind) {
        case 'CCAbstract':
          return { ...k, default: v.onOption(v.onExpr, env, k.default) };
        case 'CCConcrete':
          return { ...k, expr: v.onExpr(env, k.expr) };
      }
    },

    onClassTypeconstDef(env, tc) {
      return { ...tc, kind: self().onClassTypeconst(env, tc.kind) };
    },

    onClassTypeconst(env, k) {
      const v = self();
      switch (k.kind) {
        case 'TCAbstract':
          return {
            ...k,
            asConstraint: v.onOption(v.onHint, env, k.asConstraint),
            superConstraint: v.onOption(v.onHint, env, k.superConstraint),
            default: v.onOption(v.onHint, env, k.default),
          };
        case 'TCConcrete':
          return { ...k, hint: v.onHint(env, k.hint) };
      }
    },

    onXhpAttr(env, xa) {
      const v = self();
      return {
        ...xa,
        typeHint: v.onTypeHint(env, xa.typeHint),
        classVar: v.onClassVar(env, xa.classVar),
        enumValues: v.onOption(
          (e: Env, values: readonly Expr<Ex, En>[]) => v.onList(v.onExpr, e, values),
          env,
          xa.enumValues
        ),
      };
    },

    onEnum(env, e) {
      const v = self();
      return {
        ...e,
        base: v.onHint(env, e.base),
        constraint: v.onOption(v.onHint, env, e.constraint),
        includes: v.onList(v.onHint, env, e.includes),
      };
    },

    onClassHint(env, h) {
      return self().onHint(env, h);
    },

    onRequireKind(_env, k) {
      return k;
    },

    onGconst(env, cst) {
      const v = self();
      return {
        ...cst,
        annotation: v.onDeclAnnotation(env, cst.annotation),
        type: v.onOption(v.onHint, env, cst.type),
        value: v.onExpr(env, cst.value),
      };
    },

    onTparam(env, tp) {
      const v = self();
      return {
        ...tp,
        constraints: v.onList(
          (e: Env, [kind, hint]: TparamConstraint): TparamConstraint => [kind, v.onHint(e, hint)],
          env,
          tp.constraints
        ),
      };
    },

    onWhereConstraintHint(env, [lhs, kind, rhs]) {
      const v = self();
      return [v.onHint(env, lhs), kind, v.onHint(env, rhs)];
    },

    onUserAttribute(env, ua) {
      const v = self();
      return { ...ua, params: v.onList(v.onExpr, env, ua.params) };
    },

    onFileAttribute(env, fa) {
      const v = self();
      return { ...fa, userAttributes: v.onList(v.onUserAttribute, env, fa.userAttributes) };
    },

    onTypeHint(env, [ex, hint]) {
      const v = self();
      return [v.onExprAnnotation(env, ex), v.onOption(v.onHint, env, hint)];
    },

    onTarg(env, [ex, hint]) {
      const v = self();
      return [v.onExprAnnotation(env, ex), v.onHint(env, hint)];
    },

    onHint(env, [span, kind]) {
      return [span, transformHintKind(self(), env, kind)];
    },

    onHintFun(env, hf) {
      const v = self();
      return {
        ...hf,
        paramTys: v.onList(v.onHint, env, hf.paramTys),
        variadicTy: v.onOption(v.onHint, env, hf.variadicTy),
        ctxs: v.onOption(v.onContexts, env, hf.ctxs),
        returnTy: v.onHint(env, hf.returnTy),
      };
    },

    onContexts(env, [span, hints]) {
      const v = self();
      return [span, v.onList(v.onHint, env, hints)];
    },

    onBlock(env, b) {
      const v = self();
      return v.onList(v.onStmt, env, b);
    },

    onStmt(env, [span, kind]) {
      return [span, transformStmtKind(self(), env, kind)];
    },

    onExpr(env, [ex, span, kind]) {
      const v = self();
      return [v.onExprAnnotation(env, ex), span, transformExprKind(v, env, kind)];
    },
  };
}

function transformHintKind<Env, Ex, En>(
  v: AastEndo<Env, Ex, En>,
  env: Env,
  kind: HintKind
): HintKind {
  switch (kind.kind) {
    case 'Happly':
      return { ...kind, args: v.onList(v.onHint, env, kind.args) };
    case 'Hoption':
    case 'Hlike':
      return { ...kind, hint: v.onHint(env, kind.hint) };
    case 'Htuple':
    case 'Hunion':
    case 'Hintersection':
      return { ...kind, hints: v.onList(v.onHint, env, kind.hints) };
    case 'Haccess':
      return { ...kind, root: v.onHint(env, kind.root) };
    case 'Hfun':
      return { ...kind, fun: v.onHintFun(env, kind.fun) };
    case 'Hprim':
    case 'Hmixed':
    case 'Hnonnull':
    case 'Hthis':
    case 'Hnothing':
    case 'Hdynamic':
    case 'Hwildcard':
      return kind;
  }
}

function transformStmtKind<Env, Ex, En>(
  v: AastEndo<Env, Ex, En>,
  env: Env,
  kind: StmtKind<Ex, En>
): StmtKind<Ex, En> {
  switch (kind.kind) {
    case 'Expr':
    case 'Throw':
      return { ...kind, expr: v.onExpr(env, kind.expr) };
    case 'Return':
      return { ...kind, expr: v.onOption(v.onExpr, env, kind.expr) };
    case 'If':
      return {
        ...kind,
        cond: v.onExpr(env, kind.cond),
        thenBlock: v.onBlock(env, kind.thenBlock),
        elseBlock: v.onBlock(env, kind.elseBlock),
      };
    case 'While':
      return { ...kind, cond: v.onExpr(env, kind.cond), body: v.onBlock(env, kind.body) };
    case 'Block':
      return { ...kind, block: v.onBlock(env, kind.block) };
    case 'Noop':
      return kind;
  }
}

function transformExprKind<Env, Ex, En>(
  v: AastEndo<Env, Ex, En>,
  env: Env,
  kind: ExprKind<Ex, En>
): ExprKind<Ex, En> {
  switch (kind.kind) {
    case 'Null':
    case 'True':
    case 'False':
    case 'Int':
    case 'Float':
    case 'String':
    case 'Id':
    case 'Lvar':
      return kind;
    case 'Call':
      return {
        ...kind,
        func: v.onExpr(env, kind.func),
        targs: v.onList(v.onTarg, env, kind.targs),
        args: v.onList(
          (e: Env, [pk, arg]: CallArg<Ex, En>): CallArg<Ex, En> => [pk, v.onExpr(e, arg)],
          env,
          kind.args
        ),
        unpacked: v.onOption(v.onExpr, env, kind.unpacked),
      };
    case 'New':
      return {
        ...kind,
        targs: v.onList(v.onTarg, env, kind.targs),
        args: v.onList(v.onExpr, env, kind.args),
      };
    case 'Binop':
      return { ...kind, lhs: v.onExpr(env, kind.lhs), rhs: v.onExpr(env, kind.rhs) };
    case 'Unop':
      return { ...kind, operand: v.onExpr(env, kind.operand) };
    case 'Is':
    case 'As':
      return { ...kind, expr: v.onExpr(env, kind.expr), hint: v.onHint(env, kind.hint) };
    case 'Efun':
    case 'Lfun':
      return { ...kind, fun: v.onFun(env, kind.fun) };
    case 'Varray':
      return {
        ...kind,
        targ: v.onOption(v.onTarg, env, kind.targ),
        values: v.onList(v.onExpr, env, kind.values),
      };
  }
}
