import { aastEndoDefaults } from '../ast/ast_visitor.js';
import type { AastEndo, AastEndoBase } from '../ast/ast_visitor.js';
import type {
  ClassConst,
  ClassReq,
  ClassTypeconstDef,
  ClassVar,
  Contexts,
  Enum,
  Expr,
  FileAttribute,
  FunParam,
  FuncBody,
  Hint,
  Method,
  Tparam,
  TypeHint,
  UserAttribute,
  WhereConstraintHint,
  XhpAttr,
} from '../types.js';

/**
 * 可定制的 AAST 改写遍历器。
 *
 * 基础遍历器为每种节点提供整节点的默认递归；细化/校验类 pass 往往只关心：
 * (1) 某个复合节点的*某一个*字段（例如类的 implements 列表）
 * (2) 某种节点的*整个列表*（例如一组用户属性，才能发现重复项）
 * (3) 同一表示在不同*位置*上的用法（上下文位置的 hint 与类型位置的 hint）
 *
 * 本层在基础遍历器之上补齐这些覆写点，使 pass 只覆写自己关心的那一小块，
 * 其余位置继承默认的恒等改写。
 *
 * 复合节点（类、函数、方法、类变量、函数类型提示、全局常量、函数参数）的
 * 整节点改写按字段声明顺序从左到右依次调用各字段钩子，每个钩子收到同一个 env，
 * 互相看不到彼此的改写结果；最后以输入节点为底，仅替换这些字段重建节点。
 *
 * 本层的序列与可选字段同样经由当前遍历器的 `onList` / `onOption` 映射，
 * 覆写这两个组合子对树中所有列表生效。
 */
export interface ElabEndo<Env, Ex, En> extends AastEndo<Env, Ex, En> {
  // -- 分组序列 -------------------------------------------------------------
  onUserAttributes(env: Env, attrs: readonly UserAttribute<Ex, En>[]): readonly UserAttribute<Ex, En>[];
  onFileAttributes(env: Env, attrs: readonly FileAttribute<Ex, En>[]): readonly FileAttribute<Ex, En>[];

  // -- 区分 context 与 hint ---------------------------------------------------
  onContext(env: Env, hint: Hint): Hint;

  // -- 类 -------------------------------------------------------------------
  onClassTparams(env: Env, tparams: readonly Tparam[]): readonly Tparam[];
  onClassExtends(env: Env, hints: readonly Hint[]): readonly Hint[];
  onClassUses(env: Env, hints: readonly Hint[]): readonly Hint[];
  onClassXhpAttrs(env: Env, attrs: readonly XhpAttr<Ex, En>[]): readonly XhpAttr<Ex, En>[];
  onClassXhpAttrUses(env: Env, hints: readonly Hint[]): readonly Hint[];
  onClassReq(env: Env, req: ClassReq): ClassReq;
  onClassReqs(env: Env, reqs: readonly ClassReq[]): readonly ClassReq[];
  onClassImplements(env: Env, hints: readonly Hint[]): readonly Hint[];
  onClassWhereConstraints(env: Env, wcs: readonly WhereConstraintHint[]): readonly WhereConstraintHint[];
  onClassConsts(env: Env, consts: readonly ClassConst<Ex, En>[]): readonly ClassConst<Ex, En>[];
  onClassTypeconsts(env: Env, typeconsts: readonly ClassTypeconstDef[]): readonly ClassTypeconstDef[];
  onClassVars(env: Env, vars: readonly ClassVar<Ex, En>[]): readonly ClassVar<Ex, En>[];
  onClassEnum(env: Env, e: Enum | null): Enum | null;
  onClassMethods(env: Env, methods: readonly Method<Ex, En>[]): readonly Method<Ex, En>[];
  onClassUserAttributes(env: Env, attrs: readonly UserAttribute<Ex, En>[]): readonly UserAttribute<Ex, En>[];
  onClassFileAttributes(env: Env, attrs: readonly FileAttribute<Ex, En>[]): readonly FileAttribute<Ex, En>[];

  // -- 类变量 ---------------------------------------------------------------
  onClassVarUserAttributes(env: Env, attrs: readonly UserAttribute<Ex, En>[]): readonly UserAttribute<Ex, En>[];
  onClassVarExpr(env: Env, expr: Expr<Ex, En> | null): Expr<Ex, En> | null;
  onClassVarType(env: Env, th: TypeHint<Ex>): TypeHint<Ex>;

  // -- 函数 -----------------------------------------------------------------
  onFunRet(env: Env, th: TypeHint<Ex>): TypeHint<Ex>;
  onFunTparams(env: Env, tparams: readonly Tparam[]): readonly Tparam[];
  onFunWhereConstraints(env: Env, wcs: readonly WhereConstraintHint[]): readonly WhereConstraintHint[];
  onFunParams(env: Env, params: readonly FunParam<Ex, En>[]): readonly FunParam<Ex, En>[];
  onFunCtxs(env: Env, ctxs: Contexts | null): Contexts | null;
  onFunUnsafeCtxs(env: Env, ctxs: Contexts | null): Contexts | null;
  onFunBody(env: Env, body: FuncBody<Ex, En>): FuncBody<Ex, En>;
  onFunUserAttributes(env: Env, attrs: readonly UserAttribute<Ex, En>[]): readonly UserAttribute<Ex, En>[];

  // -- 方法 -----------------------------------------------------------------
  onMethodTparams(env: Env, tparams: readonly Tparam[]): readonly Tparam[];
  onMethodWhereConstraints(env: Env, wcs: readonly WhereConstraintHint[]): readonly WhereConstraintHint[];
  onMethodParams(env: Env, params: readonly FunParam<Ex, En>[]): readonly FunParam<Ex, En>[];
  onMethodCtxs(env: Env, ctxs: Contexts | null): Contexts | null;
  onMethodUnsafeCtxs(env: Env, ctxs: Contexts | null): Contexts | null;
  onMethodBody(env: Env, body: FuncBody<Ex, En>): FuncBody<Ex, En>;
  onMethodUserAttributes(env: Env, attrs: readonly UserAttribute<Ex, En>[]): readonly UserAttribute<Ex, En>[];
  onMethodRet(env: Env, th: TypeHint<Ex>): TypeHint<Ex>;

  // -- 函数参数 -------------------------------------------------------------
  onFunParamTypeHint(env: Env, th: TypeHint<Ex>): TypeHint<Ex>;
  onFunParamExpr(env: Env, expr: Expr<Ex, En> | null): Expr<Ex, En> | null;
  onFunParamUserAttributes(env: Env, attrs: readonly UserAttribute<Ex, En>[]): readonly UserAttribute<Ex, En>[];

  // -- 函数类型提示 ---------------------------------------------------------
  onHintFunParamTys(env: Env, hints: readonly Hint[]): readonly Hint[];
  onHintFunVariadicTy(env: Env, hint: Hint | null): Hint | null;
  onHintFunCtxs(env: Env, ctxs: Contexts | null): Contexts | null;
  onHintFunReturnTy(env: Env, hint: Hint): Hint;

  // -- 全局常量 -------------------------------------------------------------
  onGconstType(env: Env, hint: Hint | null): Hint | null;
  onGconstValue(env: Env, value: Expr<Ex, En>): Expr<Ex, En>;

  // -- 二元组投影 -----------------------------------------------------------
  onFst<A, B>(f: (env: Env, a: A) => A, env: Env, pair: readonly [A, B]): readonly [A, B];
  onSnd<A, B>(f: (env: Env, b: B) => B, env: Env, pair: readonly [A, B]): readonly [A, B];
}

/** 本层覆写的基础层方法 */
type ElabOverridden =
  | 'onClass'
  | 'onClassVar'
  | 'onFun'
  | 'onMethod'
  | 'onFunParam'
  | 'onFileAttribute'
  | 'onHintFun'
  | 'onContexts'
  | 'onGconst';

type ElabLayer<Env, Ex, En> = Omit<
  ElabEndo<Env, Ex, En>,
  Exclude<keyof AastEndoBase<Env, Ex, En>, ElabOverridden>
>;

/**
 * 本层的默认实现。
 *
 * @param self - 返回最终组合好的遍历器；仅在遍历时调用
 */
function elabDefaults<Env, Ex, En>(self: () => ElabEndo<Env, Ex, En>): ElabLayer<Env, Ex, En> {
  return {
    // 元数据默认原样透传
    onExprAnnotation(_env, ex) {
      return ex;
    },

    onDeclAnnotation(_env, en) {
      return en;
    },

    onUserAttributes(env, attrs) {
      return self().onList(self().onUserAttribute, env, attrs);
    },

    onFileAttributes(env, attrs) {
      return self().onList(self().onFileAttribute, env, attrs);
    },

    // 文件属性内的用户属性列表同样经过 onUserAttributes
    onFileAttribute(env, fa) {
      return { ...fa, userAttributes: self().onUserAttributes(env, fa.userAttributes) };
    },

    onContext(env, hint) {
      return self().onHint(env, hint);
    },

    onContexts(env, [span, hints]) {
      return [span, self().onList(self().onContext, env, hints)];
    },

    // -- 类 -----------------------------------------------------------------
    onClassTparams(env, tparams) {
      return self().onList(self().onTparam, env, tparams);
    },

    onClassExtends(env, hints) {
      return self().onList(self().onHint, env, hints);
    },

    onClassUses(env, hints) {
      return self().onList(self().onHint, env, hints);
    },

    onClassXhpAttrs(env, attrs) {
      return self().onList(self().onXhpAttr, env, attrs);
    },

    onClassXhpAttrUses(env, hints) {
      return self().onList(self().onHint, env, hints);
    },

    onClassReq(env, req) {
      const v = self();
      return v.onSnd(v.onRequireKind, env, v.onFst(v.onClassHint, env, req));
    },

    onClassReqs(env, reqs) {
      return self().onList(self().onClassReq, env, reqs);
    },

    onClassImplements(env, hints) {
      return self().onList(self().onHint, env, hints);
    },

    onClassWhereConstraints(env, wcs) {
      return self().onList(self().onWhereConstraintHint, env, wcs);
    },

    onClassConsts(env, consts) {
      return self().onList(self().onClassConst, env, consts);
    },

    onClassTypeconsts(env, typeconsts) {
      return self().onList(self().onClassTypeconstDef, env, typeconsts);
    },

    onClassVars(env, vars) {
      return self().onList(self().onClassVar, env, vars);
    },

    onClassEnum(env, e) {
      return self().onOption(self().onEnum, env, e);
    },

    onClassMethods(env, methods) {
      return self().onList(self().onMethod, env, methods);
    },

    onClassUserAttributes(env, attrs) {
      return self().onUserAttributes(env, attrs);
    },

    onClassFileAttributes(env, attrs) {
      return self().onFileAttributes(env, attrs);
    },

    onClass(env, c) {
      const v = self();
      const annotation = v.onDeclAnnotation(env, c.annotation);
      const tparams = v.onClassTparams(env, c.tparams);
      const extendsHints = v.onClassExtends(env, c.extends);
      const uses = v.onClassUses(env, c.uses);
      const xhpAttrs = v.onClassXhpAttrs(env, c.xhpAttrs);
      const xhpAttrUses = v.onClassXhpAttrUses(env, c.xhpAttrUses);
      const reqs = v.onClassReqs(env, c.reqs);
      const implementsHints = v.onClassImplements(env, c.implements);
      const whereConstraints = v.onClassWhereConstraints(env, c.whereConstraints);
      const consts = v.onClassConsts(env, c.consts);
      const typeconsts = v.onClassTypeconsts(env, c.typeconsts);
      const vars = v.onClassVars(env, c.vars);
      const enumDef = v.onClassEnum(env, c.enum);
      const methods = v.onClassMethods(env, c.methods);
      const userAttributes = v.onClassUserAttributes(env, c.userAttributes);
      const fileAttributes = v.onClassFileAttributes(env, c.fileAttributes);
      return {
        ...c,
        annotation,
        tparams,
        extends: extendsHints,
        uses,
        xhpAttrs,
        xhpAttrUses,
        reqs,
        implements: implementsHints,
        whereConstraints,
        consts,
        typeconsts,
        vars,
        enum: enumDef,
        methods,
        userAttributes,
        fileAttributes,
      };
    },

    // -- 类变量 -------------------------------------------------------------
    onClassVarUserAttributes(env, attrs) {
      return self().onUserAttributes(env, attrs);
    },

    onClassVarExpr(env, expr) {
      return self().onOption(self().onExpr, env, expr);
    },

    onClassVarType(env, th) {
      return self().onTypeHint(env, th);
    },

    onClassVar(env, cv) {
      const v = self();
      const userAttributes = v.onClassVarUserAttributes(env, cv.userAttributes);
      const expr = v.onClassVarExpr(env, cv.expr);
      const type = v.onClassVarType(env, cv.type);
      return { ...cv, userAttributes, expr, type };
    },

    // -- 函数 ---------------------------------------------------------------
    onFunRet(env, th) {
      return self().onTypeHint(env, th);
    },

    onFunTparams(env, tparams) {
      return self().onList(self().onTparam, env, tparams);
    },

    onFunWhereConstraints(env, wcs) {
      return self().onList(self().onWhereConstraintHint, env, wcs);
    },

    onFunParams(env, params) {
      return self().onList(self().onFunParam, env, params);
    },

    onFunCtxs(env, ctxs) {
      return self().onOption(self().onContexts, env, ctxs);
    },

    onFunUnsafeCtxs(env, ctxs) {
      return self().onOption(self().onContexts, env, ctxs);
    },

    onFunBody(env, body) {
      return self().onFuncBody(env, body);
    },

    onFunUserAttributes(env, attrs) {
      return self().onUserAttributes(env, attrs);
    },

    onFun(env, f) {
      const v = self();
      const annotation = v.onDeclAnnotation(env, f.annotation);
      const ret = v.onFunRet(env, f.ret);
      const tparams = v.onFunTparams(env, f.tparams);
      const whereConstraints = v.onFunWhereConstraints(env, f.whereConstraints);
      const params = v.onFunParams(env, f.params);
      const ctxs = v.onFunCtxs(env, f.ctxs);
      const unsafeCtxs = v.onFunUnsafeCtxs(env, f.unsafeCtxs);
      const body = v.onFunBody(env, f.body);
      const userAttributes = v.onFunUserAttributes(env, f.userAttributes);
      return {
        ...f,
        annotation,
        ret,
        tparams,
        whereConstraints,
        params,
        ctxs,
        unsafeCtxs,
        body,
        userAttributes,
      };
    },

    // -- 方法 ---------------------------------------------------------------
    onMethodTparams(env, tparams) {
      return self().onList(self().onTparam, env, tparams);
    },

    onMethodWhereConstraints(env, wcs) {
      return self().onList(self().onWhereConstraintHint, env, wcs);
    },

    onMethodParams(env, params) {
      return self().onList(self().onFunParam, env, params);
    },

    onMethodCtxs(env, ctxs) {
      return self().onOption(self().onContexts, env, ctxs);
    },

    onMethodUnsafeCtxs(env, ctxs) {
      return self().onOption(self().onContexts, env, ctxs);
    },

    onMethodBody(env, body) {
      return self().onFuncBody(env, body);
    },

    onMethodUserAttributes(env, attrs) {
      return self().onUserAttributes(env, attrs);
    },

    onMethodRet(env, th) {
      return self().onTypeHint(env, th);
    },

    onMethod(env, m) {
      const v = self();
      const annotation = v.onDeclAnnotation(env, m.annotation);
      const tparams = v.onMethodTparams(env, m.tparams);
      const whereConstraints = v.onMethodWhereConstraints(env, m.whereConstraints);
      const params = v.onMethodParams(env, m.params);
      const ctxs = v.onMethodCtxs(env, m.ctxs);
      const unsafeCtxs = v.onMethodUnsafeCtxs(env, m.unsafeCtxs);
      const body = v.onMethodBody(env, m.body);
      const userAttributes = v.onMethodUserAttributes(env, m.userAttributes);
      const ret = v.onMethodRet(env, m.ret);
      return {
        ...m,
        annotation,
        tparams,
        whereConstraints,
        params,
        ctxs,
        unsafeCtxs,
        body,
        userAttributes,
        ret,
      };
    },

    // -- 函数参数 -----------------------------------------------------------
    onFunParamTypeHint(env, th) {
      return self().onTypeHint(env, th);
    },

    onFunParamExpr(env, expr) {
      return self().onOption(self().onExpr, env, expr);
    },

    onFunParamUserAttributes(env, attrs) {
      return self().onUserAttributes(env, attrs);
    },

    onFunParam(env, p) {
      const v = self();
      const annotation = v.onExprAnnotation(env, p.annotation);
      const typeHint = v.onFunParamTypeHint(env, p.typeHint);
      const expr = v.onFunParamExpr(env, p.expr);
      const userAttributes = v.onFunParamUserAttributes(env, p.userAttributes);
      return { ...p, annotation, typeHint, expr, userAttributes };
    },

    // -- 函数类型提示 -------------------------------------------------------
    onHintFunParamTys(env, hints) {
      return self().onList(self().onHint, env, hints);
    },

    onHintFunVariadicTy(env, hint) {
      return self().onOption(self().onHint, env, hint);
    },

    onHintFunCtxs(env, ctxs) {
      return self().onOption(self().onContexts, env, ctxs);
    },

    onHintFunReturnTy(env, hint) {
      return self().onHint(env, hint);
    },

    onHintFun(env, hf) {
      const v = self();
      const paramTys = v.onHintFunParamTys(env, hf.paramTys);
      const variadicTy = v.onHintFunVariadicTy(env, hf.variadicTy);
      const ctxs = v.onHintFunCtxs(env, hf.ctxs);
      const returnTy = v.onHintFunReturnTy(env, hf.returnTy);
      return { ...hf, paramTys, variadicTy, ctxs, returnTy };
    },

    // -- 全局常量 -----------------------------------------------------------
    onGconstType(env, hint) {
      return self().onOption(self().onHint, env, hint);
    },

    onGconstValue(env, value) {
      return self().onExpr(env, value);
    },

    onGconst(env, cst) {
      const v = self();
      const annotation = v.onDeclAnnotation(env, cst.annotation);
      const type = v.onGconstType(env, cst.type);
      const value = v.onGconstValue(env, cst.value);
      return { ...cst, annotation, type, value };
    },

    // -- 二元组投影 ---------------------------------------------------------
    onFst(f, env, [fst, snd]) {
      return [f(env, fst), snd];
    },

    onSnd(f, env, [fst, snd]) {
      return [fst, f(env, snd)];
    },
  };
}

/**
 * pass 提供的覆写：`self` 为最终组合好的遍历器（递归时经由它分派），
 * `inherited` 为未被本次覆写替换的默认实现，相当于 `super`。
 */
export type ElabOverrides<Env, Ex, En> = (
  self: ElabEndo<Env, Ex, En>,
  inherited: ElabEndo<Env, Ex, En>
) => Partial<ElabEndo<Env, Ex, En>>;

/**
 * 组合基础层、本层默认实现与 pass 的覆写，得到一个冻结的遍历器。
 *
 * 遍历器不持有可变状态，构造后即可对任意多棵树调用；
 * 未覆写的方法全部回落到默认实现（元数据为恒等，结构为深度复制）。
 *
 * @example
 * ```typescript
 * const renameExtends = createElabEndo<null, Ann, Ann>(self => ({
 *   onClassExtends: (env, hints) => hints.map(h => rename(self.onHint(env, h))),
 * }));
 * const out = renameExtends.onClass(null, cls);
 * ```
 */
export function createElabEndo<Env, Ex, En>(
  overrides?: ElabOverrides<Env, Ex, En>
): ElabEndo<Env, Ex, En> {
  const base = aastEndoDefaults<Env, Ex, En>(() => self);
  const inherited: ElabEndo<Env, Ex, En> = { ...base, ...elabDefaults<Env, Ex, En>(() => self) };
  const self: ElabEndo<Env, Ex, En> = { ...inherited };
  if (overrides) Object.assign(self, overrides(self, inherited));
  return Object.freeze(self);
}
