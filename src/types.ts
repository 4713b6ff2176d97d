// Annotated AST (AAST) type definitions

/**
 * AAST 的所有节点在两个不透明的元数据槽上泛型化：
 *
 * - `Ex`：表达式级标注（如附加在表达式上的类型或位置信息）
 * - `En`：声明级标注（附加在函数、方法、类、全局常量上的环境信息）
 *
 * 名字、标志、字面量与源码位置等叶子数据不属于递归结构，遍历时原样复制。
 * 所有节点均为只读值，改写总是产生新节点。
 */

export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

export interface Id {
  readonly span: Span;
  readonly name: string;
}

/** 局部变量名 */
export type Lid = Id;

// ============================================================
// 叶子枚举
// ============================================================

export type Visibility = 'Private' | 'Public' | 'Protected' | 'Internal';
export type ClassishKind = 'Cclass' | 'Cinterface' | 'Ctrait' | 'Cenum' | 'CenumClass';
export type RequireKind = 'RequireExtends' | 'RequireImplements' | 'RequireClass';
export type ConstraintKind = 'ConstraintAs' | 'ConstraintEq' | 'ConstraintSuper';
export type Variance = 'Covariant' | 'Contravariant' | 'Invariant';
export type FunKind = 'FSync' | 'FAsync' | 'FGenerator' | 'FAsyncGenerator';
export type Mode = 'Mstrict' | 'Mhhi';
export type ParamKind = 'Pnormal' | 'Pinout';
export type XhpAttrTag = 'Required' | 'LateInit';
export type Bop = '+' | '-' | '*' | '/' | '.' | '==' | '===' | '<' | '>' | '&&' | '||' | '??';
export type Uop = '!' | '-' | '~';

export type Tprim =
  | 'Tnull'
  | 'Tvoid'
  | 'Tint'
  | 'Tbool'
  | 'Tfloat'
  | 'Tstring'
  | 'Tresource'
  | 'Tnum'
  | 'Tarraykey'
  | 'Tnoreturn';

// ============================================================
// 类型提示（hint）
// ============================================================

export type Hint = readonly [Span, HintKind];

export interface Happly {
  readonly kind: 'Happly';
  readonly id: Id;
  readonly args: readonly Hint[];
}

export interface Hoption {
  readonly kind: 'Hoption';
  readonly hint: Hint;
}

export interface Hlike {
  readonly kind: 'Hlike';
  readonly hint: Hint;
}

export interface Htuple {
  readonly kind: 'Htuple';
  readonly hints: readonly Hint[];
}

export interface Hunion {
  readonly kind: 'Hunion';
  readonly hints: readonly Hint[];
}

export interface Hintersection {
  readonly kind: 'Hintersection';
  readonly hints: readonly Hint[];
}

export interface Haccess {
  readonly kind: 'Haccess';
  readonly root: Hint;
  readonly ids: readonly Id[];
}

export interface Hfun {
  readonly kind: 'Hfun';
  readonly fun: HintFun;
}

export interface Hprim {
  readonly kind: 'Hprim';
  readonly prim: Tprim;
}

export interface Hleaf {
  readonly kind: 'Hmixed' | 'Hnonnull' | 'Hthis' | 'Hnothing' | 'Hdynamic' | 'Hwildcard';
}

export type HintKind =
  | Happly
  | Hoption
  | Hlike
  | Htuple
  | Hunion
  | Hintersection
  | Haccess
  | Hfun
  | Hprim
  | Hleaf;

export interface HfParamInfo {
  readonly kind: ParamKind;
  readonly readonly: boolean;
  readonly optional: boolean;
}

/** 函数类型提示 `(function(T1, T2)[ctx]: R)` */
export interface HintFun {
  readonly isReadonly: boolean;
  readonly paramTys: readonly Hint[];
  readonly paramInfo: readonly (HfParamInfo | null)[];
  readonly variadicTy: Hint | null;
  readonly ctxs: Contexts | null;
  readonly returnTy: Hint;
  readonly isReadonlyReturn: boolean;
}

/**
 * 上下文列表 `[ctx1, ctx2]`：位置标签 + 一组与 hint 同构的上下文。
 * 位置标签是叶子数据，不参与改写。
 */
export type Contexts = readonly [Span, readonly Hint[]];

/** 带表达式标注的可选类型提示 */
export type TypeHint<Ex> = readonly [Ex, Hint | null];

/** 显式类型实参 */
export type Targ<Ex> = readonly [Ex, Hint];

// ============================================================
// 泛型参数与约束
// ============================================================

export type TparamConstraint = readonly [ConstraintKind, Hint];

export interface Tparam {
  readonly variance: Variance;
  readonly name: Id;
  readonly constraints: readonly TparamConstraint[];
  readonly reified: boolean;
}

/** `where T1 as T2` */
export type WhereConstraintHint = readonly [Hint, ConstraintKind, Hint];

// ============================================================
// 属性
// ============================================================

export interface UserAttribute<Ex, En> {
  readonly name: Id;
  readonly params: readonly Expr<Ex, En>[];
}

export interface FileAttribute<Ex, En> {
  readonly userAttributes: readonly UserAttribute<Ex, En>[];
  readonly namespace: string;
}

// ============================================================
// 表达式与语句
// ============================================================

export type Expr<Ex, En> = readonly [Ex, Span, ExprKind<Ex, En>];

export type CallArg<Ex, En> = readonly [ParamKind, Expr<Ex, En>];

export type ExprKind<Ex, En> =
  | { readonly kind: 'Null' }
  | { readonly kind: 'True' }
  | { readonly kind: 'False' }
  | { readonly kind: 'Int'; readonly value: string }
  | { readonly kind: 'Float'; readonly value: string }
  | { readonly kind: 'String'; readonly value: string }
  | { readonly kind: 'Id'; readonly id: Id }
  | { readonly kind: 'Lvar'; readonly id: Lid }
  | {
      readonly kind: 'Call';
      readonly func: Expr<Ex, En>;
      readonly targs: readonly Targ<Ex>[];
      readonly args: readonly CallArg<Ex, En>[];
      readonly unpacked: Expr<Ex, En> | null;
    }
  | {
      readonly kind: 'New';
      readonly className: Id;
      readonly targs: readonly Targ<Ex>[];
      readonly args: readonly Expr<Ex, En>[];
    }
  | { readonly kind: 'Binop'; readonly op: Bop; readonly lhs: Expr<Ex, En>; readonly rhs: Expr<Ex, En> }
  | { readonly kind: 'Unop'; readonly op: Uop; readonly operand: Expr<Ex, En> }
  | { readonly kind: 'Is'; readonly expr: Expr<Ex, En>; readonly hint: Hint }
  | { readonly kind: 'As'; readonly expr: Expr<Ex, En>; readonly hint: Hint; readonly nullable: boolean }
  | { readonly kind: 'Efun'; readonly fun: Fun<Ex, En>; readonly use: readonly Lid[] }
  | { readonly kind: 'Lfun'; readonly fun: Fun<Ex, En>; readonly use: readonly Lid[] }
  | { readonly kind: 'Varray'; readonly targ: Targ<Ex> | null; readonly values: readonly Expr<Ex, En>[] };

export type Stmt<Ex, En> = readonly [Span, StmtKind<Ex, En>];

export type Block<Ex, En> = readonly Stmt<Ex, En>[];

export type StmtKind<Ex, En> =
  | { readonly kind: 'Expr'; readonly expr: Expr<Ex, En> }
  | { readonly kind: 'Return'; readonly expr: Expr<Ex, En> | null }
  | {
      readonly kind: 'If';
      readonly cond: Expr<Ex, En>;
      readonly thenBlock: Block<Ex, En>;
      readonly elseBlock: Block<Ex, En>;
    }
  | { readonly kind: 'While'; readonly cond: Expr<Ex, En>; readonly body: Block<Ex, En> }
  | { readonly kind: 'Block'; readonly block: Block<Ex, En> }
  | { readonly kind: 'Throw'; readonly expr: Expr<Ex, En> }
  | { readonly kind: 'Noop' };

export interface FuncBody<Ex, En> {
  readonly fbAst: Block<Ex, En>;
}

// ============================================================
// 函数与方法
// ============================================================

export interface FunParam<Ex, En> {
  readonly annotation: Ex;
  readonly typeHint: TypeHint<Ex>;
  readonly isVariadic: boolean;
  readonly span: Span;
  readonly name: string;
  readonly expr: Expr<Ex, En> | null;
  readonly readonly: boolean;
  readonly callconv: ParamKind;
  readonly userAttributes: readonly UserAttribute<Ex, En>[];
  readonly visibility: Visibility | null;
}

export interface Fun<Ex, En> {
  readonly span: Span;
  readonly readonlyThis: boolean;
  readonly annotation: En;
  readonly readonlyRet: boolean;
  readonly ret: TypeHint<Ex>;
  readonly tparams: readonly Tparam[];
  readonly whereConstraints: readonly WhereConstraintHint[];
  readonly params: readonly FunParam<Ex, En>[];
  readonly ctxs: Contexts | null;
  readonly unsafeCtxs: Contexts | null;
  readonly body: FuncBody<Ex, En>;
  readonly fnKind: FunKind;
  readonly userAttributes: readonly UserAttribute<Ex, En>[];
  readonly external: boolean;
  readonly doc: string | null;
}

export interface Method<Ex, En> {
  readonly span: Span;
  readonly annotation: En;
  readonly final: boolean;
  readonly abstract: boolean;
  readonly isStatic: boolean;
  readonly readonlyThis: boolean;
  readonly visibility: Visibility;
  readonly name: Id;
  readonly tparams: readonly Tparam[];
  readonly whereConstraints: readonly WhereConstraintHint[];
  readonly params: readonly FunParam<Ex, En>[];
  readonly ctxs: Contexts | null;
  readonly unsafeCtxs: Contexts | null;
  readonly body: FuncBody<Ex, En>;
  readonly fnKind: FunKind;
  readonly userAttributes: readonly UserAttribute<Ex, En>[];
  readonly readonlyRet: boolean;
  readonly ret: TypeHint<Ex>;
  readonly external: boolean;
  readonly doc: string | null;
}

export interface FunDef<Ex, En> {
  readonly namespace: string;
  readonly mode: Mode;
  readonly name: Id;
  readonly fun: Fun<Ex, En>;
}

// ============================================================
// 类
// ============================================================

export type ClassReq = readonly [Hint, RequireKind];

export interface ClassVar<Ex, En> {
  readonly final: boolean;
  readonly abstract: boolean;
  readonly readonly: boolean;
  readonly isStatic: boolean;
  readonly visibility: Visibility;
  readonly type: TypeHint<Ex>;
  readonly id: Id;
  readonly expr: Expr<Ex, En> | null;
  readonly userAttributes: readonly UserAttribute<Ex, En>[];
  readonly doc: string | null;
  readonly span: Span;
}

export interface XhpAttr<Ex, En> {
  readonly typeHint: TypeHint<Ex>;
  readonly classVar: ClassVar<Ex, En>;
  readonly tag: XhpAttrTag | null;
  readonly enumValues: readonly Expr<Ex, En>[] | null;
}

export type ClassConstKind<Ex, En> =
  | { readonly kind: 'CCAbstract'; readonly default: Expr<Ex, En> | null }
  | { readonly kind: 'CCConcrete'; readonly expr: Expr<Ex, En> };

export interface ClassConst<Ex, En> {
  readonly type: Hint | null;
  readonly id: Id;
  readonly kind: ClassConstKind<Ex, En>;
  readonly span: Span;
  readonly doc: string | null;
}

export type ClassTypeconst =
  | {
      readonly kind: 'TCAbstract';
      readonly asConstraint: Hint | null;
      readonly superConstraint: Hint | null;
      readonly default: Hint | null;
    }
  | { readonly kind: 'TCConcrete'; readonly hint: Hint };

export interface ClassTypeconstDef {
  readonly name: Id;
  readonly kind: ClassTypeconst;
  readonly span: Span;
  readonly doc: string | null;
  readonly isCtx: boolean;
}

export interface Enum {
  readonly base: Hint;
  readonly constraint: Hint | null;
  readonly includes: readonly Hint[];
}

export interface Class<Ex, En> {
  readonly span: Span;
  readonly annotation: En;
  readonly mode: Mode;
  readonly final: boolean;
  readonly isAbstract: boolean;
  readonly isXhp: boolean;
  readonly kind: ClassishKind;
  readonly name: Id;
  readonly tparams: readonly Tparam[];
  readonly extends: readonly Hint[];
  readonly uses: readonly Hint[];
  readonly xhpAttrUses: readonly Hint[];
  readonly reqs: readonly ClassReq[];
  readonly implements: readonly Hint[];
  readonly whereConstraints: readonly WhereConstraintHint[];
  readonly consts: readonly ClassConst<Ex, En>[];
  readonly typeconsts: readonly ClassTypeconstDef[];
  readonly vars: readonly ClassVar<Ex, En>[];
  readonly methods: readonly Method<Ex, En>[];
  readonly xhpAttrs: readonly XhpAttr<Ex, En>[];
  readonly namespace: string;
  readonly userAttributes: readonly UserAttribute<Ex, En>[];
  readonly fileAttributes: readonly FileAttribute<Ex, En>[];
  readonly enum: Enum | null;
  readonly doc: string | null;
}

// ============================================================
// 全局常量与顶层定义
// ============================================================

export interface Gconst<Ex, En> {
  readonly annotation: En;
  readonly mode: Mode;
  readonly name: Id;
  readonly type: Hint | null;
  readonly value: Expr<Ex, En>;
  readonly namespace: string;
  readonly span: Span;
}

export type Def<Ex, En> =
  | { readonly kind: 'Fun'; readonly def: FunDef<Ex, En> }
  | { readonly kind: 'Class'; readonly def: Class<Ex, En> }
  | { readonly kind: 'Constant'; readonly def: Gconst<Ex, En> }
  | { readonly kind: 'Stmt'; readonly def: Stmt<Ex, En> };

export type Program<Ex, En> = readonly Def<Ex, En>[];
