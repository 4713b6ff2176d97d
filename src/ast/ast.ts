// Simple AAST node constructors
import type * as AST from '../types.js';

function createEmptySpan(): AST.Span {
  return {
    start: { line: 0, col: 0 },
    end: { line: 0, col: 0 },
  };
}

function createId(name: string): AST.Id {
  return { span: createEmptySpan(), name };
}

function createExpr<Ex, En>(annotation: Ex, kind: AST.ExprKind<Ex, En>): AST.Expr<Ex, En> {
  return [annotation, createEmptySpan(), kind];
}

function createStmt<Ex, En>(kind: AST.StmtKind<Ex, En>): AST.Stmt<Ex, En> {
  return [createEmptySpan(), kind];
}

const emptyBody = { fbAst: [] };

export const Node = {
  Span: createEmptySpan,
  Id: createId,

  // Hints
  Happly: (name: string, args: readonly AST.Hint[] = []): AST.Hint => [
    createEmptySpan(),
    { kind: 'Happly', id: createId(name), args },
  ],
  Hoption: (hint: AST.Hint): AST.Hint => [createEmptySpan(), { kind: 'Hoption', hint }],
  Hlike: (hint: AST.Hint): AST.Hint => [createEmptySpan(), { kind: 'Hlike', hint }],
  Htuple: (hints: readonly AST.Hint[]): AST.Hint => [createEmptySpan(), { kind: 'Htuple', hints }],
  Hunion: (hints: readonly AST.Hint[]): AST.Hint => [createEmptySpan(), { kind: 'Hunion', hints }],
  Haccess: (root: AST.Hint, ids: readonly string[]): AST.Hint => [
    createEmptySpan(),
    { kind: 'Haccess', root, ids: ids.map(id => createId(id)) },
  ],
  Hprim: (prim: AST.Tprim): AST.Hint => [createEmptySpan(), { kind: 'Hprim', prim }],
  Hmixed: (): AST.Hint => [createEmptySpan(), { kind: 'Hmixed' }],
  Hthis: (): AST.Hint => [createEmptySpan(), { kind: 'Hthis' }],
  Hfun: (fun: AST.HintFun): AST.Hint => [createEmptySpan(), { kind: 'Hfun', fun }],
  HintFun: (
    paramTys: readonly AST.Hint[],
    returnTy: AST.Hint,
    ctxs: AST.Contexts | null = null,
    variadicTy: AST.Hint | null = null
  ): AST.HintFun => ({
    isReadonly: false,
    paramTys,
    paramInfo: paramTys.map(() => null),
    variadicTy,
    ctxs,
    returnTy,
    isReadonlyReturn: false,
  }),
  Contexts: (hints: readonly AST.Hint[]): AST.Contexts => [createEmptySpan(), hints],
  Tparam: (name: string, constraints: readonly AST.TparamConstraint[] = []): AST.Tparam => ({
    variance: 'Invariant',
    name: createId(name),
    constraints,
    reified: false,
  }),

  // Expressions and statements
  Expr: createExpr,
  Int: <Ex, En>(annotation: Ex, value: number): AST.Expr<Ex, En> =>
    createExpr<Ex, En>(annotation, { kind: 'Int', value: String(value) }),
  String: <Ex, En>(annotation: Ex, value: string): AST.Expr<Ex, En> =>
    createExpr<Ex, En>(annotation, { kind: 'String', value }),
  Lvar: <Ex, En>(annotation: Ex, name: string): AST.Expr<Ex, En> =>
    createExpr<Ex, En>(annotation, { kind: 'Lvar', id: createId(name) }),
  Stmt: createStmt,
  Return: <Ex, En>(expr: AST.Expr<Ex, En> | null): AST.Stmt<Ex, En> =>
    createStmt<Ex, En>({ kind: 'Return', expr }),
  UserAttribute: <Ex, En>(
    name: string,
    params: readonly AST.Expr<Ex, En>[] = []
  ): AST.UserAttribute<Ex, En> => ({ name: createId(name), params }),
  FileAttribute: <Ex, En>(
    userAttributes: readonly AST.UserAttribute<Ex, En>[],
    namespace = ''
  ): AST.FileAttribute<Ex, En> => ({ userAttributes, namespace }),

  // Declarations
  FunParam: <Ex, En>(
    annotation: Ex,
    name: string,
    hint: AST.Hint | null,
    fields: Partial<AST.FunParam<Ex, En>> = {}
  ): AST.FunParam<Ex, En> => ({
    annotation,
    typeHint: [annotation, hint],
    isVariadic: false,
    span: createEmptySpan(),
    name,
    expr: null,
    readonly: false,
    callconv: 'Pnormal',
    userAttributes: [],
    visibility: null,
    ...fields,
  }),
  Fun: <Ex, En>(
    annotation: En,
    ret: AST.TypeHint<Ex>,
    fields: Partial<AST.Fun<Ex, En>> = {}
  ): AST.Fun<Ex, En> => ({
    span: createEmptySpan(),
    readonlyThis: false,
    annotation,
    readonlyRet: false,
    ret,
    tparams: [],
    whereConstraints: [],
    params: [],
    ctxs: null,
    unsafeCtxs: null,
    body: emptyBody,
    fnKind: 'FSync',
    userAttributes: [],
    external: false,
    doc: null,
    ...fields,
  }),
  FunDef: <Ex, En>(name: string, fun: AST.Fun<Ex, En>, namespace = ''): AST.FunDef<Ex, En> => ({
    namespace,
    mode: 'Mstrict',
    name: createId(name),
    fun,
  }),
  Method: <Ex, En>(
    annotation: En,
    name: string,
    ret: AST.TypeHint<Ex>,
    fields: Partial<AST.Method<Ex, En>> = {}
  ): AST.Method<Ex, En> => ({
    span: createEmptySpan(),
    annotation,
    final: false,
    abstract: false,
    isStatic: false,
    readonlyThis: false,
    visibility: 'Public',
    name: createId(name),
    tparams: [],
    whereConstraints: [],
    params: [],
    ctxs: null,
    unsafeCtxs: null,
    body: emptyBody,
    fnKind: 'FSync',
    userAttributes: [],
    readonlyRet: false,
    ret,
    external: false,
    doc: null,
    ...fields,
  }),
  ClassVar: <Ex, En>(
    name: string,
    type: AST.TypeHint<Ex>,
    fields: Partial<AST.ClassVar<Ex, En>> = {}
  ): AST.ClassVar<Ex, En> => ({
    final: false,
    abstract: false,
    readonly: false,
    isStatic: false,
    visibility: 'Public',
    type,
    id: createId(name),
    expr: null,
    userAttributes: [],
    doc: null,
    span: createEmptySpan(),
    ...fields,
  }),
  Class: <Ex, En>(
    annotation: En,
    name: string,
    fields: Partial<AST.Class<Ex, En>> = {}
  ): AST.Class<Ex, En> => ({
    span: createEmptySpan(),
    annotation,
    mode: 'Mstrict',
    final: false,
    isAbstract: false,
    isXhp: false,
    kind: 'Cclass',
    name: createId(name),
    tparams: [],
    extends: [],
    uses: [],
    xhpAttrUses: [],
    reqs: [],
    implements: [],
    whereConstraints: [],
    consts: [],
    typeconsts: [],
    vars: [],
    methods: [],
    xhpAttrs: [],
    namespace: '',
    userAttributes: [],
    fileAttributes: [],
    enum: null,
    doc: null,
    ...fields,
  }),
  Gconst: <Ex, En>(
    annotation: En,
    name: string,
    type: AST.Hint | null,
    value: AST.Expr<Ex, En>
  ): AST.Gconst<Ex, En> => ({
    annotation,
    mode: 'Mstrict',
    name: createId(name),
    type,
    value,
    namespace: '',
    span: createEmptySpan(),
  }),
};
