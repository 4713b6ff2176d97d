import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Node } from '../../../src/ast/ast.js';
import { createElabEndo } from '../../../src/elab/elab_visitor.js';
import { relabelAnnotations } from '../../../src/elab/passes/relabel_annotations.js';
import type { Hint } from '../../../src/types.js';
import { TestFactories, single } from '../../helpers/test-factories.js';
import type { En, Ex } from '../../helpers/test-factories.js';

const v2 = (h: Hint): Hint => TestFactories.renameHint(h, n => `${n}_v2`);

describe('细化遍历器', () => {
  describe('默认行为', () => {
    it('不覆写任何方法时对整个程序是恒等改写', () => {
      const program = TestFactories.program();
      const out = createElabEndo<null, Ex, En>().onProgram(null, program);
      assert.deepEqual(out, program);
    });

    it('遍历器被冻结，且可重复用于多棵树', () => {
      const v = createElabEndo<null, Ex, En>();
      assert.ok(Object.isFrozen(v));

      const first = v.onClass(null, TestFactories.fullClass());
      const second = v.onClass(null, TestFactories.fullClass());
      assert.deepEqual(first, second);
    });

    it('每个字段钩子收到同一个 env', () => {
      const env = { scope: 'test' };
      const seen: object[] = [];
      const v = createElabEndo<{ scope: string }, Ex, En>((_self, inherited) => ({
        onClassExtends(e, hints) {
          seen.push(e);
          return inherited.onClassExtends(e, hints);
        },
        onClassImplements(e, hints) {
          seen.push(e);
          return inherited.onClassImplements(e, hints);
        },
        onContext(e, hint) {
          seen.push(e);
          return inherited.onContext(e, hint);
        },
      }));
      v.onClass(env, TestFactories.fullClass());

      assert.equal(seen.length, 4);
      for (const e of seen) assert.strictEqual(e, env);
    });
  });

  describe('字段级覆写', () => {
    it('只改写 extends 时其他字段与输入相等', () => {
      const cls = TestFactories.fullClass();
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onClassExtends: (env, hints) => inherited.onClassExtends(env, hints).map(v2),
      }));
      const out = v.onClass(null, cls);

      assert.deepEqual(out.extends.map(TestFactories.hintName), ['A_v2', 'B_v2']);
      assert.deepEqual(out.implements.map(TestFactories.hintName), ['D']);
      assert.deepEqual(out.uses.map(TestFactories.hintName), ['\\TraitT']);
      assert.deepEqual({ ...out, extends: cls.extends }, cls);
    });

    it('清空 implements 不影响其他字段', () => {
      const cls = TestFactories.fullClass();
      const v = createElabEndo<null, Ex, En>(() => ({
        onClassImplements: () => [],
      }));
      const out = v.onClass(null, cls);

      assert.deepEqual(out.implements, []);
      assert.deepEqual({ ...out, implements: cls.implements }, cls);
    });

    it('类变量的初始值可单独改写', () => {
      const cls = TestFactories.fullClass();
      const v = createElabEndo<null, Ex, En>(() => ({
        onClassVarExpr: () => null,
      }));
      const out = v.onClass(null, cls);

      const cv = single(out.vars);
      assert.equal(cv.expr, null);
      assert.deepEqual(cv.type, single(cls.vars).type);
      assert.deepEqual(cv.userAttributes.map(a => a.name.name), ['VarAttr']);
    });

    it('函数参数的默认值可单独改写', () => {
      const v = createElabEndo<null, Ex, En>(() => ({
        onFunParamExpr: () => null,
      }));
      const method = v.onMethod(null, TestFactories.method());
      const param = single(method.params);

      assert.equal(param.expr, null);
      assert.equal(TestFactories.hintName(param.typeHint[1] ?? Node.Hmixed()), 'X');
      assert.deepEqual(param.userAttributes.map(a => a.name.name), ['ParamAttr']);
    });

    it('全局常量的值与类型分别经过各自的钩子', () => {
      const v = createElabEndo<null, Ex, En>(() => ({
        onGconstValue: () => Node.Int<Ex, En>('ex:new', 99),
      }));
      const out = v.onGconst(null, TestFactories.gconst());

      assert.deepEqual(out.value, Node.Int<Ex, En>('ex:new', 99));
      assert.deepEqual(out.type, Node.Happly('int'));
      assert.equal(out.annotation, 'en:const');
    });

    it('函数类型提示的返回类型可单独改写', () => {
      const hf = Node.HintFun(
        [Node.Happly('A')],
        Node.Happly('B'),
        Node.Contexts([Node.Happly('C')]),
        Node.Happly('V')
      );
      const v = createElabEndo<null, Ex, En>(() => ({
        onHintFunReturnTy: (_env, hint) => Node.Hoption(hint),
      }));
      const out = v.onHintFun(null, hf);

      assert.deepEqual(out.returnTy, Node.Hoption(Node.Happly('B')));
      assert.deepEqual(out.paramTys, hf.paramTys);
      assert.deepEqual(out.variadicTy, hf.variadicTy);
      assert.deepEqual(out.ctxs, hf.ctxs);
    });

    it('require 子句经由 onClassHint 与 onRequireKind 分别改写两个分量', () => {
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onClassHint: (env, hint) => v2(inherited.onClassHint(env, hint)),
        onRequireKind: () => 'RequireImplements',
      }));
      const out = v.onClass(null, TestFactories.fullClass());
      const [hint, kind] = single(out.reqs);

      assert.equal(TestFactories.hintName(hint), '\\Base_v2');
      assert.equal(kind, 'RequireImplements');
    });
  });

  describe('字段求值顺序', () => {
    it('类的字段钩子按声明顺序依次调用', () => {
      const log: string[] = [];
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onDeclAnnotation(env, en) {
          log.push(`decl:${en}`);
          return inherited.onDeclAnnotation(env, en);
        },
        onClassTparams(env, xs) {
          log.push('tparams');
          return inherited.onClassTparams(env, xs);
        },
        onClassExtends(env, xs) {
          log.push('extends');
          return inherited.onClassExtends(env, xs);
        },
        onClassUses(env, xs) {
          log.push('uses');
          return inherited.onClassUses(env, xs);
        },
        onClassXhpAttrs(env, xs) {
          log.push('xhpAttrs');
          return inherited.onClassXhpAttrs(env, xs);
        },
        onClassXhpAttrUses(env, xs) {
          log.push('xhpAttrUses');
          return inherited.onClassXhpAttrUses(env, xs);
        },
        onClassReqs(env, xs) {
          log.push('reqs');
          return inherited.onClassReqs(env, xs);
        },
        onClassImplements(env, xs) {
          log.push('implements');
          return inherited.onClassImplements(env, xs);
        },
        onClassWhereConstraints(env, xs) {
          log.push('whereConstraints');
          return inherited.onClassWhereConstraints(env, xs);
        },
        onClassConsts(env, xs) {
          log.push('consts');
          return inherited.onClassConsts(env, xs);
        },
        onClassTypeconsts(env, xs) {
          log.push('typeconsts');
          return inherited.onClassTypeconsts(env, xs);
        },
        onClassVars(env, xs) {
          log.push('vars');
          return inherited.onClassVars(env, xs);
        },
        onClassEnum(env, e) {
          log.push('enum');
          return inherited.onClassEnum(env, e);
        },
        onClassMethods(env, xs) {
          log.push('methods');
          return inherited.onClassMethods(env, xs);
        },
        onClassUserAttributes(env, xs) {
          log.push('userAttributes');
          return inherited.onClassUserAttributes(env, xs);
        },
        onClassFileAttributes(env, xs) {
          log.push('fileAttributes');
          return inherited.onClassFileAttributes(env, xs);
        },
      }));
      v.onClass(null, TestFactories.fullClass());

      assert.deepEqual(log, [
        'decl:en:class',
        'tparams',
        'extends',
        'uses',
        'xhpAttrs',
        'xhpAttrUses',
        'reqs',
        'implements',
        'whereConstraints',
        'consts',
        'typeconsts',
        'vars',
        'enum',
        'methods',
        'decl:en:method',
        'userAttributes',
        'fileAttributes',
      ]);
    });

    it('方法的返回类型最后改写', () => {
      const log: string[] = [];
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onDeclAnnotation(env, en) {
          log.push('annotation');
          return inherited.onDeclAnnotation(env, en);
        },
        onMethodTparams(env, xs) {
          log.push('tparams');
          return inherited.onMethodTparams(env, xs);
        },
        onMethodWhereConstraints(env, xs) {
          log.push('whereConstraints');
          return inherited.onMethodWhereConstraints(env, xs);
        },
        onMethodParams(env, xs) {
          log.push('params');
          return inherited.onMethodParams(env, xs);
        },
        onMethodCtxs(env, c) {
          log.push('ctxs');
          return inherited.onMethodCtxs(env, c);
        },
        onMethodUnsafeCtxs(env, c) {
          log.push('unsafeCtxs');
          return inherited.onMethodUnsafeCtxs(env, c);
        },
        onMethodBody(env, b) {
          log.push('body');
          return inherited.onMethodBody(env, b);
        },
        onMethodUserAttributes(env, xs) {
          log.push('userAttributes');
          return inherited.onMethodUserAttributes(env, xs);
        },
        onMethodRet(env, th) {
          log.push('ret');
          return inherited.onMethodRet(env, th);
        },
      }));
      v.onMethod(null, TestFactories.method());

      assert.deepEqual(log, [
        'annotation',
        'tparams',
        'whereConstraints',
        'params',
        'ctxs',
        'unsafeCtxs',
        'body',
        'userAttributes',
        'ret',
      ]);
    });

    it('函数的返回类型紧随标注之后改写', () => {
      const log: string[] = [];
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onDeclAnnotation(env, en) {
          log.push('annotation');
          return inherited.onDeclAnnotation(env, en);
        },
        onFunRet(env, th) {
          log.push('ret');
          return inherited.onFunRet(env, th);
        },
        onFunTparams(env, xs) {
          log.push('tparams');
          return inherited.onFunTparams(env, xs);
        },
        onFunWhereConstraints(env, xs) {
          log.push('whereConstraints');
          return inherited.onFunWhereConstraints(env, xs);
        },
        onFunParams(env, xs) {
          log.push('params');
          return inherited.onFunParams(env, xs);
        },
        onFunCtxs(env, c) {
          log.push('ctxs');
          return inherited.onFunCtxs(env, c);
        },
        onFunUnsafeCtxs(env, c) {
          log.push('unsafeCtxs');
          return inherited.onFunUnsafeCtxs(env, c);
        },
        onFunBody(env, b) {
          log.push('body');
          return inherited.onFunBody(env, b);
        },
        onFunUserAttributes(env, xs) {
          log.push('userAttributes');
          return inherited.onFunUserAttributes(env, xs);
        },
      }));
      v.onFun(null, TestFactories.fun());

      assert.deepEqual(log, [
        'annotation',
        'ret',
        'tparams',
        'whereConstraints',
        'params',
        'ctxs',
        'unsafeCtxs',
        'body',
        'userAttributes',
      ]);
    });

    it('类变量按属性、初始值、类型的顺序改写', () => {
      const log: string[] = [];
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onClassVarUserAttributes(env, xs) {
          log.push('userAttributes');
          return inherited.onClassVarUserAttributes(env, xs);
        },
        onClassVarExpr(env, e) {
          log.push('expr');
          return inherited.onClassVarExpr(env, e);
        },
        onClassVarType(_env, [, hint]) {
          log.push('type');
          return ['ex:retyped', hint];
        },
      }));
      const cv = single(TestFactories.fullClass().vars);
      const out = v.onClassVar(null, cv);

      assert.deepEqual(log, ['userAttributes', 'expr', 'type']);
      assert.deepEqual(out.type, ['ex:retyped', Node.Happly('int')]);
      assert.deepEqual(out.expr, cv.expr);
    });

    it('函数类型提示按参数、变长参数、上下文、返回类型的顺序改写', () => {
      const log: string[] = [];
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onHintFunParamTys(env, hints) {
          log.push('paramTys');
          return inherited.onHintFunParamTys(env, hints);
        },
        onHintFunVariadicTy(env, hint) {
          log.push('variadicTy');
          return inherited.onHintFunVariadicTy(env, hint);
        },
        onHintFunCtxs(env, c) {
          log.push('ctxs');
          return inherited.onHintFunCtxs(env, c);
        },
        onHintFunReturnTy(env, hint) {
          log.push('returnTy');
          return inherited.onHintFunReturnTy(env, hint);
        },
      }));
      const hf = Node.HintFun(
        [Node.Happly('A')],
        Node.Happly('B'),
        Node.Contexts([Node.Happly('C')]),
        Node.Happly('V')
      );
      const out = v.onHintFun(null, hf);

      assert.deepEqual(log, ['paramTys', 'variadicTy', 'ctxs', 'returnTy']);
      assert.deepEqual(out, hf);
    });

    it('全局常量按标注、类型、值的顺序改写', () => {
      const log: string[] = [];
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onDeclAnnotation(env, en) {
          log.push('annotation');
          return inherited.onDeclAnnotation(env, en);
        },
        onGconstType(_env, hint) {
          log.push('type');
          return hint === null ? null : Node.Hoption(hint);
        },
        onGconstValue(env, value) {
          log.push('value');
          return inherited.onGconstValue(env, value);
        },
      }));
      const out = v.onGconst(null, TestFactories.gconst());

      assert.deepEqual(log, ['annotation', 'type', 'value']);
      assert.deepEqual(out.type, Node.Hoption(Node.Happly('int')));
      assert.deepEqual(out.value, TestFactories.expr('ex:limit', 10));
    });

    it('函数参数按标注、类型、默认值、属性的顺序改写', () => {
      const log: string[] = [];
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onExprAnnotation(env, ex) {
          log.push(`ann:${ex}`);
          return inherited.onExprAnnotation(env, ex);
        },
        onFunParamTypeHint(env, th) {
          log.push('typeHint');
          return inherited.onFunParamTypeHint(env, th);
        },
        onFunParamExpr(env, e) {
          log.push('expr');
          return inherited.onFunParamExpr(env, e);
        },
        onFunParamUserAttributes(env, xs) {
          log.push('userAttributes');
          return inherited.onFunParamUserAttributes(env, xs);
        },
      }));
      const param = single(TestFactories.method().params);
      const out = v.onFunParam(null, param);

      assert.deepEqual(log, [
        'ann:ex:param',
        'typeHint',
        'ann:ex:param',
        'expr',
        'ann:ex:default',
        'userAttributes',
      ]);
      assert.deepEqual(out, param);
    });
  });

  describe('序列组合子', () => {
    it('覆写 onList 对字段钩子中的列表同样生效', () => {
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onList: (f, env, xs) => [...inherited.onList(f, env, xs)].reverse(),
      }));
      const cls = Node.Class<Ex, En>('en:c', 'C', {
        tparams: [Node.Tparam('T', [['ConstraintAs', Node.Happly('P')], ['ConstraintAs', Node.Happly('Q')]])],
        extends: [Node.Happly('A'), Node.Happly('B')],
        implements: [Node.Happly('I'), Node.Happly('J')],
        userAttributes: [Node.UserAttribute('X'), Node.UserAttribute('Y')],
      });
      const out = v.onClass(null, cls);

      assert.deepEqual(out.extends.map(TestFactories.hintName), ['B', 'A']);
      assert.deepEqual(out.implements.map(TestFactories.hintName), ['J', 'I']);
      assert.deepEqual(out.userAttributes.map(a => a.name.name), ['Y', 'X']);
      assert.deepEqual(
        single(out.tparams).constraints.map(([, h]) => TestFactories.hintName(h)),
        ['Q', 'P']
      );
    });

    it('覆写 onOption 对字段钩子中的可选字段同样生效', () => {
      const v = createElabEndo<null, Ex, En>(() => ({
        onOption: () => null,
      }));
      const out = v.onClassVar(null, single(TestFactories.fullClass().vars));

      assert.equal(out.expr, null);
      assert.equal(out.type[1], null);
    });
  });

  describe('二元组投影', () => {
    it('onFst 只改写第一个分量', () => {
      const v = createElabEndo<null, Ex, En>();
      const out = v.onFst((_env: null, n: number) => n + 1, null, [1, 'a']);
      assert.deepEqual(out, [2, 'a']);
    });

    it('onSnd 只改写第二个分量', () => {
      const v = createElabEndo<null, Ex, En>();
      const out = v.onSnd((_env: null, s: string) => s.toUpperCase(), null, [1, 'a']);
      assert.deepEqual(out, [1, 'A']);
    });
  });

  describe('context 与 hint', () => {
    it('只覆写 onContext 时类型位置上的同名 hint 不变', () => {
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onContext: (env, hint) => TestFactories.renameHint(inherited.onContext(env, hint), n => `ctx:${n}`),
      }));
      const method = v.onMethod(null, TestFactories.method());

      assert.deepEqual(method.ctxs?.[1].map(TestFactories.hintName), ['ctx:X']);
      assert.deepEqual(method.unsafeCtxs?.[1].map(TestFactories.hintName), ['ctx:write_props']);
      assert.equal(TestFactories.hintName(single(method.params).typeHint[1] ?? Node.Hmixed()), 'X');
    });

    it('覆写 onHint 同样作用于上下文位置', () => {
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onHint: (env, hint) => v2(inherited.onHint(env, hint)),
      }));
      const method = v.onMethod(null, TestFactories.method());

      assert.deepEqual(method.ctxs?.[1].map(TestFactories.hintName), ['X_v2']);
      assert.equal(TestFactories.hintName(single(method.params).typeHint[1] ?? Node.Hmixed()), 'X_v2');
    });

    it('上下文列表的位置标签原样保留', () => {
      const ctxs = Node.Contexts([Node.Happly('A'), Node.Happly('B')]);
      const v = createElabEndo<null, Ex, En>(() => ({
        onContext: (_env, hint) => v2(hint),
      }));
      const out = v.onContexts(null, ctxs);

      assert.strictEqual(out[0], ctxs[0]);
      assert.deepEqual(out[1].map(TestFactories.hintName), ['A_v2', 'B_v2']);
    });

    it('函数类型提示中的上下文经由 onContext', () => {
      const hint = Node.Hfun(Node.HintFun([], Node.Happly('R'), Node.Contexts([Node.Happly('C')])));
      const v = createElabEndo<null, Ex, En>(() => ({
        onContext: (_env, h) => v2(h),
      }));
      const [, kind] = v.onHint(null, hint);

      assert.ok(kind.kind === 'Hfun');
      assert.deepEqual(kind.fun.ctxs?.[1].map(TestFactories.hintName), ['C_v2']);
      assert.equal(TestFactories.hintName(kind.fun.returnTy), 'R');
    });
  });

  describe('用户属性列表', () => {
    it('每个属性列表都作为整体交给 onUserAttributes', () => {
      const lists: string[][] = [];
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onUserAttributes(env, attrs) {
          lists.push(attrs.map(a => a.name.name));
          return inherited.onUserAttributes(env, attrs);
        },
      }));
      v.onClass(null, TestFactories.fullClass());

      assert.deepEqual(lists, [[], ['VarAttr'], ['ParamAttr'], ['Memoize'], ['Sealed'], ['FileAttr']]);
    });

    it('可以在列表层面删除属性', () => {
      const fun = Node.Fun<Ex, En>('en:fun', ['ex:ret', null], {
        params: [
          Node.FunParam<Ex, En>('ex:p', 'p', null, {
            userAttributes: [Node.UserAttribute('Deprecated')],
          }),
        ],
        userAttributes: [Node.UserAttribute('Deprecated'), Node.UserAttribute('Memoize')],
      });
      const v = createElabEndo<null, Ex, En>((_self, inherited) => ({
        onUserAttributes: (env, attrs) =>
          inherited.onUserAttributes(env, attrs).filter(a => a.name.name !== 'Deprecated'),
      }));
      const out = v.onFun(null, fun);

      assert.deepEqual(out.userAttributes.map(a => a.name.name), ['Memoize']);
      assert.deepEqual(single(out.params).userAttributes, []);
    });
  });

  describe('元数据钩子', () => {
    it('嵌套节点上的标注全部经过元数据钩子', () => {
      const v = relabelAnnotations<null, Ex, En>(
        (_env, ex) => ex.toUpperCase(),
        (_env, en) => en.toUpperCase()
      );
      const cls = v.onClass(null, TestFactories.fullClass());
      const method = single(cls.methods);
      const param = single(method.params);

      assert.equal(cls.annotation, 'EN:CLASS');
      assert.equal(method.annotation, 'EN:METHOD');
      assert.equal(method.ret[0], 'EX:RET');
      assert.equal(param.annotation, 'EX:PARAM');
      assert.equal(param.expr?.[0], 'EX:DEFAULT');
      assert.equal(single(cls.vars).type[0], 'EX:VAR');
      assert.equal(single(cls.xhpAttrs).typeHint[0], 'EX:XHP');

      const [stmt] = method.body.fbAst;
      assert.ok(stmt !== undefined);
      const [, kind] = stmt;
      assert.ok(kind.kind === 'Expr');
      const [callAnn, , call] = kind.expr;
      assert.equal(callAnn, 'EX:CALL');
      assert.ok(call.kind === 'Call');
      assert.deepEqual(
        call.targs.map(([ex]) => ex),
        ['EX:TARG']
      );
    });
  });
});
