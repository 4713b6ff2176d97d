/**
 * @module elab
 *
 * 细化阶段的可定制改写遍历器与内置 pass。
 */

export { createElabEndo } from './elab_visitor.js';
export type { ElabEndo, ElabOverrides } from './elab_visitor.js';
export { elabHapplyHint, canonicalizeHint } from './passes/elab_happly_hint.js';
export { elabContexts, qualifyContext, CONTEXTS_NAMESPACE } from './passes/elab_contexts.js';
export { elabUserAttributes, dedupeUserAttributes } from './passes/elab_user_attributes.js';
export { elabClassNames, stripLeadingBackslash } from './passes/elab_class_names.js';
export { relabelAnnotations } from './passes/relabel_annotations.js';
export {
  PASS_REGISTRY,
  DEFAULT_PASS_ORDER,
  isPassName,
  resolvePasses,
  elaborateProgram,
} from './pipeline.js';
export type { PassFactory, PassName, ResolvedPass, ElaborateOptions } from './pipeline.js';
