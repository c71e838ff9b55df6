/**
 * A rule-invocation parameter object. `kind` is the Parameter Type Tag: it
 * names which concrete variant the value is and selects its one handler.
 *
 * Callers declare their variants as a discriminated union:
 *
 * ```ts
 * type ShiftRuleParams =
 *   | { kind: 'max-hours'; workerId: string; hours: number }
 *   | { kind: 'rest-period'; workerId: string; start: Date; end: Date };
 * ```
 */
export interface RuleParameters<TTag extends string = string> {
  readonly kind: TTag;
}

/** The tag union of a parameter union */
export type TagOf<P extends RuleParameters> = P['kind'];

/** The variant of `P` whose tag is `K` */
export type ParametersOfKind<P extends RuleParameters, K extends TagOf<P>> = Extract<P, { kind: K }>;

export function tagOf<P extends RuleParameters>(params: P): TagOf<P> {
  return params.kind;
}

/**
 * Narrow a parameter union to the variant carrying `tag`
 */
export function isKind<P extends RuleParameters, K extends TagOf<P>>(
  params: P,
  tag: K
): params is ParametersOfKind<P, K> {
  return params.kind === tag;
}
