import {
  empty,
  formatZodIssues,
  fromZod,
  getErrorMessage,
  RuleConfigError,
  type RuleParameters,
} from '@rulegate/core';
import { err, ok, type Result } from 'neverthrow';
import { z, type ZodType, type ZodTypeDef } from 'zod';

import type { RuleHandler } from '../registry/types.js';

/**
 * Per-rule enablement and settings. Handlers consult it; the dispatch core
 * never does.
 */
export interface RuleConfigSource {
  isEnforced(tag: string): boolean;
  settingsFor(tag: string): Readonly<Record<string, unknown>>;
}

export const ruleConfigSchema = z.object({
  defaultEnforced: z.boolean().default(true),
  rules: z
    .record(
      z.string().min(1),
      z.object({
        enforced: z.boolean().default(true),
        settings: z.record(z.unknown()).default({}),
      })
    )
    .default({}),
});

export type RuleConfigDocument = z.infer<typeof ruleConfigSchema>;
export type RuleConfigInput = z.input<typeof ruleConfigSchema>;

/**
 * In-memory config source backed by a validated document
 */
export class StaticRuleConfigSource implements RuleConfigSource {
  private constructor(private readonly document: RuleConfigDocument) {}

  static create(input: unknown): Result<StaticRuleConfigSource, RuleConfigError> {
    return fromZod(ruleConfigSchema, input)
      .map((document) => new StaticRuleConfigSource(document))
      .mapErr((error) => new RuleConfigError(formatZodIssues(error), error));
  }

  static fromJson(text: string): Result<StaticRuleConfigSource, RuleConfigError> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      return err(new RuleConfigError([`(root): Invalid JSON: ${getErrorMessage(error)}`], error));
    }
    return StaticRuleConfigSource.create(parsed);
  }

  isEnforced(tag: string): boolean {
    return this.document.rules[tag]?.enforced ?? this.document.defaultEnforced;
  }

  settingsFor(tag: string): Readonly<Record<string, unknown>> {
    return this.document.rules[tag]?.settings ?? {};
  }
}

/**
 * Read one setting of a rule and validate it
 */
export function readSetting<T>(
  source: RuleConfigSource,
  tag: string,
  key: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Result<T, RuleConfigError> {
  const parsed = schema.safeParse(source.settingsFor(tag)[key]);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${['rules', tag, 'settings', key, ...issue.path].join('.')}: ${issue.message}`
    );
    return err(new RuleConfigError(issues, parsed.error));
  }
  return ok(parsed.data);
}

/**
 * Wrap a handler so it reports `empty` (the rule opted out) whenever its
 * rule is not enforced
 */
export function whenEnforced<P extends RuleParameters>(source: RuleConfigSource, handler: RuleHandler<P>): RuleHandler<P> {
  return (params, context) => {
    if (!source.isEnforced(params.kind)) {
      context.logger.debug('Rule not enforced, skipping');
      return empty();
    }
    return handler(params, context);
  };
}
