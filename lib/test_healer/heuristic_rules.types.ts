import {z} from 'zod';
import {FAILURE_KINDS} from '@lib/types';

export const RuleMatchSchema = z.union([
  z.object({substring: z.string().min(1)}).strict(),
  z.object({regex: z.string().min(1), flags: z.string().regex(/^[imsu]*$/).optional()}).strict(),
]);

export const RuleFixSchema = z.object({
  originalCode: z.string().min(1),
  fixedCode: z.string(),
  description: z.string().min(1),
}).strict();

export const HeuristicRuleSchema = z.object({
  id: z.string().min(1),
  match: RuleMatchSchema,
  kind: z.enum(FAILURE_KINDS),
  reason: z.string().min(1),
  fix: RuleFixSchema.optional(),
}).strict();

export const HeuristicRuleListSchema = z.array(HeuristicRuleSchema).superRefine((rules, ctx) => {
  const seen = new Set<string>();
  rules.forEach((rule, index) => {
    if (seen.has(rule.id)) {
      ctx.addIssue({code: z.ZodIssueCode.custom, path: [index, 'id'], message: `Duplicate rule id '${rule.id}'`});
    }
    seen.add(rule.id);
  });
});

export type RuleMatch = z.infer<typeof RuleMatchSchema>;
export type RuleFix = z.infer<typeof RuleFixSchema>;
export type HeuristicRule = z.infer<typeof HeuristicRuleSchema>;
