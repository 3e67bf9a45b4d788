/**
 * Plan response parsing.
 *
 * The planner is asked for JSON but models often wrap it in prose or fences,
 * so the result records how much of the response could be recovered.
 */

import { z } from 'zod';

export const ProposedChangeSchema = z.object({
  file: z.string(),
  change: z.string()
});

export const PlanSchema = z
  .object({
    analysis: z.string().default(''),
    proposed_changes: z.array(ProposedChangeSchema).default([]),
    tests: z.union([z.string(), z.array(z.string())]).default('')
  })
  .passthrough();

export type ProposedChange = z.infer<typeof ProposedChangeSchema>;
export type Plan = z.infer<typeof PlanSchema>;

export type PlanResult =
  | { kind: 'parsed'; plan: Plan }
  | { kind: 'partial'; plan: Plan }
  | { kind: 'unstructured'; raw: string };

export function parsePlanResponse(raw: string): PlanResult {
  const whole = tryParsePlan(raw);
  if (whole) {
    return { kind: 'parsed', plan: whole };
  }

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}') + 1;
  if (start >= 0 && end > start) {
    const partial = tryParsePlan(raw.slice(start, end));
    if (partial) {
      return { kind: 'partial', plan: partial };
    }
  }

  return { kind: 'unstructured', raw };
}

/**
 * The value sent back to the model in later prompts.
 */
export function planForPrompt(result: PlanResult): Plan {
  if (result.kind === 'unstructured') {
    return PlanSchema.parse({ analysis: result.raw.trim() });
  }
  return result.plan;
}

function tryParsePlan(text: string): Plan | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = PlanSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
