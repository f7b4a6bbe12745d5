/**
 * @module fixes/response-schema
 * Expected JSON shape of a generated remediation and its parser.
 */

import { z } from 'zod';
import { BackendUnavailableError } from '../errors.js';

export const GeneratedFixSchema = z.object({
  rootCause: z.string().min(1),
  action: z.object({
    command: z.array(z.string().min(1)).min(1),
    description: z.string().default(''),
  }),
  rollback: z.object({
    command: z.array(z.string().min(1)).min(1),
    description: z.string().default(''),
  }),
  riskLevel: z.enum(['LOW', 'MEDIUM', 'HIGH']),
  rationale: z.string().default(''),
});

export type GeneratedFix = z.infer<typeof GeneratedFixSchema>;

/** Pull the JSON body out of a reply, tolerating ```json fences and surrounding prose. */
export function extractJson(reply: string): string {
  const fenced = reply.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1] !== undefined) return fenced[1].trim();
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  return start >= 0 && end > start ? reply.slice(start, end + 1) : reply.trim();
}

/** @throws {BackendUnavailableError} when the reply is not a usable fix */
export function parseGeneratedFix(reply: string): GeneratedFix {
  let json: unknown;
  try {
    json = JSON.parse(extractJson(reply));
  } catch {
    throw new BackendUnavailableError('Generator reply is not JSON', { reply: reply.slice(0, 200) });
  }
  const result = GeneratedFixSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new BackendUnavailableError('Generator reply does not match the fix schema', { issues });
  }
  return result.data;
}
