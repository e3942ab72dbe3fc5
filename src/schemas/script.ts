import { z } from 'zod';

// What a scan script's default export may return
export const ScriptOutcomeSchema = z
  .object({
    output: z.string().optional(),
    data: z.record(z.string()).optional(),
  })
  .nullish();

export const ScriptModuleSchema = z.object({
  default: z.function(),
});

export type ScriptOutcome = z.infer<typeof ScriptOutcomeSchema>;
