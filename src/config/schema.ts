import { z } from 'zod';

const extensionPattern = /^\.[A-Za-z0-9_+-]+$/;

export const stubWeaveConfigSchema = z
  .object({
    fragments: z.string().min(1).optional(),

    sources: z
      .object({
        extensions: z
          .array(z.string().regex(extensionPattern, 'Extension must look like ".c"'))
          .min(1)
          .max(50)
          .optional(),
        exclude_dirs: z.array(z.string().min(1)).max(100).optional(),
      })
      .strict()
      .optional(),

    output: z
      .object({
        mode: z.enum(['mirror', 'suffix']).optional(),
        suffix: z.string().min(1).max(32).optional(),
        backup: z.boolean().optional(),
      })
      .strict()
      .optional(),

    encoding: z
      .object({
        fallback: z.array(z.string().min(1)).min(1).max(20).optional(),
        detect_bytes: z.number().int().min(64).max(64 * 1024 * 1024).optional(),
        confidence_threshold: z.number().int().min(0).max(100).optional(),
      })
      .strict()
      .optional(),

    insertion: z
      .object({
        trace_marker: z.string().min(1).max(200).optional(),
        no_anchor_mode: z.enum(['skip', 'insert_all']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type StubWeaveConfigInput = z.input<typeof stubWeaveConfigSchema>;
