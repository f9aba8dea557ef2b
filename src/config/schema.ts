import { z } from 'zod';

const RuleSchema = z
  .object({
    id: z.string().min(1),
    pattern: z.string().min(1),
    flags: z.string().optional(),
    message: z.string().min(1),
  })
  .superRefine((rule, ctx) => {
    try {
      new RegExp(rule.pattern, rule.flags);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern'],
        message: `Invalid regular expression for rule '${rule.id}': ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  });

export const GuideCheckConfigSchema = z.object({
  image: z.string().min(1),
  mode: z.enum(['validate', 'full']),
  execute: z.boolean(),
  timeout_seconds: z.number().int().positive(),
  artifacts_dir: z.string().min(1),
  markers: z.object({
    container_tag: z.string().regex(/^[a-z][a-z0-9-]*$/i),
    block_class: z.string().min(1),
    control_tag: z.string().regex(/^[a-z][a-z0-9-]*$/i),
    control_class: z.string().min(1),
  }),
  product: z.object({
    name: z.string().min(1),
    executable: z.string().regex(/^[\w.+-]+$/, 'executable must be a bare command name'),
    version_flag: z.string().nullable(),
  }),
  prerequisites: z.array(z.string().regex(/^[a-z0-9][a-z0-9+.-]*$/, 'not a Debian package name')).min(1),
  informational_commands: z.array(RuleSchema),
  required_patterns: z.array(RuleSchema),
  danger_patterns: z.array(RuleSchema),
  key_verification: z.object({
    expected_fingerprint: z
      .string()
      .regex(/^[0-9A-F]{40}$/, 'fingerprint must be 40 upper-case hex characters')
      .nullable(),
    key_file: z.string().min(1).nullable(),
  }),
  codename_images: z.record(z.string().min(1)),
});

export type GuideCheckConfig = z.infer<typeof GuideCheckConfigSchema>;
export type RuleDefinition = GuideCheckConfig['required_patterns'][number];
