import { z } from 'zod';
import { ApiShapeSchema } from '../providers/providerContract.js';

export const ProfileKindSchema = z.enum(['chat', 'embedding']);
export type ProfileKind = z.infer<typeof ProfileKindSchema>;

export const ReasoningEffortSchema = z.enum(['minimal', 'low', 'medium', 'high']);

export const ProviderProfileSchema = z
  .object({
    name: z.string().min(1),
    /** Provider family; defaults to `name` */
    provider: z.string().min(1).optional(),
    /** Only chat profiles route and receive requests */
    kind: ProfileKindSchema.default('chat'),
    api: ApiShapeSchema.optional(),
    /** Alternate shape of the same provider tried once after a shape mismatch */
    fallbackApi: ApiShapeSchema.optional(),
    /** Literal URL or `$NAME` reference */
    baseUrl: z.string().min(1).optional(),
    /** Literal key or `$NAME` reference */
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    /** Share of wildcard traffic; 0 keeps the profile out of wildcard routing */
    weight: z.number().int().min(0).lt(100).default(1),
    reasoning: ReasoningEffortSchema.optional(),
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
    /** AWS region for Bedrock */
    region: z.string().min(1).optional(),
  })
  .strict();

export type ProviderProfile = z.infer<typeof ProviderProfileSchema>;
export type ProviderProfileInput = z.input<typeof ProviderProfileSchema>;

export const RoutingConfigSchema = z
  .object({
    /** Profile name, alias, or `*` for weighted selection */
    defaultProvider: z.string().min(1).default('*'),
    /** alias -> `provider` or `provider/model` */
    aliases: z.record(z.string().min(1)).default({}),
    /** Inline overlay entries for `$NAME` resolution */
    env: z.record(z.coerce.string()).default({}),
    providers: z.array(ProviderProfileSchema).default([]),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.providers.forEach((profile, index) => {
      if (seen.has(profile.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['providers', index, 'name'],
          message: `Duplicate provider name "${profile.name}"`,
        });
      }
      seen.add(profile.name);
    });
  });

export type RoutingConfig = z.infer<typeof RoutingConfigSchema>;
export type RoutingConfigInput = z.input<typeof RoutingConfigSchema>;
