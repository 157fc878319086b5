import { z } from 'zod';
import {
  ChannelLimitsSchema,
  RetryPolicySchema,
  RuntimeSettingsSchema,
} from './dispatch-settings.schema.js';

export const PatchDispatchSettingsBodySchema = RuntimeSettingsSchema.extend({
  retry: RetryPolicySchema.partial(),
  channels: z
    .object({
      EMAIL: ChannelLimitsSchema.partial(),
      SMS: ChannelLimitsSchema.partial(),
    })
    .partial()
    .strict(),
})
  .partial()
  .strict();

export type PatchDispatchSettingsBody = z.infer<
  typeof PatchDispatchSettingsBodySchema
>;
