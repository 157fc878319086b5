import { z } from 'zod';
import { E164_PATTERN } from '../../channels/sms.adapter.js';
import {
  normalizeHazardType,
  normalizeRegion,
} from '../../engine/intake/event-intake.service.js';

// 공백, 하이픈, 괄호, 점은 제거 후 E.164 검사
const PhoneSchema = z
  .string()
  .transform((raw) => raw.replace(/[\s\-().]/g, ''))
  .refine((phone) => E164_PATTERN.test(phone), {
    message: 'Phone number must be in E.164 format, e.g. +61412345678',
  });

const EmailSchema = z.string().trim().toLowerCase().pipe(z.string().email());

const RegionsSchema = z
  .array(z.string().trim().min(1).max(64))
  .max(100)
  .transform((regions) => [...new Set(regions.map(normalizeRegion))]);

const HazardTypesSchema = z
  .array(z.string().trim().min(1).max(64))
  .max(50)
  .transform((types) => [...new Set(types.map(normalizeHazardType))]);

const SubscriberFields = {
  name: z.string().trim().min(1).max(200).nullable(),
  email: EmailSchema.nullable(),
  emailOptIn: z.boolean(),
  phone: PhoneSchema.nullable(),
  smsOptIn: z.boolean(),
  regions: RegionsSchema,
  hazardTypes: HazardTypesSchema,
  active: z.boolean(),
};

export const CreateSubscriberBodySchema = z
  .object({
    name: SubscriberFields.name.default(null),
    email: SubscriberFields.email.default(null),
    emailOptIn: SubscriberFields.emailOptIn.default(true),
    phone: SubscriberFields.phone.default(null),
    smsOptIn: SubscriberFields.smsOptIn.default(false),
    regions: SubscriberFields.regions,
    hazardTypes: SubscriberFields.hazardTypes.default([]),
    active: SubscriberFields.active.default(true),
  })
  .strict()
  .refine((s) => s.email !== null || s.phone !== null, {
    message: 'At least one of email or phone is required',
    path: ['email'],
  });

export type CreateSubscriberBody = z.infer<typeof CreateSubscriberBodySchema>;

export const UpdateSubscriberBodySchema = z
  .object(SubscriberFields)
  .partial()
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, {
    message: 'Empty update',
  });

export type UpdateSubscriberBody = z.infer<typeof UpdateSubscriberBodySchema>;

export const ListSubscribersQuerySchema = z.object({
  region: z.string().trim().min(1).transform(normalizeRegion).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ListSubscribersQuery = z.infer<typeof ListSubscribersQuerySchema>;
