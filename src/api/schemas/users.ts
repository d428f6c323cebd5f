// ═══════════════════════════════════════════════════════════════════════════════
// USER SCHEMAS — Profile, Medicines, Caregivers and Push Tokens
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { IdSchema, MedicineNameSchema } from './common.js';

const DetailText = z.string().trim().max(500);

/**
 * Partial update; only the fields present are changed.
 *
 * @example
 * { "name": "Ravi", "age": 72, "hobbies": "gardening, old film songs" }
 */
export const UpdateUserDetailsSchema = z
  .object({
    name: z.string().trim().min(1).max(100).optional(),
    age: z.union([z.number().int().min(0).max(150), DetailText]).optional(),
    hobbies: DetailText.optional(),
    medicalHistory: z.string().trim().max(2000).optional(),
    address: DetailText.optional(),
    phone: z.string().trim().max(32).optional(),
    email: z.string().trim().email().optional(),
    emergencyContact: DetailText.optional(),
    languagePreference: z.string().trim().max(50).optional(),
    bloodGroup: z.string().trim().max(10).optional(),
    relation: z.string().trim().max(50).optional(),
  })
  .strict()
  .refine(value => Object.values(value).some(field => field !== undefined), {
    message: 'At least one field is required',
  });

export const MedicineInputSchema = z.object({
  medicineName: MedicineNameSchema,
  dosage: z.string().trim().max(100).optional(),
  initialQuantity: z.number().int().nonnegative().optional(),
  dailyIntake: z.number().int().nonnegative().optional(),
});

export const AddMedicinesSchema = z.object({
  medicines: z.array(MedicineInputSchema).min(1, 'At least one medicine is required').max(20),
});

export const MedicineIdParamSchema = z.object({
  medicineId: IdSchema,
});

export const SetCaregiversSchema = z.object({
  caregivers: z.array(IdSchema).max(20),
});

export const UserIdParamSchema = z.object({
  userId: IdSchema,
});

export const PushTokenSchema = z.object({
  token: z.string().trim().min(1, 'Token is required').max(4096),
});

export type UpdateUserDetailsRequest = z.infer<typeof UpdateUserDetailsSchema>;
export type AddMedicinesRequest = z.infer<typeof AddMedicinesSchema>;
export type SetCaregiversRequest = z.infer<typeof SetCaregiversSchema>;
export type PushTokenRequest = z.infer<typeof PushTokenSchema>;
