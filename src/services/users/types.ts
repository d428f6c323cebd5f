// ═══════════════════════════════════════════════════════════════════════════════
// USER TYPES — Stored Details and Medicine Records
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

/**
 * Stored `user_details` document. Fields the engagement profile reads are a
 * subset of these.
 */
export const UserDetailsSchema = z.object({
  name: z.string().optional(),
  age: z.union([z.number(), z.string()]).optional(),
  hobbies: z.string().optional(),
  medicalHistory: z.string().optional(),
  address: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
  emergencyContact: z.string().optional(),
  languagePreference: z.string().optional(),
  bloodGroup: z.string().optional(),
  relation: z.string().optional(),
});

export type UserDetails = z.infer<typeof UserDetailsSchema>;

export const MedicineRecordSchema = z.object({
  id: z.string().min(1),
  medicineName: z.string(),
  dosage: z.string().optional(),
  initialQuantity: z.number().int().nonnegative().optional(),
  dailyIntake: z.number().int().nonnegative().optional(),
  timestamp: z.string(),
});

export type MedicineRecord = z.infer<typeof MedicineRecordSchema>;

export type MedicineInput = Omit<MedicineRecord, 'id' | 'timestamp'>;
