// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE STORE — User Details, Medicines, Push Tokens and Caregivers
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { UserProfileSchema, type UserProfile } from '../../core/engagement/index.js';
import type { IdFactory } from '../../core/reminders/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { USERS_ROOT, userPaths, type DocumentStore } from '../../storage/index.js';
import {
  MedicineRecordSchema,
  UserDetailsSchema,
  type MedicineInput,
  type MedicineRecord,
  type UserDetails,
} from './types.js';

const logger = getLogger({ component: 'profile-store' });

const ProfileDetailsSchema = UserProfileSchema.omit({ medicines: true });

const MedicinesSchema = z.array(z.object({
  medicineName: z.string().optional(),
  dosage: z.string().optional(),
}).passthrough());

const CaregiversSchema = z.array(z.string().min(1));

export class ProfileStore {
  private readonly docs: DocumentStore;
  private readonly newId: IdFactory;

  constructor(docs: DocumentStore, newId: IdFactory = uuidv4) {
    this.docs = docs;
    this.newId = newId;
  }

  /**
   * Profile used to personalize questions. Missing or malformed parts read
   * as empty.
   */
  async getProfile(userId: string): Promise<UserProfile> {
    const [rawDetails, rawMedicines] = await Promise.all([
      this.docs.get(userPaths.details(userId)),
      this.docs.get(userPaths.medicines(userId)),
    ]);

    const details = ProfileDetailsSchema.safeParse(rawDetails ?? {});
    if (!details.success) {
      logger.warn('User details unreadable, using empty profile', { userId });
    }

    const medicines = MedicinesSchema.safeParse(rawMedicines ?? []);
    if (!medicines.success) {
      logger.warn('Medicine list unreadable, ignoring', { userId });
    }

    return {
      ...(details.success ? details.data : {}),
      medicines: medicines.success ? medicines.data : [],
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Details
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Stored details, or undefined when none are stored or they are unreadable.
   */
  async getDetails(userId: string): Promise<UserDetails | undefined> {
    const raw = await this.docs.get(userPaths.details(userId));
    if (raw === undefined) return undefined;

    const parsed = UserDetailsSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('User details unreadable', { userId });
      return undefined;
    }
    return parsed.data;
  }

  /**
   * Merge `changes` over the stored details. Absent fields are kept.
   */
  async updateDetails(userId: string, changes: UserDetails): Promise<UserDetails> {
    const existing = (await this.getDetails(userId)) ?? {};
    const defined = Object.fromEntries(Object.entries(changes).filter(([, value]) => value !== undefined));
    const merged = UserDetailsSchema.parse({ ...existing, ...defined });

    await this.docs.set(userPaths.details(userId), merged);
    logger.info('User details updated', { userId, fields: Object.keys(defined) });
    return merged;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Medicines
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Tracked medicines in the order they were added. Unreadable records are skipped.
   */
  async listMedicines(userId: string): Promise<MedicineRecord[]> {
    const raw = await this.docs.get(userPaths.medicines(userId));
    if (!Array.isArray(raw)) return [];

    const records: MedicineRecord[] = [];
    for (const item of raw) {
      const parsed = MedicineRecordSchema.safeParse(item);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        logger.warn('Skipping malformed medicine record', { userId });
      }
    }
    return records;
  }

  async addMedicines(userId: string, inputs: readonly MedicineInput[], timestamp: string): Promise<MedicineRecord[]> {
    const added = inputs.map((input): MedicineRecord => ({ ...input, id: this.newId(), timestamp }));
    const medicines = [...(await this.listMedicines(userId)), ...added];

    await this.docs.set(userPaths.medicines(userId), medicines);
    logger.info('Medicines added', { userId, count: added.length });
    return added;
  }

  /**
   * True if a medicine with `medicineId` existed and was removed.
   */
  async deleteMedicine(userId: string, medicineId: string): Promise<boolean> {
    const medicines = await this.listMedicines(userId);
    const remaining = medicines.filter(medicine => medicine.id !== medicineId);
    if (remaining.length === medicines.length) return false;

    await this.docs.set(userPaths.medicines(userId), remaining);
    logger.info('Medicine deleted', { userId, medicineId });
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Push tokens and caregivers
  // ─────────────────────────────────────────────────────────────────────────────

  async getPushToken(userId: string): Promise<string | undefined> {
    const raw = await this.docs.get(userPaths.pushToken(userId));
    return typeof raw === 'string' && raw.length > 0 ? raw : undefined;
  }

  async setPushToken(userId: string, token: string): Promise<void> {
    await this.docs.set(userPaths.pushToken(userId), token);
    logger.info('Push token stored', { userId });
  }

  /**
   * Ids of the family accounts notified about this user's responses.
   */
  async getCaregivers(userId: string): Promise<string[]> {
    const raw = await this.docs.get(userPaths.caregivers(userId));
    if (raw === undefined) return [];

    const parsed = CaregiversSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Caregiver list unreadable, ignoring', { userId });
      return [];
    }
    return parsed.data;
  }

  /**
   * Replace the caregiver list. Duplicates are dropped, first occurrence wins.
   */
  async setCaregivers(userId: string, caregiverIds: readonly string[]): Promise<string[]> {
    const caregivers = Array.from(new Set(caregiverIds));
    await this.docs.set(userPaths.caregivers(userId), caregivers);
    logger.info('Caregivers updated', { userId, count: caregivers.length });
    return caregivers;
  }

  /**
   * Every user id with stored data.
   */
  async listUserIds(): Promise<string[]> {
    return this.docs.listChildren(USERS_ROOT);
  }
}

export function createProfileStore(docs: DocumentStore, newId?: IdFactory): ProfileStore {
  return new ProfileStore(docs, newId);
}
