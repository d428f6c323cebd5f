export { ProfileStore, createProfileStore } from './profile-store.js';
export {
  UserDetailsSchema,
  MedicineRecordSchema,
  type UserDetails,
  type MedicineRecord,
  type MedicineInput,
} from './types.js';
