/**
 * User Model
 */

export type UserRole = 'patient' | 'caregiver';

export interface User {
  id: string;
  name: string;
  email?: string | null;
  role: UserRole;
  /** Set for caregivers: the patient they monitor */
  patient_id?: string | null;
}
