/**
 * Medication Model
 */

export interface Medication {
  id: string;
  user_id: string;
  name: string;
  dosage?: string | null;
  /** Daily times as HH:MM */
  schedule_times: string[];
  inventory_count?: number | string | null;
  low_threshold?: number | string | null;
}
