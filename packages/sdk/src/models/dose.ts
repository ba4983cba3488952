/**
 * Dose Event and Today Status Models
 */

export type DoseStatus = 'scheduled' | 'taken' | 'missed' | 'skipped';

export interface DoseEvent {
  id: string;
  medication_id: string | null;
  /** ISO-8601 UTC */
  scheduled_time: string | null;
  taken_time: string | null;
  /** As stored; may fall outside DoseStatus */
  status: DoseStatus | string | null;
}

export interface TodayDoseItem {
  dose_event_id: string;
  medication_id: string | null;
  scheduled_time: string | null;
  status: DoseStatus | string;
}

export interface TodayStatusResponse {
  user_id: string;
  /** UTC calendar date, YYYY-MM-DD */
  date: string;
  total_doses: number;
  taken: number;
  missed: number;
  upcoming: number;
  items: TodayDoseItem[];
}

export interface ConfirmDoseRequest {
  user_id: string;
  medication_id: string;
  /** ISO-8601; read as UTC when it carries no offset */
  scheduled_time_iso: string;
}

export interface ConfirmDoseResponse {
  status: 'ok';
}
