import type { DoseEvent } from './dose';

export interface InventoryAlert {
  medication_id: string;
  name: string | null;
  inventory_count: number | string | null;
  low_threshold: number | string | null;
}

export interface CaregiverDashboardResponse {
  /** Last 30 days, oldest first */
  history: DoseEvent[];
  /** Missed doses from the last 7 days, newest first */
  missed: DoseEvent[];
  inventory_alerts: InventoryAlert[];
}
