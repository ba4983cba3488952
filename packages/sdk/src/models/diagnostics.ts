export interface RootResponse {
  message: string;
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
}

export interface DiagnosticsResponse {
  backend: string;
  database: string;
  database_url: 'Set' | 'Not Set';
  database_name: 'Set' | 'Not Set';
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}
