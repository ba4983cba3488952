import { onRequest } from 'firebase-functions/v2/https';
import { buildApiRuntime } from './bootstrap';

const { app } = buildApiRuntime();

// Export the API (v2)
export const api = onRequest(
  {
    timeoutSeconds: 60,
    memory: '512MiB',
    maxInstances: 100,
  },
  app
);
