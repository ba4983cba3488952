/**
 * Client SDK for the dose status API
 */

export * from './models';
export { createApiClient } from './api-client';
export type { ApiClient, ApiClientConfig } from './api-client';
