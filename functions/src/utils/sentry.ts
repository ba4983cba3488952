/**
 * Sentry Error Tracking Configuration
 *
 * Set the SENTRY_DSN environment variable to enable Sentry.
 * Without a DSN, Sentry stays disabled and errors are only logged.
 */

import type { Application } from 'express';
import * as Sentry from '@sentry/node';
import * as functions from 'firebase-functions';

let isInitialized = false;
let isEnabled = false;

/**
 * Initialize Sentry. Safe to call more than once.
 */
export function initSentry(): void {
    if (isInitialized) {
        return;
    }
    isInitialized = true;

    const dsn = process.env.SENTRY_DSN || '';
    if (!dsn) {
        functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
        return;
    }

    Sentry.init({
        dsn,
        environment: process.env.NODE_ENV || 'development',
        tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,

        // Don't send errors in test environment
        enabled: process.env.NODE_ENV !== 'test',

        // Request bodies carry patient identifiers
        beforeSend(event) {
            if (event.request?.data) {
                event.request.data = '[REDACTED]';
            }
            if (event.request?.query_string) {
                event.request.query_string = '[REDACTED]';
            }
            return event;
        },

        ignoreErrors: ['ECONNRESET', 'ETIMEDOUT'],
    });

    isEnabled = true;
    functions.logger.info('[sentry] Sentry initialized successfully');
}

/**
 * Setup Sentry error handling for Express.
 * Call this AFTER all routes but BEFORE the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
    if (!isEnabled) return;
    Sentry.setupExpressErrorHandler(app);
}

/**
 * Flush pending Sentry events before the process exits.
 */
export async function flushSentry(timeout = 2000): Promise<void> {
    if (!isEnabled) return;
    await Sentry.flush(timeout);
}
