import * as functions from 'firebase-functions';
import type {
    DomainServiceContainer,
    ServiceResolver,
} from '../services/domain/serviceContainer';

export const SERVICE_UNAVAILABLE_MESSAGE = 'Database not available';

export function ensureServicesOrReject(
    resolveServices: ServiceResolver,
    res: {
        status: (statusCode: number) => {
            json: (payload: { code: string; message: string }) => void;
        };
    },
): DomainServiceContainer | null {
    const resolution = resolveServices();
    if (resolution.available) {
        return resolution.services;
    }

    functions.logger.warn(`[datastore] Request rejected: ${resolution.reason}`);
    res.status(500).json({
        code: 'service_unavailable',
        message: SERVICE_UNAVAILABLE_MESSAGE,
    });
    return null;
}
