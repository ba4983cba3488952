import type { Firestore } from 'firebase-admin/firestore';
import type { DataStoreConnection } from '../../database/dataStore';
import { CaregiverDashboardDomainService } from './caregiverDashboard/CaregiverDashboardDomainService';
import { DoseStatusDomainService } from './doseEvents/DoseStatusDomainService';
import { FirestoreDoseEventRepository } from '../repositories/doseEvents/FirestoreDoseEventRepository';
import type { DoseEventRepository } from '../repositories/doseEvents/DoseEventRepository';
import { FirestoreMedicationRepository } from '../repositories/medications/FirestoreMedicationRepository';
import type { MedicationRepository } from '../repositories/medications/MedicationRepository';
import { FirestoreStoreInfoRepository } from '../repositories/storeInfo/FirestoreStoreInfoRepository';
import type { StoreInfoRepository } from '../repositories/storeInfo/StoreInfoRepository';

export type DomainServiceContainer = {
  doseEventRepository: DoseEventRepository;
  medicationRepository: MedicationRepository;
  storeInfoRepository: StoreInfoRepository;
  doseStatusService: DoseStatusDomainService;
  caregiverDashboardService: CaregiverDashboardDomainService;
};

export type DomainServiceOverrides = {
  doseEventRepository?: DoseEventRepository;
  medicationRepository?: MedicationRepository;
  storeInfoRepository?: StoreInfoRepository;
  now?: () => Date;
};

export type CreateDomainServiceContainerOptions = DomainServiceOverrides & {
  db: Firestore;
};

export function createDomainServiceContainer(
  options: CreateDomainServiceContainerOptions,
): DomainServiceContainer {
  const doseEventRepository =
    options.doseEventRepository ?? new FirestoreDoseEventRepository(options.db);
  const medicationRepository =
    options.medicationRepository ?? new FirestoreMedicationRepository(options.db);
  const storeInfoRepository =
    options.storeInfoRepository ?? new FirestoreStoreInfoRepository(options.db);
  const now = options.now ?? (() => new Date());

  return {
    doseEventRepository,
    medicationRepository,
    storeInfoRepository,
    doseStatusService: new DoseStatusDomainService(doseEventRepository, now),
    caregiverDashboardService: new CaregiverDashboardDomainService(
      doseEventRepository,
      medicationRepository,
      now,
    ),
  };
}

export type ServiceResolution =
  | { available: true; databaseId: string; services: DomainServiceContainer }
  | { available: false; reason: string };

export type ServiceResolver = () => ServiceResolution;

/**
 * Binds the service container to a store connection. The container is built once,
 * on first use, and only for a connected store.
 */
export function createServiceResolver(
  connection: DataStoreConnection,
  overrides: DomainServiceOverrides = {},
): ServiceResolver {
  if (connection.status === 'unavailable') {
    const resolution: ServiceResolution = { available: false, reason: connection.reason };
    return () => resolution;
  }

  let resolution: ServiceResolution | null = null;
  return () => {
    if (!resolution) {
      resolution = {
        available: true,
        databaseId: connection.databaseId,
        services: createDomainServiceContainer({ db: connection.db, ...overrides }),
      };
    }
    return resolution;
  };
}
