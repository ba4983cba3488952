import type { Firestore } from 'firebase-admin/firestore';
import { FirestoreMedicationRepository } from '../FirestoreMedicationRepository';

type RecordMap = Record<string, unknown>;

function buildFirestoreMock(docs: Record<string, RecordMap>) {
  const where = jest.fn((field: string, _operator: string, value: unknown) => ({
    get: jest.fn(async () => ({
      docs: Object.entries(docs)
        .filter(([, doc]) => doc[field] === value)
        .map(([id, doc]) => ({ id, data: () => doc })),
    })),
  }));
  const collection = jest.fn(() => ({ where }));

  return {
    db: { collection } as unknown as Firestore,
    collection,
    where,
  };
}

describe('FirestoreMedicationRepository', () => {
  it('lists medications for the user from the medication collection', async () => {
    const harness = buildFirestoreMock({
      'med-1': {
        user_id: 'patient-1',
        name: 'Metformin',
        dosage: '500mg',
        schedule_times: ['08:00', '20:00'],
        inventory_count: 12,
        low_threshold: 5,
      },
      'med-2': {
        user_id: 'patient-2',
        name: 'Lisinopril',
        inventory_count: 3,
        low_threshold: 5,
      },
    });
    const repository = new FirestoreMedicationRepository(harness.db);

    const medications = await repository.listAllByUser('patient-1');

    expect(harness.collection).toHaveBeenCalledWith('medication');
    expect(harness.where).toHaveBeenCalledWith('user_id', '==', 'patient-1');
    expect(medications).toEqual([
      {
        id: 'med-1',
        userId: 'patient-1',
        name: 'Metformin',
        dosage: '500mg',
        scheduleTimes: ['08:00', '20:00'],
        inventoryCount: 12,
        lowThreshold: 5,
      },
    ]);
  });

  it('keeps string counts as stored and drops malformed fields', async () => {
    const harness = buildFirestoreMock({
      'med-3': {
        user_id: 'patient-1',
        name: 'Atorvastatin',
        schedule_times: ['09:00', 7, null],
        inventory_count: '4',
        low_threshold: { value: 2 },
      },
    });
    const repository = new FirestoreMedicationRepository(harness.db);

    const medications = await repository.listAllByUser('patient-1');

    expect(medications).toEqual([
      {
        id: 'med-3',
        userId: 'patient-1',
        name: 'Atorvastatin',
        dosage: null,
        scheduleTimes: ['09:00'],
        inventoryCount: '4',
        lowThreshold: null,
      },
    ]);
  });
});
