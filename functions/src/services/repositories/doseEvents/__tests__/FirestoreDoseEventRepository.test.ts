import { Timestamp } from 'firebase-admin/firestore';
import type { Firestore } from 'firebase-admin/firestore';
import { instantFromDate, parseIsoDateTimeToUtc } from '../../../../utils/isoDateTime';
import { FirestoreDoseEventRepository } from '../FirestoreDoseEventRepository';

type RecordMap = Record<string, unknown>;
type StateMap = Record<string, RecordMap>;
type WhereClause = { field: string; operator: string; value: unknown };
type QueryState = {
  wheres: WhereClause[];
  orderBy: { field: string; direction: 'asc' | 'desc' } | null;
  limit: number | null;
};

// Orders timestamps by seconds, then nanoseconds, as Firestore does.
function compareValues(left: unknown, right: unknown): number | null {
  if (left instanceof Timestamp && right instanceof Timestamp) {
    return left.seconds - right.seconds || left.nanoseconds - right.nanoseconds;
  }
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  return null;
}

function matchesWhere(fieldValue: unknown, operator: string, targetValue: unknown): boolean {
  if (operator === '==') {
    if (fieldValue instanceof Timestamp && targetValue instanceof Timestamp) {
      return fieldValue.isEqual(targetValue);
    }
    return fieldValue === targetValue;
  }

  const order = compareValues(fieldValue, targetValue);
  if (order === null) return false;
  if (operator === '>=') return order >= 0;
  if (operator === '<') return order < 0;
  throw new Error(`Unsupported operator in test harness: ${operator}`);
}

function buildFirestoreMock(initialState: StateMap = {}) {
  const state: StateMap = { ...initialState };
  const collectionNames: string[] = [];

  const makeDocRef = (id: string) => ({ id, path: `doseevent/${id}` });

  const runQuery = (query: QueryState) => {
    let entries = Object.entries(state).filter(([, doc]) =>
      query.wheres.every((clause) => matchesWhere(doc[clause.field], clause.operator, clause.value)),
    );

    if (query.orderBy) {
      const { field, direction } = query.orderBy;
      entries = [...entries].sort(([, a], [, b]) => {
        const order = compareValues(a[field], b[field]) ?? 0;
        return direction === 'asc' ? order : -order;
      });
    }

    if (query.limit !== null) {
      entries = entries.slice(0, query.limit);
    }

    const docs = entries.map(([id, doc]) => ({
      id,
      data: () => doc,
      ref: makeDocRef(id),
    }));
    return { docs, empty: docs.length === 0, size: docs.length };
  };

  const buildQuery = (query: QueryState): unknown => ({
    __query: query,
    where: jest.fn((field: string, operator: string, value: unknown) =>
      buildQuery({ ...query, wheres: [...query.wheres, { field, operator, value }] }),
    ),
    orderBy: jest.fn((field: string, direction: 'asc' | 'desc') =>
      buildQuery({ ...query, orderBy: { field, direction } }),
    ),
    limit: jest.fn((limit: number) => buildQuery({ ...query, limit })),
    get: jest.fn(async () => runQuery(query)),
  });

  const transaction = {
    get: jest.fn(async (query: { get: () => Promise<unknown> }) => query.get()),
    update: jest.fn((ref: { id: string }, data: RecordMap) => {
      state[ref.id] = { ...state[ref.id], ...data };
    }),
  };

  const db = {
    collection: jest.fn((name: string) => {
      collectionNames.push(name);
      return buildQuery({ wheres: [], orderBy: null, limit: null });
    }),
    runTransaction: jest.fn(async (fn: (tx: typeof transaction) => Promise<unknown>) =>
      fn(transaction),
    ),
  };

  return {
    db: db as unknown as Firestore,
    state,
    transaction,
    collectionNames,
  };
}

const at = (iso: string) => Timestamp.fromDate(new Date(iso));

function seedState(): StateMap {
  return {
    'dose-1': {
      user_id: 'patient-1',
      medication_id: 'med-1',
      scheduled_time: at('2024-05-10T09:00:00.000Z'),
      status: 'scheduled',
    },
    'dose-2': {
      user_id: 'patient-1',
      medication_id: 'med-1',
      scheduled_time: at('2024-05-09T21:00:00.000Z'),
      taken_time: at('2024-05-09T21:05:00.000Z'),
      status: 'taken',
    },
    'dose-3': {
      user_id: 'patient-1',
      medication_id: 'med-2',
      scheduled_time: at('2024-05-08T09:00:00.000Z'),
      status: 'missed',
    },
    'dose-4': {
      user_id: 'patient-2',
      medication_id: 'med-9',
      scheduled_time: at('2024-05-10T09:00:00.000Z'),
      status: 'scheduled',
    },
  };
}

describe('FirestoreDoseEventRepository', () => {
  it('reads from the doseevent collection and maps documents', async () => {
    const harness = buildFirestoreMock(seedState());
    const repository = new FirestoreDoseEventRepository(harness.db);

    const events = await repository.listByUser('patient-1', {
      scheduledFrom: new Date('2024-05-09T00:00:00.000Z'),
      scheduledBefore: new Date('2024-05-10T00:00:00.000Z'),
    });

    expect(harness.collectionNames).toEqual(['doseevent']);
    expect(events).toEqual([
      {
        id: 'dose-2',
        userId: 'patient-1',
        medicationId: 'med-1',
        scheduledTime: instantFromDate(new Date('2024-05-09T21:00:00.000Z')),
        takenTime: instantFromDate(new Date('2024-05-09T21:05:00.000Z')),
        status: 'taken',
      },
    ]);
  });

  it('treats the upper bound as exclusive', async () => {
    const harness = buildFirestoreMock(seedState());
    const repository = new FirestoreDoseEventRepository(harness.db);

    const events = await repository.listByUser('patient-1', {
      scheduledFrom: new Date('2024-05-08T09:00:00.000Z'),
      scheduledBefore: new Date('2024-05-10T09:00:00.000Z'),
    });

    expect(events.map((event) => event.id).sort()).toEqual(['dose-2', 'dose-3']);
  });

  it('filters by status and orders by scheduled time', async () => {
    const harness = buildFirestoreMock(seedState());
    const repository = new FirestoreDoseEventRepository(harness.db);

    const ascending = await repository.listByUser('patient-1', { sortDirection: 'asc' });
    const descending = await repository.listByUser('patient-1', { sortDirection: 'desc' });
    const missed = await repository.listByUser('patient-1', { status: 'missed' });

    expect(ascending.map((event) => event.id)).toEqual(['dose-3', 'dose-2', 'dose-1']);
    expect(descending.map((event) => event.id)).toEqual(['dose-1', 'dose-2', 'dose-3']);
    expect(missed.map((event) => event.id)).toEqual(['dose-3']);
  });

  it('maps missing fields to null', async () => {
    const harness = buildFirestoreMock({ 'dose-x': { user_id: 'patient-1' } });
    const repository = new FirestoreDoseEventRepository(harness.db);

    const events = await repository.listByUser('patient-1');

    expect(events).toEqual([
      {
        id: 'dose-x',
        userId: 'patient-1',
        medicationId: null,
        scheduledTime: null,
        takenTime: null,
        status: null,
      },
    ]);
  });

  it('marks the matching dose taken inside a transaction', async () => {
    const harness = buildFirestoreMock(seedState());
    const repository = new FirestoreDoseEventRepository(harness.db);
    const takenAt = new Date('2024-05-10T09:12:00.000Z');

    const result = await repository.markTakenBySchedule(
      {
        userId: 'patient-1',
        medicationId: 'med-1',
        scheduledTime: instantFromDate(new Date('2024-05-10T09:00:00.000Z')),
      },
      takenAt,
    );

    expect(result).toEqual({ matched: 1, doseEventId: 'dose-1', previousStatus: 'scheduled' });
    expect(harness.transaction.update).toHaveBeenCalledTimes(1);
    expect(harness.state['dose-1'].status).toBe('taken');
    expect(harness.state['dose-1'].taken_time).toEqual(Timestamp.fromDate(takenAt));
    expect(harness.state['dose-4'].status).toBe('scheduled');
  });

  it('resets taken time when confirming an already taken dose', async () => {
    const harness = buildFirestoreMock(seedState());
    const repository = new FirestoreDoseEventRepository(harness.db);
    const takenAt = new Date('2024-05-10T10:00:00.000Z');

    const result = await repository.markTakenBySchedule(
      {
        userId: 'patient-1',
        medicationId: 'med-1',
        scheduledTime: instantFromDate(new Date('2024-05-09T21:00:00.000Z')),
      },
      takenAt,
    );

    expect(result).toEqual({ matched: 1, doseEventId: 'dose-2', previousStatus: 'taken' });
    expect(harness.state['dose-2'].taken_time).toEqual(Timestamp.fromDate(takenAt));
  });

  it('writes nothing when no dose matches', async () => {
    const harness = buildFirestoreMock(seedState());
    const repository = new FirestoreDoseEventRepository(harness.db);

    const result = await repository.markTakenBySchedule(
      {
        userId: 'patient-1',
        medicationId: 'med-2',
        scheduledTime: instantFromDate(new Date('2024-05-10T09:00:00.000Z')),
      },
      new Date('2024-05-10T09:12:00.000Z'),
    );

    expect(result).toEqual({ matched: 0 });
    expect(harness.transaction.update).not.toHaveBeenCalled();
    expect(harness.state).toEqual(seedState());
  });

  describe('microsecond scheduled times', () => {
    // 2024-05-10T09:00:00.123456Z
    const stored = new Timestamp(1715331600, 123456000);

    function microState(): StateMap {
      return {
        'dose-micro': {
          user_id: 'p1',
          medication_id: 'm1',
          scheduled_time: stored,
          status: 'scheduled',
        },
      };
    }

    it('reads the stored value without losing microseconds', async () => {
      const harness = buildFirestoreMock(microState());
      const repository = new FirestoreDoseEventRepository(harness.db);

      const [event] = await repository.listByUser('p1');

      expect(event.scheduledTime).toEqual({ seconds: 1715331600, nanoseconds: 123456000 });
    });

    it('confirms with the exact ISO string', async () => {
      const harness = buildFirestoreMock(microState());
      const repository = new FirestoreDoseEventRepository(harness.db);
      const scheduledTime = parseIsoDateTimeToUtc('2024-05-10T09:00:00.123456Z');
      if (!scheduledTime) throw new Error('expected a parsed instant');

      const result = await repository.markTakenBySchedule(
        { userId: 'p1', medicationId: 'm1', scheduledTime },
        new Date('2024-05-10T09:05:00.000Z'),
      );

      expect(result).toEqual({ matched: 1, doseEventId: 'dose-micro', previousStatus: 'scheduled' });
      expect(harness.state['dose-micro'].status).toBe('taken');
    });

    it('does not match the millisecond-truncated instant', async () => {
      const harness = buildFirestoreMock(microState());
      const repository = new FirestoreDoseEventRepository(harness.db);
      const scheduledTime = parseIsoDateTimeToUtc('2024-05-10T09:00:00.123Z');
      if (!scheduledTime) throw new Error('expected a parsed instant');

      const result = await repository.markTakenBySchedule(
        { userId: 'p1', medicationId: 'm1', scheduledTime },
        new Date('2024-05-10T09:05:00.000Z'),
      );

      expect(result).toEqual({ matched: 0 });
      expect(harness.state['dose-micro'].status).toBe('scheduled');
    });
  });
});
