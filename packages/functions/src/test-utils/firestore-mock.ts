import { vi } from 'vitest';
import type {
  Firestore,
  CollectionReference,
  DocumentReference,
} from 'firebase-admin/firestore';

export interface MockDocumentSnapshot {
  id: string;
  exists: boolean;
  data: () => Record<string, unknown> | undefined;
}

export interface MockQueryDocumentSnapshot {
  id: string;
  data: () => Record<string, unknown>;
}

export interface MockQuerySnapshot {
  empty: boolean;
  docs: MockQueryDocumentSnapshot[];
}

export interface MockFirestoreQuery {
  where: ReturnType<typeof vi.fn>;
  orderBy: ReturnType<typeof vi.fn>;
  limit: ReturnType<typeof vi.fn>;
  get: ReturnType<typeof vi.fn>;
}

export function createFirestoreQueryChain(): MockFirestoreQuery {
  const chain: MockFirestoreQuery = {
    get: vi.fn(),
    where: vi.fn(),
    orderBy: vi.fn(),
    limit: vi.fn(),
  };

  chain.where.mockReturnValue(chain);
  chain.orderBy.mockReturnValue(chain);
  chain.limit.mockReturnValue(chain);

  return chain;
}

export function createMockDoc(
  id: string,
  data: Record<string, unknown> | null
): MockDocumentSnapshot {
  return {
    id,
    exists: data !== null,
    data: () => data ?? undefined,
  };
}

export function createMockQuerySnapshot(
  docs: Array<{ id: string; data: Record<string, unknown> }>
): MockQuerySnapshot {
  return {
    empty: docs.length === 0,
    docs: docs.map((doc) => ({
      id: doc.id,
      data: () => doc.data,
    })),
  };
}

export interface MockWriteBatch {
  set: ReturnType<typeof vi.fn>;
  commit: ReturnType<typeof vi.fn>;
}

export interface FirestoreMocks {
  mockDb: Partial<Firestore>;
  mockCollection: Partial<CollectionReference>;
  mockDocRef: Partial<DocumentReference>;
  mockBatch: MockWriteBatch;
}

export function createFirestoreMocks(): FirestoreMocks {
  const queryChain = createFirestoreQueryChain();

  const mockDocRef: Partial<DocumentReference> = {
    id: 'test-id',
    get: vi.fn(),
    set: vi.fn(),
    update: vi.fn() as unknown as DocumentReference['update'],
    delete: vi.fn(),
  };

  const mockCollection: Partial<CollectionReference> = {
    doc: vi.fn().mockReturnValue(mockDocRef),
    add: vi.fn().mockResolvedValue({ id: 'generated-id' }),
    where: queryChain.where as unknown as CollectionReference['where'],
    orderBy: queryChain.orderBy as unknown as CollectionReference['orderBy'],
    limit: queryChain.limit as unknown as CollectionReference['limit'],
    get: queryChain.get as unknown as CollectionReference['get'],
  };

  const mockBatch: MockWriteBatch = {
    set: vi.fn(),
    commit: vi.fn().mockResolvedValue(undefined),
  };

  const mockDb: Partial<Firestore> = {
    collection: vi.fn().mockReturnValue(mockCollection),
    batch: vi.fn().mockReturnValue(mockBatch),
  };

  return { mockDb, mockCollection, mockDocRef, mockBatch };
}

export function setupFirebaseMock(
  mocks: FirestoreMocks
): void {
  vi.doMock('../firebase.js', () => ({
    getFirestoreDb: vi.fn().mockReturnValue(mocks.mockDb),
    getCollectionName: vi.fn((name: string) => `test_${name}`),
  }));
}
