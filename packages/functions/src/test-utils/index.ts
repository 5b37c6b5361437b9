export {
  type MockDocumentSnapshot,
  type MockQueryDocumentSnapshot,
  type MockQuerySnapshot,
  type FirestoreMocks,
  type MockWriteBatch,
  createMockDoc,
  createMockQuerySnapshot,
  createFirestoreMocks,
  setupFirebaseMock,
} from './firestore-mock.js';
