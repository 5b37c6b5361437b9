import { initializeApp, getApps } from 'firebase-admin/app';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';

let db: Firestore | null = null;

export function initializeFirebase(): void {
  if (getApps().length === 0) {
    initializeApp();
  }
}

export function getFirestoreDb(): Firestore {
  if (db === null) {
    initializeFirebase();
    db = getFirestore();
  }
  return db;
}

/**
 * Collection names are prefixed per environment so dev and prod functions
 * can share one project.
 */
export function getCollectionName(name: string): string {
  const prefix = process.env['FIRESTORE_COLLECTION_PREFIX'] ?? '';
  return `${prefix}${name}`;
}
