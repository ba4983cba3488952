import type { Firestore } from 'firebase-admin/firestore';
import type { StoreInfoRepository } from './StoreInfoRepository';

export class FirestoreStoreInfoRepository implements StoreInfoRepository {
  constructor(private readonly db: Firestore) {}

  async listCollectionNames(): Promise<string[]> {
    const collections = await this.db.listCollections();
    return collections.map((collection) => collection.id);
  }
}
