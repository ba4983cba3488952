export interface StoreInfoRepository {
  listCollectionNames(): Promise<string[]>;
}
