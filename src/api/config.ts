import * as admin from 'firebase-admin';
import { PolicyRegistry, policyRegistrySchema } from './policy';

class EnrichConfigInstance {
  private _db: admin.firestore.Firestore | null = null;
  private _policies: PolicyRegistry = {};

  get db(): admin.firestore.Firestore {
    if (!this._db) {
      throw new Error('EnrichConfig.db is not set. Call EnrichConfig.setDb() first.');
    }
    return this._db;
  }

  get policies(): PolicyRegistry {
    return this._policies;
  }

  setDb(db: admin.firestore.Firestore): void {
    this._db = db;
  }

  setPolicies(policies: PolicyRegistry): void {
    this._policies = policyRegistrySchema.parse(policies);
  }

  initialize(options: {
    db?: admin.firestore.Firestore;
    policies?: PolicyRegistry;
  }): void {
    if (options.db) {
      this.setDb(options.db);
    }
    if (options.policies) {
      this.setPolicies(options.policies);
    }
  }

  /**
   * Resets the configuration. Useful for testing.
   */
  reset(): void {
    this._db = null;
    this._policies = {};
  }
}

export const EnrichConfig = new EnrichConfigInstance();
