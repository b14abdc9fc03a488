import { FieldValue } from 'firebase-admin/firestore';
import type { Firestore } from 'firebase-admin/firestore';
import { getFirestore } from '../utils/firebase';
import { QuotaExceededError } from '@shared/errors';

/**
 * One counter per guest identifier.
 */
export interface UsageStore {
    getCount(id: string): Promise<number>;
    /** Returns the count after the increment. */
    increment(id: string): Promise<number>;
}

export class FirestoreUsageStore implements UsageStore {
    constructor(private readonly db: Firestore = getFirestore(), private readonly collection = 'guestUsage') { }

    async getCount(id: string): Promise<number> {
        const snap = await this.db.collection(this.collection).doc(id).get();
        const count = snap.data()?.count;
        return typeof count === 'number' ? count : 0;
    }

    async increment(id: string): Promise<number> {
        const ref = this.db.collection(this.collection).doc(id);

        return this.db.runTransaction(async (tx) => {
            const snap = await tx.get(ref);
            const current = snap.data()?.count;
            const next = (typeof current === 'number' ? current : 0) + 1;

            if (!snap.exists) {
                tx.set(ref, {
                    count: next,
                    createdAt: FieldValue.serverTimestamp(),
                    updatedAt: FieldValue.serverTimestamp()
                });
            } else {
                tx.update(ref, {
                    count: next,
                    updatedAt: FieldValue.serverTimestamp()
                });
            }
            return next;
        });
    }
}

/**
 * Enforces the guest generation quota.
 *
 * The check happens before generation and the increment after it succeeds, so two
 * simultaneous requests from one guest can both get through. Only the increment is atomic.
 */
export class UsageTracker {
    constructor(private readonly store: UsageStore, readonly limit: number) { }

    getUsage(id: string): Promise<number> {
        return this.store.getCount(id);
    }

    async assertWithinQuota(id: string): Promise<number> {
        const used = await this.store.getCount(id);
        if (used >= this.limit) {
            throw new QuotaExceededError(this.limit, used);
        }
        return used;
    }

    async recordGeneration(id: string): Promise<number> {
        const used = await this.store.increment(id);
        console.log(`[usage] ${id.substring(0, 14)}… at ${used}/${this.limit}`);
        return used;
    }
}
