import { randomUUID } from 'crypto';
import { Timestamp } from 'firebase-admin/firestore';
import type { DocumentData, Firestore } from 'firebase-admin/firestore';
import { getFirestore } from '../utils/firebase';
import { z } from 'zod';
import type { NewPresentation, Presentation, PresentationSummary } from '@shared/types';

export interface PresentationRepository {
    save(presentation: NewPresentation): Promise<Presentation>;
    get(id: string): Promise<Presentation | null>;
    listByOwner(ownerId: string, limit?: number): Promise<PresentationSummary[]>;
}

const storedSlideSchema = z.object({
    position: z.number().int().positive(),
    title: z.string(),
    content: z.string(),
    imageUrl: z.string().nullable(),
    videoUrl: z.string().nullable(),
});

const storedPresentationSchema = z.object({
    title: z.string(),
    ownerId: z.string().nullable(),
    hasVideo: z.boolean(),
    slides: z.array(storedSlideSchema),
    createdAt: z.instanceof(Timestamp),
});

function toPresentation(id: string, data: DocumentData | undefined): Presentation | null {
    const parsed = storedPresentationSchema.safeParse(data);
    if (!parsed.success) {
        console.warn(`[presentations] Skipping malformed document ${id}:`, parsed.error.issues[0]?.message);
        return null;
    }
    return { id, ...parsed.data, createdAt: parsed.data.createdAt.toDate() };
}

export class FirestorePresentationRepository implements PresentationRepository {
    constructor(private readonly db: Firestore = getFirestore(), private readonly collection = 'presentations') { }

    async save(presentation: NewPresentation): Promise<Presentation> {
        const id = randomUUID();
        const createdAt = new Date();

        await this.db.collection(this.collection).doc(id).set({
            title: presentation.title,
            ownerId: presentation.ownerId,
            hasVideo: presentation.hasVideo,
            slides: presentation.slides,
            createdAt: Timestamp.fromDate(createdAt)
        });

        return { ...presentation, id, createdAt };
    }

    async get(id: string): Promise<Presentation | null> {
        const snap = await this.db.collection(this.collection).doc(id).get();
        if (!snap.exists) return null;
        return toPresentation(snap.id, snap.data());
    }

    async listByOwner(ownerId: string, limit = 50): Promise<PresentationSummary[]> {
        const snapshot = await this.db.collection(this.collection)
            .where('ownerId', '==', ownerId)
            .orderBy('createdAt', 'desc')
            .limit(limit)
            .get();

        const summaries: PresentationSummary[] = [];
        for (const doc of snapshot.docs) {
            const presentation = toPresentation(doc.id, doc.data());
            if (!presentation) continue;
            summaries.push({
                id: presentation.id,
                title: presentation.title,
                hasVideo: presentation.hasVideo,
                slideCount: presentation.slides.length,
                createdAt: presentation.createdAt,
            });
        }
        return summaries;
    }
}
