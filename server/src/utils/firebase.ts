import * as admin from 'firebase-admin';
import { getConfig } from '../config';

// Credentials come from GOOGLE_APPLICATION_CREDENTIALS or FIRESTORE_EMULATOR_HOST
const ensureApp = () => {
    if (admin.apps.length > 0) return;
    const { firebaseProjectId } = getConfig();
    admin.initializeApp(firebaseProjectId ? { projectId: firebaseProjectId } : undefined);
};

export const getFirestore = (): admin.firestore.Firestore => {
    ensureApp();
    return admin.firestore();
};

export const getAuth = (): admin.auth.Auth => {
    ensureApp();
    return admin.auth();
};
