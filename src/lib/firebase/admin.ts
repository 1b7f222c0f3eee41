import { getServerEnv, hasFirebaseCredentials } from "@/config/env";
import { AppError } from "@/lib/utils/errors";
import { cert, getApp, getApps, initializeApp } from "firebase-admin/app";
import type { App } from "firebase-admin/app";
import { getFirestore, type Firestore } from "firebase-admin/firestore";

let adminApp: App | null = null;
let firestoreInstance: Firestore | null = null;

export function getFirebaseAdmin(): App {
  if (adminApp) {
    return adminApp;
  }

  const existingApps = getApps();
  if (existingApps.length > 0) {
    adminApp = getApp();
    return adminApp;
  }

  const env = getServerEnv();
  if (!hasFirebaseCredentials(env)) {
    throw new AppError("Firebase credentials are not configured", {
      code: "firebase_not_configured",
      status: 503
    });
  }

  adminApp = initializeApp({
    credential: cert({
      projectId: env.FIREBASE_PROJECT_ID,
      clientEmail: env.FIREBASE_CLIENT_EMAIL,
      privateKey: env.FIREBASE_PRIVATE_KEY
    })
  });

  return adminApp;
}

export function getAdminFirestore(): Firestore {
  if (!firestoreInstance) {
    firestoreInstance = getFirestore(getFirebaseAdmin());
  }

  return firestoreInstance;
}

export const adminDb = () => getAdminFirestore();
