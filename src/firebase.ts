/**
 * Knowledge Retrieval API - Firebase Admin Initialization
 *
 * Firebase is used only to verify caller ID tokens.
 */

import { initializeApp, getApps, cert, App } from "firebase-admin/app";
import { PROJECT_ID } from "./config";

let app: App | null = null;

/**
 * Lazily initialize the Firebase Admin SDK.
 * Returns the same app for subsequent calls.
 */
export function getFirebaseApp(): App {
  if (app) return app;

  const existing = getApps();
  if (existing.length > 0) {
    app = existing[0];
    return app;
  }

  // Local development uses a service account file; Cloud Run uses default credentials
  const serviceAccount = process.env.GOOGLE_APPLICATION_CREDENTIALS;
  app = serviceAccount
    ? initializeApp({ credential: cert(serviceAccount), projectId: PROJECT_ID })
    : initializeApp({ projectId: PROJECT_ID });
  return app;
}
