import { getApps, initializeApp, applicationDefault, cert, type Credential } from 'firebase-admin/app';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';

/**
 * Server-only initialization for Firebase Admin + Firestore.
 *
 * Credential precedence:
 *  1) FIREBASE_SERVICE_ACCOUNT_JSON (full JSON string)
 *  2) FIREBASE_SERVICE_ACCOUNT_BASE64 (base64 of JSON)
 *  3) Application Default Credentials (GCP / local with GOOGLE_APPLICATION_CREDENTIALS)
 */
function getCredential(env: NodeJS.ProcessEnv): Credential {
  const json = env.FIREBASE_SERVICE_ACCOUNT_JSON;
  if (json) return cert(JSON.parse(json));

  const b64 = env.FIREBASE_SERVICE_ACCOUNT_BASE64;
  if (b64) {
    const parsed = Buffer.from(b64, 'base64').toString('utf8');
    return cert(JSON.parse(parsed));
  }
  return applicationDefault();
}

export function getDb(env: NodeJS.ProcessEnv = process.env): Firestore {
  if (!getApps().length) {
    initializeApp({
      credential: getCredential(env),
      projectId: env.FIREBASE_PROJECT_ID,
    });
  }
  return getFirestore();
}
