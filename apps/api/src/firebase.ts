import fs from 'node:fs';
import admin from 'firebase-admin';
import { getEnv } from './env.js';

let app: admin.app.App | undefined;

function initFirebaseApp(): admin.app.App {
  if (app) return app;

  const env = getEnv();

  // Explicit service account JSON wins (CI, containers), then a key file, then ADC.
  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    const serviceAccount: admin.ServiceAccount = JSON.parse(env.FIREBASE_SERVICE_ACCOUNT_JSON);
    app = admin.initializeApp({ credential: admin.credential.cert(serviceAccount) });
  } else if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    const serviceAccount: admin.ServiceAccount = JSON.parse(
      fs.readFileSync(env.FIREBASE_SERVICE_ACCOUNT_PATH, { encoding: 'utf8' })
    );
    app = admin.initializeApp({ credential: admin.credential.cert(serviceAccount) });
  } else {
    app = admin.initializeApp({
      credential: admin.credential.applicationDefault(),
      projectId: env.FIREBASE_PROJECT_ID
    });
  }

  app.firestore().settings({ ignoreUndefinedProperties: true });
  return app;
}

export function getFirestore(): admin.firestore.Firestore {
  return initFirebaseApp().firestore();
}

export async function closeFirebase(): Promise<void> {
  if (!app) return;
  const current = app;
  app = undefined;
  await current.delete();
}
