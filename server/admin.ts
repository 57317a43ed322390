import admin from "firebase-admin";
import type { ServiceAccount } from "firebase-admin/app";
import { z } from "zod";
import { env } from "./config/env";
import logger from "./logger";

/**
 * Detect obviously invalid placeholder values that aren't real credentials.
 * A valid service-account JSON is typically 2000+ chars and starts with '{'.
 */
function isPlaceholder(value: string | undefined): boolean {
  if (!value) return true;
  const trimmed = value.trim();
  if (trimmed.length < 100) return true;
  if (/^x{4,}/.test(trimmed)) return true;
  return !trimmed.startsWith("{");
}

const serviceAccountJsonSchema = z.object({
  project_id: z.string(),
  client_email: z.string(),
  private_key: z.string(),
});

function resolveServiceAccount(): { account: ServiceAccount; source: string } | null {
  if (env.FIREBASE_ADMIN_KEY && !isPlaceholder(env.FIREBASE_ADMIN_KEY)) {
    try {
      const parsed = serviceAccountJsonSchema.safeParse(JSON.parse(env.FIREBASE_ADMIN_KEY));
      if (parsed.success) {
        return {
          account: {
            projectId: parsed.data.project_id,
            clientEmail: parsed.data.client_email,
            privateKey: parsed.data.private_key,
          },
          source: "FIREBASE_ADMIN_KEY (JSON)",
        };
      }
      logger.warn("FIREBASE_ADMIN_KEY is missing service-account fields, skipping");
    } catch (error) {
      logger.warn("FIREBASE_ADMIN_KEY is set but contains invalid JSON, skipping", {
        length: env.FIREBASE_ADMIN_KEY.length,
        error,
      });
    }
  } else if (env.FIREBASE_ADMIN_KEY) {
    logger.warn("FIREBASE_ADMIN_KEY appears to be a placeholder (too short or not valid JSON)");
  }

  const projectId = env.FIREBASE_PROJECT_ID;
  const clientEmail = env.FIREBASE_CLIENT_EMAIL;
  const privateKey = env.FIREBASE_PRIVATE_KEY?.replace(/\\n/g, "\n");
  if (projectId && clientEmail && privateKey) {
    return {
      account: { projectId, clientEmail, privateKey },
      source: "individual env vars (PROJECT_ID + CLIENT_EMAIL + PRIVATE_KEY)",
    };
  }
  return null;
}

/**
 * Initialize the Firebase Admin SDK once. Returns false when no credentials
 * are available; socket connections then cannot be authenticated.
 */
export function initFirebaseAdmin(): boolean {
  if (admin.apps.length) return true;

  const resolved = resolveServiceAccount();
  try {
    if (resolved) {
      admin.initializeApp({
        credential: admin.credential.cert(resolved.account),
        projectId: resolved.account.projectId,
      });
      logger.info(`Firebase Admin SDK initialized via ${resolved.source}`);
    } else {
      // Application Default Credentials (GCP runtimes)
      admin.initializeApp({
        credential: admin.credential.applicationDefault(),
        projectId: env.FIREBASE_PROJECT_ID,
      });
      logger.info("Firebase Admin SDK initialized via Application Default Credentials");
    }
    return true;
  } catch (error) {
    logger.warn("Firebase Admin SDK could not initialize; socket authentication will fail", {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

export { admin };
