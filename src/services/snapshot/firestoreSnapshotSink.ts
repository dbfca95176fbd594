import { cert, getApps, initializeApp } from "firebase-admin/app";
import { FieldValue, getFirestore, type DocumentData, type Firestore } from "firebase-admin/firestore";
import type { Logger } from "pino";
import type { ValuationReport } from "../../domain/valuation";
import { SnapshotSinkError, describeError } from "../../domain/errors";
import type { SnapshotSink } from "./snapshotSink";

/** The slice of Firestore the sink writes through */
export interface SnapshotStore {
  collection(path: string): {
    doc(id: string): {
      collection(path: string): { add(data: DocumentData): Promise<{ id: string }> };
    };
  };
}

/**
 * Appends one document per run under {collection}/{accountId}/entries.
 */
export class FirestoreSnapshotSink implements SnapshotSink {
  constructor(
    private readonly db: SnapshotStore,
    private readonly collection: string,
    private readonly logger: Logger,
  ) {}

  async write(report: ValuationReport): Promise<void> {
    const entries = this.db.collection(this.collection).doc(report.accountId).collection("entries");

    try {
      const ref = await entries.add({
        value: report.total,
        currency: report.currency,
        appId: report.appId,
        contextId: report.contextId,
        itemCount: report.itemCount,
        failureCount: report.failures.length,
        lines: report.lines.map((line) => ({ ...line })),
        failures: report.failures.map((failure) => ({ ...failure })),
        generatedAt: report.generatedAt,
        timestamp: FieldValue.serverTimestamp(),
      });
      this.logger.info({ documentId: ref.id }, "Saved valuation snapshot");
    } catch (error) {
      throw new SnapshotSinkError(`Failed to write snapshot: ${describeError(error)}`, { cause: error });
    }
  }
}

export function openFirestore(credentialsPath: string): Firestore {
  const app = getApps()[0] ?? initializeApp({ credential: cert(credentialsPath) });
  return getFirestore(app);
}
