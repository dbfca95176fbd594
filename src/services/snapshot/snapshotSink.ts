import type { Logger } from "pino";
import type { ValuationReport } from "../../domain/valuation";

export interface SnapshotSink {
  write(report: ValuationReport): Promise<void>;
}

/** Used when no remote store is configured */
export class DisabledSnapshotSink implements SnapshotSink {
  constructor(private readonly logger: Logger) {}

  async write(report: ValuationReport): Promise<void> {
    this.logger.info({ total: report.total }, "Snapshot sink not configured, skipping remote write");
  }
}
