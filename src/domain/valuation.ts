import type { InventoryTarget } from "./inventory";

export type PriceSource = "cache" | "market";

export type ResolutionFailureReason = "RateLimited" | "NoPriceAvailable";

export type PriceResolution =
  | { ok: true; price: number; source: PriceSource }
  | { ok: false; reason: ResolutionFailureReason; message: string };

export interface ValuationLine {
  readonly classificationKey: string;
  readonly displayName: string;
  readonly count: number;
  readonly unitPrice: number;
  readonly subtotal: number;
  readonly priceSource: PriceSource;
}

export interface ValuationFailure {
  readonly classificationKey: string;
  readonly displayName: string;
  readonly count: number;
  readonly reason: ResolutionFailureReason;
  readonly message: string;
}

export interface ValuationReport extends Readonly<InventoryTarget> {
  readonly currency: number;
  readonly generatedAt: string;
  /** Sum of all group counts, priced or not */
  readonly itemCount: number;
  readonly lines: readonly ValuationLine[];
  readonly failures: readonly ValuationFailure[];
  /** Lower bound whenever failures is non-empty */
  readonly total: number;
}
