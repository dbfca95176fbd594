export interface InventoryTarget {
  accountId: string;
  appId: number;
  contextId: number;
}

/** One owned asset as reported by the inventory service. */
export interface InventoryRecord {
  readonly assetId: string;
  readonly classId: string;
  readonly instanceId: string;
  readonly displayName: string;
  /** market_hash_name; identical tradable copies share it */
  readonly classificationKey: string;
  readonly quantity: number;
}

export interface ItemGroup {
  readonly classificationKey: string;
  readonly displayName: string;
  readonly count: number;
}

export interface InventoryPageRequest extends InventoryTarget {
  cursor: string | null;
  pageSize: number;
}

export interface InventoryPage {
  records: InventoryRecord[];
  /** Absent on the last page */
  nextCursor?: string;
}

export interface InventoryPageSource {
  fetchPage(request: InventoryPageRequest): Promise<InventoryPage>;
}
