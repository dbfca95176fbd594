import type { InventoryRecord, ItemGroup } from "../../domain/inventory";

/**
 * Collapse inventory records into one group per classification key, in
 * first-seen order, keeping the first display name seen for each key.
 */
export function aggregateItems(records: readonly InventoryRecord[]): ItemGroup[] {
  const groups = new Map<string, { classificationKey: string; displayName: string; count: number }>();

  for (const record of records) {
    const existing = groups.get(record.classificationKey);
    if (existing) {
      existing.count += record.quantity;
    } else {
      groups.set(record.classificationKey, {
        classificationKey: record.classificationKey,
        displayName: record.displayName,
        count: record.quantity,
      });
    }
  }

  return [...groups.values()];
}
