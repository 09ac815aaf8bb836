import { CrmStore } from "../store/types";
import { formatTimestamp } from "../utils/text";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface CleanupOptions {
  now?: Date;
  inactiveDays?: number;
}

/**
 * Deletes customers without any order created in the last `inactiveDays`
 * days, together with their older orders. Returns how many customers went.
 */
export const cleanInactiveCustomers = (
  store: CrmStore,
  { now = new Date(), inactiveDays = 365 }: CleanupOptions = {}
): Promise<number> =>
  store.transaction(async (tx) => {
    const cutoff = new Date(now.getTime() - inactiveDays * MS_PER_DAY);
    const active = await tx.orders.customerIdsWithOrdersSince(cutoff);
    const inactive = await tx.customers.idsExcluding(active);

    if (inactive.length === 0) {
      return 0;
    }

    const removedOrders = await tx.orders.deleteByCustomerIds(inactive);
    const removed = await tx.customers.deleteByIds(inactive);
    console.log(`🗑️  Removed ${removed} inactive customers and ${removedOrders} of their orders`);
    return removed;
  });

export const cleanupLogLine = (count: number, at: Date): string =>
  `${formatTimestamp(at)} - Deleted ${count} inactive customers`;
