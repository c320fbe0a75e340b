import { Injectable } from '@nestjs/common';
import { TrackedNotification } from './tracked-notification.interface';

/**
 * In-flight emergency notifications keyed by receipt id.
 * Memory-resident: entries are lost on restart.
 */
@Injectable()
export class TrackedNotificationStore {
  private readonly entries = new Map<string, TrackedNotification>();

  add(notification: TrackedNotification): void {
    this.entries.set(notification.receiptId, { ...notification });
  }

  get(receiptId: string): TrackedNotification | undefined {
    return this.entries.get(receiptId);
  }

  /**
   * Returns true only for the caller that actually removed the entry.
   */
  remove(receiptId: string): boolean {
    return this.entries.delete(receiptId);
  }

  has(receiptId: string): boolean {
    return this.entries.has(receiptId);
  }

  /**
   * Copy of the current entries; inserts and removals made while iterating
   * it do not affect the copy.
   */
  snapshot(): TrackedNotification[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }
}
