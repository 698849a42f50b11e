import type { PopupRecord, Rectangle } from "../types";

/**
 * Ordered collection of every live popup.
 *
 * Insertion order is kept, ids grow monotonically and are never reused.
 * Readers get copies, so a snapshot taken while scoring a placement stays
 * valid however many popups open or close afterwards. All methods run to
 * completion on the event loop, which makes each one its own critical
 * section.
 */
export class PopupRegistry {
  private live = new Map<number, PopupRecord>();
  private lastId = 0;

  /**
   * Add a record and assign its id. Registering a record that is already
   * live returns its existing id.
   */
  register(record: PopupRecord): number {
    const existing = this.live.get(record.id);
    if (existing === record) {
      console.warn(`[PopupRegistry] popup ${record.id} is already registered`);
      return record.id;
    }

    const id = ++this.lastId;
    record.id = id;
    this.live.set(id, record);
    return id;
  }

  /**
   * Remove a record. Returns false when it was not live.
   */
  unregister(record: PopupRecord): boolean {
    if (this.live.get(record.id) !== record) return false;
    this.live.delete(record.id);
    return true;
  }

  has(record: PopupRecord): boolean {
    return this.live.get(record.id) === record;
  }

  /** Live records in insertion order. */
  snapshot(): PopupRecord[] {
    return Array.from(this.live.values());
  }

  /** Current geometry of every placed popup other than `self`. */
  siblingRectangles(self?: PopupRecord): Rectangle[] {
    const rects: Rectangle[] = [];
    for (const record of this.live.values()) {
      if (record === self || record.rectangle === null) continue;
      rects.push({ ...record.rectangle });
    }
    return rects;
  }

  count(): number {
    return this.live.size;
  }
}
