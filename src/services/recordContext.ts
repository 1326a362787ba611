import { Student } from "../domain/student";
import { RecordStore } from "../stores/recordStore";

/**
 * Record Context
 *
 * Holds the one in-memory record for the running process together with the
 * store it came from. Mutations happen on `student` directly; callers mark the
 * context dirty and call checkpoint() to persist.
 *
 * The in-memory graph is only replaced after a load has fully succeeded, so a
 * malformed store leaves the current record as it was.
 */
export class RecordContext {
  readonly store: RecordStore;
  private current: Student | null = null;
  private dirty = false;

  constructor(store: RecordStore) {
    this.store = store;
  }

  hasRecord(): boolean {
    return this.current !== null;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  get student(): Student {
    if (!this.current) {
      throw new Error("No record is open");
    }
    return this.current;
  }

  /**
   * Load the stored record. Returns false when there is none yet.
   */
  open(): boolean {
    const loaded = this.store.load();
    if (!loaded) {
      return false;
    }
    this.current = loaded;
    this.dirty = false;
    return true;
  }

  /**
   * Start from a new record (fresh or sample data); it is saved on the next checkpoint
   */
  start(student: Student): void {
    this.current = student;
    this.dirty = true;
  }

  markDirty(): void {
    this.dirty = true;
  }

  /**
   * Persist the record if it changed since the last save.
   * Returns whether anything was written.
   */
  checkpoint(): boolean {
    if (!this.current || !this.dirty) {
      return false;
    }
    this.store.save(this.current);
    this.dirty = false;
    return true;
  }

  /**
   * Drop the stored record and the in-memory one
   */
  reset(): void {
    this.store.reset();
    this.current = null;
    this.dirty = false;
  }
}
