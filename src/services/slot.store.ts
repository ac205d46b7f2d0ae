import { Slot, SlotFilter } from '../types/slot';
import { DuplicateSlotError, NotFoundError, StoreError, ValidationError } from '../utils/errors';
import { readJsonFile, writeJsonFile } from '../utils/jsonFile';
import { slotCollectionSchema } from '../utils/validation';

export function compareSlots(a: Slot, b: Slot): number {
  return a.date.localeCompare(b.date) || a.time.localeCompare(b.time);
}

/**
 * Booking ledger backed by a single JSON document. Every call reads the
 * whole collection and every mutation rewrites it, sorted by date then time.
 */
export class SlotStore {
  constructor(private filePath: string) {}

  async load(): Promise<Slot[]> {
    const data = await readJsonFile(this.filePath);
    if (data === undefined) return [];

    const parsed = slotCollectionSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StoreError(
        `${this.filePath} contains an invalid slot record at [${issue.path.join('.')}]: ${issue.message}`,
        this.filePath
      );
    }

    return [...parsed.data].sort(compareSlots);
  }

  async save(slots: Slot[]): Promise<void> {
    await writeJsonFile(this.filePath, [...slots].sort(compareSlots));
  }

  async list(filter: SlotFilter = {}): Promise<Slot[]> {
    const slots = await this.load();
    return slots.filter(
      (slot) =>
        (!filter.date || slot.date === filter.date) && (!filter.status || slot.status === filter.status)
    );
  }

  async find(date: string, time: string): Promise<Slot | null> {
    const slots = await this.load();
    return slots.find((slot) => slot.date === date && slot.time === time) ?? null;
  }

  async insert<T extends Slot>(slot: T): Promise<T> {
    return this.mutate((slots) => {
      if (slots.some((existing) => existing.date === slot.date && existing.time === slot.time)) {
        throw new DuplicateSlotError(slot.date, slot.time);
      }
      return { slots: [...slots, slot], result: slot };
    });
  }

  async update<T extends Slot>(date: string, time: string, mutator: (slot: Slot) => T): Promise<T> {
    return this.mutate((slots) => {
      const index = slots.findIndex((slot) => slot.date === date && slot.time === time);
      if (index === -1) {
        throw new NotFoundError(`No slot found for ${date} at ${time}`);
      }

      const next = mutator(slots[index]);
      if (next.date !== date || next.time !== time) {
        throw new ValidationError('An update cannot move a slot to another date or time');
      }

      const updated = [...slots];
      updated[index] = next;
      return { slots: updated, result: next };
    });
  }

  async remove(date: string, time: string): Promise<Slot> {
    return this.mutate((slots) => {
      const removed = slots.find((slot) => slot.date === date && slot.time === time);
      if (!removed) {
        throw new NotFoundError(`No slot found for ${date} at ${time}`);
      }
      return { slots: slots.filter((slot) => slot !== removed), result: removed };
    });
  }

  private async mutate<T>(change: (slots: Slot[]) => { slots: Slot[]; result: T }): Promise<T> {
    const current = await this.load();
    const { slots, result } = change(current);
    await this.save(slots);
    return result;
  }
}
