export interface SlotPool<T> {
  readonly capacity: number;
  readonly slots: readonly T[];
  activeCount(): number;
  /** Activates the first free slot; null when every slot is in use. */
  acquire(): T | null;
  release(slot: T): void;
  forEachActive(visit: (slot: T) => void): void;
}

interface Slot {
  active: boolean;
}

/** Fixed-size pool of entity slots with per-slot active flags. */
export const createSlotPool = <T extends Slot>(
  capacity: number,
  factory: (index: number) => T,
): SlotPool<T> => {
  const slots = Array.from({ length: capacity }, (_, index) => factory(index));

  return {
    capacity,
    slots,
    activeCount: () => slots.reduce((count, slot) => count + (slot.active ? 1 : 0), 0),
    acquire: () => {
      const slot = slots.find((candidate) => !candidate.active);
      if (!slot) {
        return null;
      }
      slot.active = true;
      return slot;
    },
    release: (slot: T) => {
      slot.active = false;
    },
    forEachActive: (visit) => {
      for (const slot of slots) {
        if (slot.active) {
          visit(slot);
        }
      }
    },
  };
};

/**
 * Moves the items that `keep` accepts to the front of `items`, preserving
 * their order, and truncates the rest. Returns the surviving count.
 */
export const compactInPlace = <T>(items: T[], keep: (item: T) => boolean): number => {
  let write = 0;
  for (let read = 0; read < items.length; read += 1) {
    const item = items[read];
    if (keep(item)) {
      if (write !== read) {
        items[write] = item;
      }
      write += 1;
    }
  }
  items.length = write;
  return write;
};
