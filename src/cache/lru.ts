const HEAD = 0;
const TAIL = 1;
const FIRST_SLOT = 2;

/**
 * Fixed-capacity cache with strict least-recently-used eviction.
 *
 * Nodes live in parallel arrays addressed by slot index. Slots 0 and 1 are the
 * head and tail sentinels of the recency list; the slot after the head is the most
 * recently used entry and the slot before the tail the least recently used one.
 * Released slots go on a free list and are reused by later inserts.
 */
export class LruCache<V> {
  readonly capacity: number;

  private readonly index = new Map<string, number>();
  private readonly slotKeys: Array<string | undefined>;
  private readonly slotValues: Array<V | undefined>;
  private readonly prev: Int32Array;
  private readonly next: Int32Array;
  private readonly free: number[] = [];
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LRU capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    // One spare slot: a put links the new node before evicting.
    const slots = FIRST_SLOT + capacity + 1;
    this.slotKeys = new Array<string | undefined>(slots).fill(undefined);
    this.slotValues = new Array<V | undefined>(slots).fill(undefined);
    this.prev = new Int32Array(slots);
    this.next = new Int32Array(slots);
    this.reset();
  }

  get(key: string): V | undefined {
    const slot = this.index.get(key);
    if (slot === undefined) {
      return undefined;
    }
    this.unlink(slot);
    this.linkAfterHead(slot);
    return this.slotValues[slot];
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  put(key: string, value: V): void {
    const existing = this.index.get(key);
    if (existing !== undefined) {
      this.slotValues[existing] = value;
      this.unlink(existing);
      this.linkAfterHead(existing);
      return;
    }

    const slot = this.allocate();
    this.slotKeys[slot] = key;
    this.slotValues[slot] = value;
    this.index.set(key, slot);
    this.linkAfterHead(slot);
    this.count += 1;

    if (this.count > this.capacity) {
      const lru = this.prev[TAIL];
      if (lru !== HEAD) {
        this.evict(lru);
      }
    }
  }

  remove(key: string): boolean {
    const slot = this.index.get(key);
    if (slot === undefined) {
      return false;
    }
    this.evict(slot);
    return true;
  }

  clear(): void {
    this.index.clear();
    this.slotKeys.fill(undefined);
    this.slotValues.fill(undefined);
    this.reset();
  }

  size(): number {
    return this.count;
  }

  /** Keys from most to least recently used. */
  *keys(): IterableIterator<string> {
    for (let slot = this.next[HEAD]; slot !== TAIL; slot = this.next[slot]) {
      const key = this.slotKeys[slot];
      if (key !== undefined) {
        yield key;
      }
    }
  }

  private reset(): void {
    this.next[HEAD] = TAIL;
    this.prev[TAIL] = HEAD;
    this.free.length = 0;
    for (let slot = this.next.length - 1; slot >= FIRST_SLOT; slot -= 1) {
      this.free.push(slot);
    }
    this.count = 0;
  }

  private allocate(): number {
    const slot = this.free.pop();
    if (slot === undefined) {
      throw new Error('LRU arena exhausted');
    }
    return slot;
  }

  private evict(slot: number): void {
    this.unlink(slot);
    const key = this.slotKeys[slot];
    if (key !== undefined) {
      this.index.delete(key);
    }
    this.slotKeys[slot] = undefined;
    this.slotValues[slot] = undefined;
    this.free.push(slot);
    this.count -= 1;
  }

  private unlink(slot: number): void {
    const before = this.prev[slot];
    const after = this.next[slot];
    this.next[before] = after;
    this.prev[after] = before;
  }

  private linkAfterHead(slot: number): void {
    const first = this.next[HEAD];
    this.next[HEAD] = slot;
    this.prev[slot] = HEAD;
    this.next[slot] = first;
    this.prev[first] = slot;
  }
}
