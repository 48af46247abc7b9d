/**
 * Rolling log of queue events shared by all tasks.
 * Holds at most `capacity` entries; the oldest are evicted first.
 */
export class StatusLog {
  private entries: string[] = [];

  constructor(private readonly capacity: number = 100) {}

  append(entry: string): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  list(): string[] {
    return [...this.entries];
  }

  size(): number {
    return this.entries.length;
  }

  toString(): string {
    return this.entries.join('\n');
  }
}
