import type { LedgerStorage } from "@/application/ports";

/**
 * In-memory storage implementation.
 * Keeps the previous contents as a backup, like the file storage does.
 */
export class InMemoryStorage implements LedgerStorage {
  readonly location: string;
  private contents: string | undefined;
  private previous: string | undefined;

  constructor(initial?: string, location = "memory") {
    this.contents = initial;
    this.location = location;
  }

  read(): string | undefined {
    return this.contents;
  }

  write(contents: string): void {
    this.previous = this.contents;
    this.contents = contents;
  }

  /** Contents before the last write. */
  get backup(): string | undefined {
    return this.previous;
  }
}
