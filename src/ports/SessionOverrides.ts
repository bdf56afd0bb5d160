export interface SessionOverrides {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  /** Puts every key back to `values`, dropping keys `values` does not name. */
  restore(values: Readonly<Record<string, string>>): void;
  snapshot(): Record<string, string>;
}
