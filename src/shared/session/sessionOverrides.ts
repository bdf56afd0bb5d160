import type { SessionOverrides } from "../../ports/SessionOverrides";

export const createSessionOverrides = (initial: Readonly<Record<string, string>> = {}): SessionOverrides => {
  const values = new Map<string, string>(Object.entries(initial));

  return {
    get: (key) => values.get(key),
    set: (key, value) => {
      values.set(key, value);
    },
    restore: (restored) => {
      values.clear();
      for (const [key, value] of Object.entries(restored)) {
        values.set(key, value);
      }
    },
    snapshot: () => Object.fromEntries(values)
  };
};
