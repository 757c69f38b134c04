import { performance } from "node:perf_hooks";

export const getMonotonicTime = (): number => {
  return performance.timeOrigin + performance.now();
};

/** Client capture time when it is usable, the server clock otherwise. */
export const resolveTimestamp = (
  value: unknown,
  now: () => number = getMonotonicTime,
): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return now();
};
