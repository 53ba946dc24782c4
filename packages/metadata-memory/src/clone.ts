export const clone = <T>(value: T): T => structuredClone(value);
