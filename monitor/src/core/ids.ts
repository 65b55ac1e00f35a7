export function createId(prefix: string, now: number = Date.now()): string {
  return `${prefix}-${now}-${Math.random().toString(36).slice(2, 11)}`;
}
