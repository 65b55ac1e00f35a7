/**
 * Yen amounts as printed by Japanese marketplaces:
 * "¥12,000", "12,000円", "現在 12,000円", "１，９８０円（税込）".
 * Returns null when no amount can be read.
 */
export function parseYen(text: string): number | null {
  const cleaned = text.normalize("NFKC").replace(/[¥,円\s]/g, "");
  // "現在" marks the current bid on auction pages
  const match = /現在(\d+)/.exec(cleaned) ?? /(\d+)/.exec(cleaned);
  if (!match) {
    return null;
  }

  const value = Number(match[1]);
  return Number.isSafeInteger(value) ? value : null;
}

export function formatYen(amount: number): string {
  return `¥${amount.toLocaleString("en-US")}`;
}
