import type { BookLevel, DepthSnapshot } from "../engine/types.js";

const COLUMN_WIDTH = 12;
const RULE = "-".repeat(COLUMN_WIDTH * 2 + 3);

function formatNumber(n: number): string {
  // Trim float noise such as 0.30000000000000004.
  return String(Number(n.toPrecision(12)));
}

function row(level: BookLevel): string {
  return `${formatNumber(level.price).padStart(COLUMN_WIDTH)} | ${formatNumber(level.totalQty)}`;
}

/**
 * Render a depth snapshot as a plain-text ladder: asks on top (worst to
 * best, as DepthSnapshot already orders them), then bids best to worst.
 */
export function formatDepth(symbol: string, snapshot: DepthSnapshot, sequenceId: number | null = null): string {
  const title = sequenceId === null ? ` ${symbol} ` : ` ${symbol} #${sequenceId} `;
  const lines = [
    title.padStart(Math.floor((RULE.length + title.length) / 2), "=").padEnd(RULE.length, "="),
    `${"Price".padStart(COLUMN_WIDTH)} | Quantity`,
    "ASKS",
    ...snapshot.asks.map(row),
    RULE,
    ...snapshot.bids.map(row),
    "BIDS",
    "=".repeat(RULE.length),
  ];
  return lines.join("\n") + "\n";
}
