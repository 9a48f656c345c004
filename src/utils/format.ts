// ===========================================
// DISPLAY FORMATTING
// ===========================================

export function shortAddress(address: string): string {
  if (address.length > 20) {
    return `${address.slice(0, 8)}...${address.slice(-4)}`;
  }
  return address;
}

/**
 * 95 minutes -> "1h 35m", 12 minutes -> "12m"
 */
export function formatElapsed(elapsedMs: number): string {
  const minutes = Math.max(0, Math.floor(elapsedMs / 60_000));
  if (minutes >= 60) {
    return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
  }
  return `${minutes}m`;
}

export function displayName(ticker: string | null, name: string | null): string {
  return ticker || name || 'Unknown';
}

/**
 * Escape characters that legacy Telegram Markdown treats as entity markers.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`\[])/g, '\\$1');
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
